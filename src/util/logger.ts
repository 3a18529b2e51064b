import pino from "pino";

let loggerInstance: pino.Logger | null = null;

/**
 * Process-wide logger. `LOG_LEVEL` overrides the level picked by `verbose`.
 */
export function getLogger(verbose = false): pino.Logger {
  if (!loggerInstance) {
    loggerInstance = pino({
      name: "grant-radar",
      level: process.env.LOG_LEVEL || (verbose ? "debug" : "info"),
      transport: verbose
        ? {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "HH:MM:ss Z",
              ignore: "pid,hostname,name",
            },
          }
        : undefined,
    });
  }
  return loggerInstance;
}

export type Logger = pino.Logger;
