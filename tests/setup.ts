// Keep pino quiet during test runs
process.env.LOG_LEVEL = "silent";
