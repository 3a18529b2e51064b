import { sleep } from "./sleep.js";
import type { Logger } from "./logger.js";

export interface RetryOptions {
  tries?: number;
  baseMs?: number;
  jitter?: boolean;
  logger?: Logger;
  /** Return false to give up immediately on a permanent failure. */
  shouldRetry?: (error: Error) => boolean;
}

/**
 * Retry a function with exponential backoff and optional jitter.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    tries = 3,
    baseMs = 400,
    jitter = true,
    logger,
    shouldRetry = () => true,
  } = options;

  let lastError: Error | null = null;

  for (let attempt = 1; attempt <= tries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === tries || !shouldRetry(lastError)) {
        break;
      }

      const delayMs = baseMs * Math.pow(2, attempt - 1) + (jitter ? Math.random() * 100 : 0);

      if (logger) {
        logger.warn(
          {
            attempt,
            tries,
            delayMs: Math.round(delayMs),
            error: lastError.message,
          },
          "Retrying after error"
        );
      }

      await sleep(delayMs);
    }
  }

  throw lastError || new Error("Retry exhausted");
}
