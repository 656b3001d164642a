import { normalizeError } from "./errors.js";
import { logger } from "./logger.js";

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  attempts: number;
  initialBackoffMs: number;
}

export async function withRetry<T>(
  actionName: string,
  options: RetryOptions,
  handler: () => Promise<T>,
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.attempts; attempt += 1) {
    try {
      return await handler();
    } catch (error) {
      lastError = error;
      if (attempt >= options.attempts) {
        break;
      }
      const sleepMs = options.initialBackoffMs * Math.pow(2, attempt - 1);
      logger.warn("retrying action", {
        actionName,
        attempt,
        sleepMs,
        error: normalizeError(error),
      });
      await wait(sleepMs);
    }
  }

  throw new Error(
    `action ${actionName} failed after ${options.attempts} attempts: ${normalizeError(lastError)}`,
  );
}
