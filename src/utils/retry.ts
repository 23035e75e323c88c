import {
  RETRY_BASE_DELAY_MS,
  RETRY_MAX_ATTEMPTS,
  RETRY_MAX_DELAY_MS,
} from "../config/constants.js";
import { sleep } from "./datetime.js";
import { isTransientError } from "./errors.js";
import { createLogger } from "./logger.js";

const log = createLogger("retry");

export interface RetryOptions {
  /** Total attempts, including the first. */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  shouldRetry?: (err: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  /** Extra context merged into the retry log line. */
  context?: Record<string, unknown>;
}

/** Delay before the attempt that follows failed attempt `attempt` (1-based). */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
}

export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? RETRY_MAX_ATTEMPTS;
  const baseDelay = options?.baseDelayMs ?? RETRY_BASE_DELAY_MS;
  const maxDelay = options?.maxDelayMs ?? RETRY_MAX_DELAY_MS;
  const shouldRetry = options?.shouldRetry ?? isTransientError;
  const wait = options?.sleep ?? sleep;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;

      if (!shouldRetry(err) || attempt === maxAttempts) {
        throw err;
      }

      const delay = backoffDelay(attempt, baseDelay, maxDelay);

      log.warn("Transient error, retrying", {
        ...options?.context,
        attempt,
        maxAttempts,
        delayMs: delay,
        error: String(err),
      });

      await wait(delay);
    }
  }

  throw lastError;
}
