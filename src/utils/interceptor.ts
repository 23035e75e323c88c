import type { Logger } from "./logger.js";

/**
 * Hooks run around an intercepted operation. `after` receives the result and
 * `onError` the thrown value; neither can alter them.
 */
export interface InterceptorHooks {
  before?: (name: string) => void;
  after?: (name: string, result: unknown, durationMs: number) => void;
  onError?: (name: string, err: unknown, durationMs: number) => void;
}

export async function intercept<T>(
  name: string,
  fn: () => Promise<T>,
  hooks: InterceptorHooks = {},
  now: () => number = () => Date.now(),
): Promise<T> {
  const start = now();
  hooks.before?.(name);

  try {
    const result = await fn();
    hooks.after?.(name, result, now() - start);
    return result;
  } catch (err) {
    hooks.onError?.(name, err, now() - start);
    throw err;
  }
}

export function composeHooks(...all: InterceptorHooks[]): InterceptorHooks {
  return {
    before: (name) => all.forEach((h) => h.before?.(name)),
    after: (name, result, durationMs) => all.forEach((h) => h.after?.(name, result, durationMs)),
    onError: (name, err, durationMs) => all.forEach((h) => h.onError?.(name, err, durationMs)),
  };
}

export function loggingHooks(log: Logger, context: Record<string, unknown> = {}): InterceptorHooks {
  return {
    before: (name) => log.debug("Operation start", { ...context, operation: name }),
    after: (name, _result, durationMs) =>
      log.debug("Operation complete", { ...context, operation: name, durationMs }),
    onError: (name, err, durationMs) =>
      log.warn("Operation failed", { ...context, operation: name, durationMs, error: String(err) }),
  };
}

export interface OperationStats {
  calls: number;
  failures: number;
  avgDurationMs: number;
}

/** Counts completed operations through its `hooks`. */
export class OperationCounter {
  private calls = 0;
  private failures = 0;
  private totalMs = 0;

  readonly hooks: InterceptorHooks = {
    after: (_name, _result, durationMs) => {
      this.calls++;
      this.totalMs += durationMs;
    },
    onError: (_name, _err, durationMs) => {
      this.calls++;
      this.failures++;
      this.totalMs += durationMs;
    },
  };

  stats(): OperationStats {
    return {
      calls: this.calls,
      failures: this.failures,
      avgDurationMs: this.calls === 0 ? 0 : Math.round(this.totalMs / this.calls),
    };
  }
}
