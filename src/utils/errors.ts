/**
 * Error taxonomy for the market data layer.
 *
 * Everything the request executor can surface extends MarketDataError so callers
 * can branch on `code` without importing every class. Budget exhaustion during a
 * bulk update is not an error: it is reported through `UpdateSummary.truncated`.
 */

export type MarketDataErrorCode =
  | "AUTH"
  | "RATE_LIMITED"
  | "NOT_FOUND"
  | "FORBIDDEN"
  | "NETWORK"
  | "SERVER"
  | "VALIDATION";

export abstract class MarketDataError extends Error {
  abstract readonly code: MarketDataErrorCode;
}

/** Client-credentials exchange failed. `status` is undefined when no response arrived. */
export class AuthError extends MarketDataError {
  readonly code = "AUTH";

  constructor(
    public readonly status: number | undefined,
    message = `Failed to get access token: ${status ?? "no response"}`,
  ) {
    super(message);
    this.name = "AuthError";
  }
}

export class RateLimitedError extends MarketDataError {
  readonly code = "RATE_LIMITED";

  constructor(public readonly retryAfterSeconds: number) {
    super(`Rate limited. Retry after ${retryAfterSeconds}s`);
    this.name = "RateLimitedError";
  }
}

export class NotFoundError extends MarketDataError {
  readonly code = "NOT_FOUND";

  constructor(public readonly path: string) {
    super(`Resource not found: ${path}`);
    this.name = "NotFoundError";
  }
}

export class ForbiddenError extends MarketDataError {
  readonly code = "FORBIDDEN";

  constructor(
    public readonly path: string,
    public readonly body: string = "",
  ) {
    super(`Access forbidden: ${path}`);
    this.name = "ForbiddenError";
  }
}

export class NetworkError extends MarketDataError {
  readonly code = "NETWORK";

  constructor(message: string, options?: { cause?: unknown }) {
    super(`Network error: ${message}`, options);
    this.name = "NetworkError";
  }
}

export class ServerError extends MarketDataError {
  readonly code = "SERVER";

  constructor(
    public readonly status: number,
    public readonly body: string,
  ) {
    super(`API request failed: ${status}${body ? ` - ${body}` : ""}`);
    this.name = "ServerError";
  }
}

/** Caller supplied conflicting or out-of-range parameters. Raised before any I/O. */
export class ValidationError extends MarketDataError {
  readonly code = "VALIDATION";

  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Network failures and 5xx responses are worth another attempt; everything else is final. */
export function isTransientError(err: unknown): boolean {
  if (err instanceof NetworkError) return true;
  return err instanceof ServerError && err.status >= 500;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
