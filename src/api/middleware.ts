import type { Context, ErrorHandler, Next } from "hono";
import { cors } from "hono/cors";
import type { AppContext } from "../context.js";
import {
  AuthError,
  ForbiddenError,
  MarketDataError,
  NotFoundError,
  RateLimitedError,
  ValidationError,
} from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";

export type AppEnv = { Variables: { ctx: AppContext } };

const log = createLogger("api");

export function corsMiddleware(allowedHosts: readonly string[] = ["localhost", "127.0.0.1"]) {
  return cors({
    origin: (origin) => {
      try {
        const { hostname } = new URL(origin);
        if (allowedHosts.includes(hostname)) {
          return origin;
        }
      } catch {
        // invalid origin
      }
      return undefined;
    },
  });
}

function errorBody(err: MarketDataError) {
  return { error: err.message, code: err.code };
}

/**
 * Maps the market data error taxonomy onto HTTP statuses. Upstream auth and
 * permission failures are the gateway's problem, not the caller's, so they
 * surface as 502.
 */
export const errorHandler: ErrorHandler<AppEnv> = (err, c) => {
  const context = { path: c.req.path, method: c.req.method };

  if (err instanceof ValidationError) {
    return c.json(errorBody(err), 400);
  }

  if (err instanceof NotFoundError) {
    return c.json(errorBody(err), 404);
  }

  if (err instanceof RateLimitedError) {
    log.warn("Request rate limited", { ...context, retryAfter: err.retryAfterSeconds });
    c.header("Retry-After", String(err.retryAfterSeconds));
    return c.json({ ...errorBody(err), retryAfterSeconds: err.retryAfterSeconds }, 429);
  }

  if (err instanceof AuthError || err instanceof ForbiddenError) {
    log.error("Upstream rejected credentials", { ...context, error: err.message });
    return c.json(errorBody(err), 502);
  }

  if (err instanceof MarketDataError) {
    log.error("Upstream request failed", { ...context, code: err.code, error: err.message });
    return c.json(errorBody(err), 502);
  }

  log.error("Unhandled error", { ...context, error: String(err) });
  return c.json({ error: "Internal server error", code: null }, 500);
};

export async function requestLogger(c: Context<AppEnv>, next: Next) {
  const start = Date.now();
  await next();
  const duration = Date.now() - start;

  log.info("Request", {
    method: c.req.method,
    path: c.req.path,
    status: c.res.status,
    duration,
  });
}
