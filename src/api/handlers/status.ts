import type { Context } from "hono";
import { getTableCounts } from "../../db/queries.js";
import type { AppEnv } from "../middleware.js";

export function healthCheck(c: Context<AppEnv>) {
  const { config, store, updater, client, db, startedAt } = c.get("ctx");
  const { limiter, tokens, requests } = client;
  const lastRunAt = updater.lastRunAt;

  return c.json({
    status: "ok",
    region: config.region,
    uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
    history: store.stats(),
    database: getTableCounts(db),
    rateLimiter: limiter ? { inWindow: limiter.inWindow(), pending: limiter.pending } : null,
    tokenExchanges: tokens?.exchangeCount ?? null,
    upstreamRequests: requests?.stats() ?? null,
    lastUpdate: lastRunAt === null ? null : new Date(lastRunAt).toISOString(),
    updateRunning: updater.isRunning,
    nextUpdateAllowedIn: updater.secondsUntilAllowed(),
  });
}
