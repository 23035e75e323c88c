import type { Context } from "hono";
import type { AppEnv } from "../middleware.js";

export function getCacheStats(c: Context<AppEnv>) {
  return c.json({ data: c.get("ctx").analysis.cacheStats() });
}

export function sweepCache(c: Context<AppEnv>) {
  const removed = c.get("ctx").analysis.sweepCaches();
  return c.json({ removed });
}
