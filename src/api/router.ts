import { Hono } from "hono";
import type { AppContext } from "../context.js";
import { corsMiddleware, errorHandler, requestLogger, type AppEnv } from "./middleware.js";
import { healthCheck } from "./handlers/status.js";
import { getHistory } from "./handlers/history.js";
import { getAnalysis } from "./handlers/analysis.js";
import { getTrends } from "./handlers/trends.js";
import { getOpportunities } from "./handlers/opportunities.js";
import { getToken } from "./handlers/token.js";
import { getItem, lookupItems } from "./handlers/items.js";
import { triggerUpdate } from "./handlers/update.js";
import { getCacheStats, sweepCache } from "./handlers/cache.js";
import { listSnapshots } from "./handlers/snapshots.js";

export function createApp(ctx: AppContext) {
  const app = new Hono<AppEnv>();

  app.use("*", async (c, next) => {
    c.set("ctx", ctx);
    await next();
  });

  // Reject requests outside /api/v1 immediately
  app.use("*", async (c, next) => {
    if (!c.req.path.startsWith("/api/v1")) {
      return c.text("Not Found", 404);
    }
    await next();
  });

  app.use("*", corsMiddleware());
  app.use("*", requestLogger);
  app.onError(errorHandler);

  const api = new Hono<AppEnv>();

  api.get("/status", healthCheck);

  // History & analytics
  api.get("/history/:region/:realm/:itemId", getHistory);
  api.get("/analysis/:region/:realm", getAnalysis);
  api.get("/trends/:region/:realm", getTrends);
  api.get("/opportunities/:region/:realm", getOpportunities);
  api.get("/token/:region", getToken);

  // Item metadata
  api.get("/items/:region/:itemId", getItem);
  api.get("/items/:region", lookupItems);

  // Ingestion
  api.post("/update", triggerUpdate);
  api.get("/snapshots", listSnapshots);

  api.get("/cache", getCacheStats);
  api.delete("/cache", sweepCache);

  app.route("/api/v1", api);

  return app;
}
