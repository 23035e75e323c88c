import type Database from "better-sqlite3";
import type { AppConfig } from "./env.js";
import { requireCredentials } from "./env.js";
import { HistoricalStore } from "./history/store.js";
import { BulkUpdater, type BulkUpdateOptions, type PriceSink } from "./processors/bulk-update.js";
import { BattleNetClient, type MarketDataSource } from "./services/battle-net.js";
import { MarketAnalysisService, type TrendsSource } from "./services/market-analysis.js";
import { RequestExecutor } from "./services/request-executor.js";
import { TokenManager, type FetchFn } from "./services/token-manager.js";
import { getLatestSnapshotTime, getPriceTrends, recordSnapshot, storePricePoints } from "./db/queries.js";
import { composeHooks, loggingHooks, OperationCounter } from "./utils/interceptor.js";
import { createLogger } from "./utils/logger.js";
import { RateLimiter } from "./utils/rate-limiter.js";
import type { UpdateSummary } from "./utils/types.js";

/** Upstream client plus the pieces whose state the status endpoint reports. */
export interface MarketClient {
  source: MarketDataSource;
  limiter: RateLimiter | null;
  tokens: TokenManager | null;
  /** Outcome counts of upstream requests. */
  requests: OperationCounter | null;
}

/** Process-wide components, constructed once at startup and passed down. */
export interface AppContext {
  config: AppConfig;
  db: Database.Database;
  store: HistoricalStore;
  analysis: MarketAnalysisService;
  updater: BulkUpdater;
  client: MarketClient;
  startedAt: number;
}

export function createMarketClient(config: AppConfig, fetchFn?: FetchFn): MarketClient {
  const tokens = new TokenManager(requireCredentials(config), { fetch: fetchFn });
  const limiter = new RateLimiter({
    maxRequests: config.rateLimit.maxRequests,
    windowMs: config.rateLimit.windowMs,
  });
  const requests = new OperationCounter();
  const executor = new RequestExecutor(tokens, limiter, {
    region: config.region,
    locale: config.locale,
    fetch: fetchFn,
    hooks: composeHooks(loggingHooks(createLogger("request-executor")), requests.hooks),
  });
  return { source: new BattleNetClient(executor), limiter, tokens, requests };
}

export function sqliteSink(db: Database.Database): PriceSink & TrendsSource {
  return {
    storePricePoints: (points) => storePricePoints(db, points),
    recordSnapshot: (record) => recordSnapshot(db, record),
    getPriceTrends: (region, realm, itemId, hours) => getPriceTrends(db, region, realm, itemId, hours),
  };
}

export function createContext(
  config: AppConfig,
  db: Database.Database,
  client: MarketClient,
  now: () => number = () => Date.now(),
): AppContext {
  const store = new HistoricalStore({ now });
  const sink = sqliteSink(db);

  return {
    config,
    db,
    store,
    client,
    analysis: new MarketAnalysisService({ source: client.source, store, durable: sink, now }),
    updater: new BulkUpdater({
      source: client.source,
      store,
      sink,
      now,
      lastRunAt: getLatestSnapshotTime(db),
    }),
    startedAt: now(),
  };
}

/** Bulk update followed by invalidation of results computed from the old history. */
export async function runUpdate(ctx: AppContext, options: BulkUpdateOptions): Promise<UpdateSummary> {
  const summary = await ctx.updater.run(options);
  if (summary.itemsTracked > 0) {
    ctx.analysis.invalidateHistoryResults();
  }
  return summary;
}
