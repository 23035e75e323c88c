import {
  analyzeItems,
  classifyTrend,
  computeTrends,
  type AnalysisKind,
  type DetailedAnalysis,
  type Recommendation,
  type TrendDirection,
} from "../analytics/market.js";
import { ResultCache, type CacheStats } from "../cache/result-cache.js";
import {
  ANALYSIS_CACHE_TTL_MS,
  DEFAULT_HISTORY_HOURS,
  ITEM_CACHE_TTL_MS,
  MARKET_TRACK_TOP_ITEMS,
  MAX_ITEM_LOOKUP,
  MAX_TREND_ITEMS,
  OPPORTUNITY_LIST_LIMIT,
  TOKEN_PRICE_CACHE_TTL_MS,
  TOP_MOVERS,
  TREND_SIGNAL_THRESHOLD,
} from "../config/constants.js";
import { normalizeRealm, type Region } from "../config/regions.js";
import { HistoricalStore } from "../history/store.js";
import {
  aggregateAuctions,
  findLowCompetition,
  findPriceDisparities,
  topByVolume,
  type LowCompetitionItem,
  type PriceDisparity,
} from "../processors/aggregate-auctions.js";
import { MarketDataError, ValidationError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { average } from "../utils/math.js";
import type { DataPoint, InsufficientData, ItemInfo, TrendsResult } from "../utils/types.js";
import type { MarketDataSource } from "./battle-net.js";

const log = createLogger("market-analysis");

/** Durable fallback for items the in-memory history has never seen. */
export interface TrendsSource {
  getPriceTrends(region: Region, realm: string, itemId: number, hours: number): TrendsResult;
}

export interface MarketOpportunities {
  region: Region;
  realm: string;
  realmName: string | null;
  generatedAt: string;
  totalListings: number;
  uniqueItems: number;
  itemsRecorded: number;
  disparities: PriceDisparity[];
  lowCompetition: LowCompetitionItem[];
}

export interface ItemTrendPrediction {
  itemId: number;
  trends: TrendsResult;
  direction: TrendDirection | null;
  recommendation: Recommendation | null;
}

export interface Mover {
  itemId: number;
  trend: number;
}

export type Sentiment = "bullish" | "bearish" | "neutral";

export interface MarketOverview {
  trackedItems: number;
  rising: number;
  falling: number;
  stable: number;
  averageVolatility: number;
  sentiment: Sentiment;
  topGainers: Mover[];
  topLosers: Mover[];
}

export interface TrendPrediction {
  region: Region;
  realm: string;
  tokenPrice: number;
  items: ItemTrendPrediction[];
  market: MarketOverview | null;
}

export type AnalysisResult = DetailedAnalysis | InsufficientData;

export interface ItemLookup {
  region: Region;
  requested: number;
  items: ItemInfo[];
  /** IDs the upstream could not resolve. */
  failed: number[];
}

export interface MarketAnalysisDeps {
  source: MarketDataSource;
  store: HistoricalStore;
  durable?: TrendsSource;
  now?: () => number;
}

/**
 * Read-side operations over live auction data and the in-memory history.
 * Each result family has its own cache instance.
 */
export class MarketAnalysisService {
  readonly opportunities: ResultCache<MarketOpportunities>;
  readonly analyses: ResultCache<DetailedAnalysis>;
  readonly tokenPrices: ResultCache<number>;
  readonly items: ResultCache<ItemInfo>;
  private readonly source: MarketDataSource;
  private readonly store: HistoricalStore;
  private readonly durable: TrendsSource | undefined;
  private readonly now: () => number;

  constructor(deps: MarketAnalysisDeps) {
    this.source = deps.source;
    this.store = deps.store;
    this.durable = deps.durable;
    this.now = deps.now ?? (() => Date.now());
    this.opportunities = new ResultCache<MarketOpportunities>(this.now);
    this.analyses = new ResultCache<DetailedAnalysis>(this.now);
    this.tokenPrices = new ResultCache<number>(this.now);
    this.items = new ResultCache<ItemInfo>(this.now);
  }

  analyzeMarketOpportunities(region: Region, realm: string): Promise<MarketOpportunities> {
    const slug = normalizeRealm(realm);
    return this.opportunities.getOrCompute(
      ResultCache.opportunitiesKey(region, slug),
      ANALYSIS_CACHE_TTL_MS,
      () => this.scanOpportunities(region, slug),
    );
  }

  /** Trend stats from memory, falling back to the durable store when memory has never seen the item. */
  getHistoricalTrends(
    region: Region,
    realm: string,
    itemId: number,
    hours: number = DEFAULT_HISTORY_HOURS,
  ): TrendsResult {
    const key = HistoricalStore.key(region, realm, itemId);
    if (this.store.has(key)) {
      return computeTrends(this.store.query(key, hours, this.now()), hours);
    }
    if (this.durable) {
      return this.durable.getPriceTrends(region, key.realm, itemId, hours);
    }
    return { status: "insufficient", reason: "no-history" };
  }

  async predictMarketTrends(
    region: Region,
    realm: string,
    itemIds: readonly number[] = [],
  ): Promise<TrendPrediction> {
    const slug = normalizeRealm(realm);
    const tokenPrice = await this.getTokenPrice(region);

    const items = itemIds.slice(0, MAX_TREND_ITEMS).map((itemId): ItemTrendPrediction => {
      const trends = this.getHistoricalTrends(region, slug, itemId);
      if (trends.status !== "ok") {
        return { itemId, trends, direction: null, recommendation: null };
      }
      return { itemId, trends, ...classifyTrend(trends.trend) };
    });

    return { region, realm: slug, tokenPrice, items, market: this.marketOverview(region, slug) };
  }

  async analyzeWithDetails(
    kind: AnalysisKind,
    region: Region,
    realm: string,
    topN: number,
  ): Promise<AnalysisResult> {
    const slug = normalizeRealm(realm);
    const key = ResultCache.analysisKey(kind, region, slug, topN);
    const cached = this.analyses.get(key);
    if (cached) return cached;

    const seriesByItem = new Map<number, readonly DataPoint[]>();
    for (const k of this.store.keysFor(region, slug)) {
      seriesByItem.set(k.itemId, this.store.series(k));
    }

    const result = analyzeItems(seriesByItem, kind, topN);
    // Sparse history is expected to fill in; only cache real answers
    if (result.status === "ok") {
      this.analyses.put(key, result, ANALYSIS_CACHE_TTL_MS);
    }
    return result;
  }

  getTokenPrice(region: Region): Promise<number> {
    return this.tokenPrices.getOrCompute(ResultCache.tokenKey(region), TOKEN_PRICE_CACHE_TTL_MS, () =>
      this.source.getTokenPrice(region),
    );
  }

  getItem(region: Region, itemId: number): Promise<ItemInfo> {
    return this.items.getOrCompute(ResultCache.itemKey(region, itemId), ITEM_CACHE_TTL_MS, () =>
      this.source.getItem(itemId, region),
    );
  }

  /** Resolves items one at a time; an ID the upstream rejects is reported in `failed`. */
  async lookupItems(region: Region, itemIds: readonly number[]): Promise<ItemLookup> {
    const unique = [...new Set(itemIds)];
    if (unique.length > MAX_ITEM_LOOKUP) {
      throw new ValidationError(`Too many items (${unique.length}). Maximum ${MAX_ITEM_LOOKUP} allowed.`);
    }

    const items: ItemInfo[] = [];
    const failed: number[] = [];
    for (const itemId of unique) {
      try {
        items.push(await this.getItem(region, itemId));
      } catch (err) {
        if (!(err instanceof MarketDataError)) throw err;
        log.warn("Item lookup failed", { region, itemId, error: err.message });
        failed.push(itemId);
      }
    }
    return { region, requested: unique.length, items, failed };
  }

  /** Drop derived results that new history would change. */
  invalidateHistoryResults(): void {
    this.analyses.clear();
  }

  cacheStats(): Record<"opportunities" | "analyses" | "tokenPrices" | "items", CacheStats> {
    return {
      opportunities: this.opportunities.stats(),
      analyses: this.analyses.stats(),
      tokenPrices: this.tokenPrices.stats(),
      items: this.items.stats(),
    };
  }

  sweepCaches(): number {
    return this.opportunities.sweep() + this.analyses.sweep() + this.tokenPrices.sweep() + this.items.sweep();
  }

  private async scanOpportunities(region: Region, realm: string): Promise<MarketOpportunities> {
    const connected = await this.source.getConnectedRealm(realm, region);
    const listings = await this.source.getAuctions(connected.connectedRealmId, connected.region);
    const aggregates = aggregateAuctions(listings);

    const timestamp = this.now();
    const tracked = topByVolume(aggregates, MARKET_TRACK_TOP_ITEMS);
    for (const a of tracked) {
      this.store.record(HistoricalStore.key(region, realm, a.itemId), a.avgPrice, a.totalQuantity, timestamp);
    }
    this.invalidateHistoryResults();

    const disparities = findPriceDisparities(aggregates);
    const lowCompetition = findLowCompetition(aggregates);
    log.info("Scanned market", {
      region,
      realm,
      listings: listings.length,
      items: aggregates.size,
      disparities: disparities.length,
    });

    return {
      region,
      realm,
      realmName: connected.name,
      generatedAt: new Date(timestamp).toISOString(),
      totalListings: listings.length,
      uniqueItems: aggregates.size,
      itemsRecorded: tracked.length,
      disparities: disparities.slice(0, OPPORTUNITY_LIST_LIMIT),
      lowCompetition: lowCompetition.slice(0, OPPORTUNITY_LIST_LIMIT),
    };
  }

  private marketOverview(region: Region, realm: string): MarketOverview | null {
    const now = this.now();
    const rows: { itemId: number; trend: number; volatility: number }[] = [];
    for (const key of this.store.keysFor(region, realm)) {
      const trends = computeTrends(this.store.query(key, DEFAULT_HISTORY_HOURS, now), DEFAULT_HISTORY_HOURS);
      if (trends.status === "ok") {
        rows.push({ itemId: key.itemId, trend: trends.trend, volatility: trends.volatility });
      }
    }
    if (rows.length === 0) return null;

    const rising = rows.filter((r) => r.trend > TREND_SIGNAL_THRESHOLD).length;
    const falling = rows.filter((r) => r.trend < -TREND_SIGNAL_THRESHOLD).length;
    const toMover = (r: { itemId: number; trend: number }): Mover => ({ itemId: r.itemId, trend: r.trend });

    return {
      trackedItems: rows.length,
      rising,
      falling,
      stable: rows.length - rising - falling,
      averageVolatility: average(rows.map((r) => r.volatility)),
      sentiment: rising > falling ? "bullish" : falling > rising ? "bearish" : "neutral",
      topGainers: [...rows].sort((a, b) => b.trend - a.trend).slice(0, TOP_MOVERS).map(toMover),
      topLosers: [...rows].sort((a, b) => a.trend - b.trend).slice(0, TOP_MOVERS).map(toMover),
    };
  }
}
