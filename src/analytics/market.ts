import {
  BUY_POSITION_MAX,
  FLIP_VOLATILITY_THRESHOLD,
  SELL_POSITION_MIN,
  TREND_SIGNAL_THRESHOLD,
  TREND_WINDOW_SIZE,
} from "../config/constants.js";
import { average as mean, median } from "../utils/math.js";
import type { DataPoint, InsufficientData, TrendsResult } from "../utils/types.js";

// Pure functions over a series snapshot. None of them throw on empty or
// single-point input; they return 0 or an insufficient-data result instead.

function prices(points: readonly DataPoint[]): number[] {
  return points.map((p) => p.price);
}

export function average(points: readonly DataPoint[]): number {
  return mean(prices(points));
}

export function min(points: readonly DataPoint[]): number {
  return points.length === 0 ? 0 : Math.min(...prices(points));
}

export function max(points: readonly DataPoint[]): number {
  return points.length === 0 ? 0 : Math.max(...prices(points));
}

/** (max - min) / average; a dispersion measure, not a variance. */
export function volatility(points: readonly DataPoint[]): number {
  const avg = average(points);
  return avg > 0 ? (max(points) - min(points)) / avg : 0;
}

/**
 * Fractional change from the average of the earliest `TREND_WINDOW_SIZE` prices
 * to the average of the latest ones. Short series use what they have.
 */
export function trend(points: readonly DataPoint[]): number {
  if (points.length < 2) return 0;

  const series = prices(points);
  const older = mean(series.slice(0, TREND_WINDOW_SIZE));
  const recent = mean(series.slice(-TREND_WINDOW_SIZE));
  return older > 0 ? (recent - older) / older : 0;
}

/** OLS slope of price against index, divided by the average price (per-step rate). */
export function linearTrendSlope(points: readonly DataPoint[]): number {
  const n = points.length;
  if (n < 2) return 0;

  const series = prices(points);
  const xMean = (n - 1) / 2;
  const yMean = mean(series);

  let numerator = 0;
  let denominator = 0;
  series.forEach((y, x) => {
    numerator += (x - xMean) * (y - yMean);
    denominator += (x - xMean) ** 2;
  });

  if (denominator === 0 || yMean <= 0) return 0;
  return numerator / denominator / yMean;
}

/** Where `current` sits in [min, max], 0 = bottom. A flat range is the midpoint. */
export function pricePosition(current: number, low: number, high: number): number {
  return high > low ? (current - low) / (high - low) : 0.5;
}

export type OpportunityType = "BUY" | "SELL" | "FLIP";

export interface Opportunity {
  type: OpportunityType;
  score: number;
}

/**
 * BUY near the bottom of the range while rising, SELL near the top while
 * falling, FLIP on wide ranges regardless of position.
 *
 *   BUY  score = (1 - position) * volatility * 100
 *   SELL score = position * volatility * 100
 *   FLIP score = volatility * 50
 */
export function opportunityScore(
  position: number,
  trendValue: number,
  volatilityValue: number,
): Opportunity | null {
  if (position < BUY_POSITION_MAX && trendValue > 0) {
    return { type: "BUY", score: (1 - position) * volatilityValue * 100 };
  }
  if (position > SELL_POSITION_MIN && trendValue < 0) {
    return { type: "SELL", score: position * volatilityValue * 100 };
  }
  if (volatilityValue > FLIP_VOLATILITY_THRESHOLD) {
    return { type: "FLIP", score: volatilityValue * 50 };
  }
  return null;
}

export type TrendDirection = "rising" | "falling" | "stable";
export type Recommendation = "BUY" | "SELL" | "HOLD";

/** Rising prices suggest selling into strength; falling ones suggest buying. */
export function classifyTrend(trendValue: number): {
  direction: TrendDirection;
  recommendation: Recommendation;
} {
  if (trendValue > TREND_SIGNAL_THRESHOLD) return { direction: "rising", recommendation: "SELL" };
  if (trendValue < -TREND_SIGNAL_THRESHOLD) return { direction: "falling", recommendation: "BUY" };
  return { direction: "stable", recommendation: "HOLD" };
}

export function computeTrends(points: readonly DataPoint[], windowHours: number): TrendsResult {
  const last = points[points.length - 1];
  if (!last) {
    return { status: "insufficient", reason: "no-points-in-window" };
  }

  return {
    status: "ok",
    avgPrice: average(points),
    minPrice: min(points),
    maxPrice: max(points),
    currentPrice: last.price,
    volatility: volatility(points),
    trend: trend(points),
    avgQuantity: mean(points.map((p) => p.quantity)),
    dataPoints: points.length,
    windowHours,
  };
}

// ── Multi-item analysis ────────────────────────────

export type AnalysisKind = "volatility" | "trends" | "opportunities";

export const ANALYSIS_KINDS: readonly AnalysisKind[] = ["volatility", "trends", "opportunities"];

export interface ItemMetrics {
  itemId: number;
  avgPrice: number;
  minPrice: number;
  maxPrice: number;
  currentPrice: number;
  volatility: number;
  /** Linear slope as a fraction of the average price, per observation. */
  slope: number;
  avgQuantity: number;
  totalVolume: number;
  dataPoints: number;
}

export interface RankedItem extends ItemMetrics {
  signal: Opportunity | null;
}

export interface MarketSummary {
  averageVolatility: number;
  medianVolatility: number;
  maxVolatility: number;
  averageSlope: number;
  rising: number;
  falling: number;
}

export interface DetailedAnalysis {
  status: "ok";
  kind: AnalysisKind;
  itemsAnalyzed: number;
  items: RankedItem[];
  summary: MarketSummary;
}

export function computeItemMetrics(itemId: number, points: readonly DataPoint[]): ItemMetrics | null {
  const last = points[points.length - 1];
  if (!last || points.length < 2) return null;

  const quantities = points.map((p) => p.quantity);
  return {
    itemId,
    avgPrice: average(points),
    minPrice: min(points),
    maxPrice: max(points),
    currentPrice: last.price,
    volatility: volatility(points),
    slope: linearTrendSlope(points),
    avgQuantity: mean(quantities),
    totalVolume: quantities.reduce((total, q) => total + q, 0),
    dataPoints: points.length,
  };
}

export function signalFor(metrics: ItemMetrics): Opportunity | null {
  const position = pricePosition(metrics.currentPrice, metrics.minPrice, metrics.maxPrice);
  return opportunityScore(position, metrics.slope, metrics.volatility);
}

export function marketSummary(metrics: readonly ItemMetrics[]): MarketSummary {
  const volatilities = metrics.map((m) => m.volatility);
  const slopes = metrics.map((m) => m.slope);

  return {
    averageVolatility: mean(volatilities),
    medianVolatility: median(volatilities),
    maxVolatility: volatilities.length > 0 ? Math.max(...volatilities) : 0,
    averageSlope: mean(slopes),
    rising: slopes.filter((s) => s > 0).length,
    falling: slopes.filter((s) => s < 0).length,
  };
}

/**
 * Rank items by the requested analysis. Items with fewer than two points are
 * skipped; when none qualify the result is insufficient-data, not an error.
 */
export function analyzeItems(
  seriesByItem: ReadonlyMap<number, readonly DataPoint[]>,
  kind: AnalysisKind,
  topN: number,
): DetailedAnalysis | InsufficientData {
  const metrics: ItemMetrics[] = [];
  for (const [itemId, points] of seriesByItem) {
    const m = computeItemMetrics(itemId, points);
    if (m) metrics.push(m);
  }

  if (metrics.length === 0) {
    return { status: "insufficient", reason: "too-few-points" };
  }

  const ranked: RankedItem[] = metrics.map((m) => ({ ...m, signal: signalFor(m) }));

  let items: RankedItem[];
  switch (kind) {
    case "volatility":
      items = ranked.sort((a, b) => b.volatility - a.volatility);
      break;
    case "trends":
      items = ranked.sort((a, b) => Math.abs(b.slope) - Math.abs(a.slope));
      break;
    case "opportunities":
      items = ranked
        .filter((r) => r.signal !== null)
        .sort((a, b) => (b.signal?.score ?? 0) - (a.signal?.score ?? 0));
      break;
  }

  return {
    status: "ok",
    kind,
    itemsAnalyzed: metrics.length,
    items: items.slice(0, topN),
    summary: marketSummary(metrics),
  };
}
