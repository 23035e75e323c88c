import { DISPARITY_MIN_LISTINGS, LOW_COMPETITION_MAX_LISTINGS } from "../config/constants.js";
import type { ItemAggregate, Listing } from "../utils/types.js";

export interface PriceDisparity {
  itemId: number;
  minPrice: number;
  avgPrice: number;
  maxPrice: number;
  /** (avg - min) / min, as a percentage */
  profitMargin: number;
  listings: number;
}

export interface LowCompetitionItem {
  itemId: number;
  sellers: number;
  avgPrice: number;
  totalQuantity: number;
}

/**
 * Collapse one auction snapshot to per-item unit-price summaries.
 * Listings without a positive buyout or quantity are ignored.
 */
export function aggregateAuctions(listings: readonly Listing[]): Map<number, ItemAggregate> {
  const running = new Map<number, { priceSum: number; min: number; max: number; quantity: number; count: number }>();

  for (const l of listings) {
    if (l.buyout <= 0 || l.quantity <= 0) continue;

    const unitPrice = l.buyout / l.quantity;
    const entry = running.get(l.itemId);
    if (entry) {
      entry.priceSum += unitPrice;
      entry.min = Math.min(entry.min, unitPrice);
      entry.max = Math.max(entry.max, unitPrice);
      entry.quantity += l.quantity;
      entry.count++;
    } else {
      running.set(l.itemId, { priceSum: unitPrice, min: unitPrice, max: unitPrice, quantity: l.quantity, count: 1 });
    }
  }

  const result = new Map<number, ItemAggregate>();
  for (const [itemId, entry] of running) {
    result.set(itemId, {
      itemId,
      avgPrice: entry.priceSum / entry.count,
      minPrice: entry.min,
      maxPrice: entry.max,
      totalQuantity: entry.quantity,
      listings: entry.count,
    });
  }
  return result;
}

/** Most-traded first; ties keep insertion order. */
export function topByVolume(
  aggregates: ReadonlyMap<number, ItemAggregate>,
  limit: number = Infinity,
): ItemAggregate[] {
  return [...aggregates.values()]
    .sort((a, b) => b.totalQuantity - a.totalQuantity)
    .slice(0, Math.max(0, limit));
}

// Items whose cheapest listing is well under the going rate
export function findPriceDisparities(aggregates: ReadonlyMap<number, ItemAggregate>): PriceDisparity[] {
  const out: PriceDisparity[] = [];
  for (const a of aggregates.values()) {
    if (a.listings < DISPARITY_MIN_LISTINGS) continue;
    if (a.maxPrice > a.minPrice * 2 && a.avgPrice > a.minPrice * 1.5) {
      out.push({
        itemId: a.itemId,
        minPrice: a.minPrice,
        avgPrice: a.avgPrice,
        maxPrice: a.maxPrice,
        profitMargin: ((a.avgPrice - a.minPrice) / a.minPrice) * 100,
        listings: a.listings,
      });
    }
  }
  return out.sort((a, b) => b.profitMargin - a.profitMargin);
}

export function findLowCompetition(aggregates: ReadonlyMap<number, ItemAggregate>): LowCompetitionItem[] {
  return [...aggregates.values()]
    .filter((a) => a.listings >= 1 && a.listings <= LOW_COMPETITION_MAX_LISTINGS)
    .map((a) => ({
      itemId: a.itemId,
      sellers: a.listings,
      avgPrice: a.avgPrice,
      totalQuantity: a.totalQuantity,
    }))
    .sort((a, b) => b.avgPrice - a.avgPrice);
}
