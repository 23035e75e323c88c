import {
  BUDGET_SWEEP_SERIES,
  BYTES_PER_DATA_POINT,
  HISTORY_MAX_ENTRIES,
  RESOURCE_LIMITS,
} from "../config/constants.js";
import { normalizeRealm, type Region } from "../config/regions.js";
import { HOUR_MS } from "../utils/datetime.js";
import { ValidationError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import type { DataPoint, SeriesKey } from "../utils/types.js";

const log = createLogger("history-store");

export interface HistoricalStoreOptions {
  /** Cap applied on every insert. */
  maxEntries?: number;
  /** Series length kept by `enforceBudget`. */
  maxPointsPerItem?: number;
  maxMemoryMB?: number;
  bytesPerPoint?: number;
  /** How many of the largest series one budget pass may truncate. */
  sweepSize?: number;
  now?: () => number;
}

export interface HistoryStats {
  series: number;
  points: number;
  memoryMB: number;
  realms: number;
  items: number;
}

interface SeriesEntry {
  key: SeriesKey;
  points: DataPoint[];
}

/**
 * In-memory rolling price history, one capped oldest-first series per
 * (region, realm, item). Lives for the process lifetime; nothing is persisted.
 *
 * Points are frozen on insert and never edited. Callers record in timestamp
 * order; an out-of-order point is kept but logged since trend math relies on
 * position reflecting chronology.
 */
export class HistoricalStore {
  private readonly data = new Map<string, SeriesEntry>();
  private readonly maxEntries: number;
  private readonly maxPointsPerItem: number;
  private readonly maxMemoryMB: number;
  private readonly bytesPerPoint: number;
  private readonly sweepSize: number;
  private readonly now: () => number;
  private insertions = 0;
  /** `insertions` as of the last budget pass; null before the first. */
  private enforcedAt: number | null = null;

  constructor(opts: HistoricalStoreOptions = {}) {
    this.maxEntries = opts.maxEntries ?? HISTORY_MAX_ENTRIES;
    this.maxPointsPerItem = opts.maxPointsPerItem ?? RESOURCE_LIMITS.maxDataPointsPerItem;
    this.maxMemoryMB = opts.maxMemoryMB ?? RESOURCE_LIMITS.maxHistoricalDataMB;
    this.bytesPerPoint = opts.bytesPerPoint ?? BYTES_PER_DATA_POINT;
    this.sweepSize = opts.sweepSize ?? BUDGET_SWEEP_SERIES;
    this.now = opts.now ?? (() => Date.now());
  }

  static encodeKey(key: SeriesKey): string {
    return `${key.region}:${normalizeRealm(key.realm)}:${key.itemId}`;
  }

  static key(region: Region, realm: string, itemId: number): SeriesKey {
    return Object.freeze({ region, realm: normalizeRealm(realm), itemId });
  }

  record(key: SeriesKey, price: number, quantity: number, timestamp: number = this.now()): DataPoint {
    if (!Number.isFinite(price) || price < 0) {
      throw new ValidationError(`Invalid price ${price} for item ${key.itemId}`);
    }
    if (!Number.isInteger(quantity) || quantity < 0) {
      throw new ValidationError(`Invalid quantity ${quantity} for item ${key.itemId}`);
    }

    const id = HistoricalStore.encodeKey(key);
    let entry = this.data.get(id);
    if (!entry) {
      entry = { key: HistoricalStore.key(key.region, key.realm, key.itemId), points: [] };
      this.data.set(id, entry);
    }

    const last = entry.points[entry.points.length - 1];
    if (last && timestamp < last.timestamp) {
      log.warn("Out-of-order data point", { key: id, timestamp, lastTimestamp: last.timestamp });
    }

    const point: DataPoint = Object.freeze({ timestamp, price, quantity });
    entry.points.push(point);
    this.insertions++;
    if (entry.points.length > this.maxEntries) {
      entry.points.splice(0, entry.points.length - this.maxEntries);
    }
    return point;
  }

  /** Points with `now - windowHours <= timestamp <= now`, oldest first. */
  query(key: SeriesKey, windowHours: number, now: number = this.now()): DataPoint[] {
    const entry = this.data.get(HistoricalStore.encodeKey(key));
    if (!entry) return [];

    const cutoff = now - windowHours * HOUR_MS;
    return entry.points.filter((p) => p.timestamp >= cutoff && p.timestamp <= now);
  }

  /** Full retained series, oldest first. */
  series(key: SeriesKey): DataPoint[] {
    return [...(this.data.get(HistoricalStore.encodeKey(key))?.points ?? [])];
  }

  has(key: SeriesKey): boolean {
    return this.data.has(HistoricalStore.encodeKey(key));
  }

  keys(): SeriesKey[] {
    return [...this.data.values()].map((e) => e.key);
  }

  keysFor(region: Region, realm: string): SeriesKey[] {
    const slug = normalizeRealm(realm);
    return this.keys().filter((k) => k.region === region && k.realm === slug);
  }

  get size(): number {
    return this.data.size;
  }

  totalPoints(): number {
    let total = 0;
    for (const entry of this.data.values()) total += entry.points.length;
    return total;
  }

  estimateMemoryMB(): number {
    return (this.totalPoints() * this.bytesPerPoint) / 1_000_000;
  }

  isOverBudget(): boolean {
    return this.estimateMemoryMB() > this.maxMemoryMB;
  }

  /**
   * Coarse eviction pass: when over budget, truncate up to `sweepSize` of the
   * longest series to `maxPointsPerItem`, keeping the newest points.
   * Returns the number of series truncated. A call with no inserts since the
   * previous pass returns 0, even when still over budget.
   */
  enforceBudget(): number {
    if (!this.isOverBudget() || this.enforcedAt === this.insertions) return 0;
    this.enforcedAt = this.insertions;

    const largest = [...this.data.values()]
      .sort((a, b) => b.points.length - a.points.length)
      .slice(0, this.sweepSize);

    let truncated = 0;
    for (const entry of largest) {
      if (entry.points.length > this.maxPointsPerItem) {
        entry.points = this.maxPointsPerItem > 0 ? entry.points.slice(-this.maxPointsPerItem) : [];
        truncated++;
      }
    }

    log.info("Enforced history memory budget", {
      truncated,
      memoryMB: this.estimateMemoryMB(),
      budgetMB: this.maxMemoryMB,
    });
    return truncated;
  }

  stats(): HistoryStats {
    const realms = new Set<string>();
    const items = new Set<number>();
    for (const { key } of this.data.values()) {
      realms.add(`${key.region}:${key.realm}`);
      items.add(key.itemId);
    }

    return {
      series: this.data.size,
      points: this.totalPoints(),
      memoryMB: this.estimateMemoryMB(),
      realms: realms.size,
      items: items.size,
    };
  }
}
