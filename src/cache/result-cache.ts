import type { Region } from "../config/regions.js";
import { normalizeRealm } from "../config/regions.js";
import type { AnalysisKind } from "../analytics/market.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("result-cache");

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export interface CacheStats {
  total: number;
  valid: number;
  expired: number;
}

/**
 * Short-TTL memoization of derived results. Expiry is lazy: an entry past its
 * deadline is dropped on the read that finds it, or by `sweep()`.
 */
export class ResultCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();

  constructor(private readonly now: () => number = () => Date.now()) {}

  put(key: string, value: V, ttlMs: number): void {
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      log.debug("Cache entry expired", { key });
      return undefined;
    }
    return entry.value;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Drop every expired entry; returns how many were removed. */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  stats(): CacheStats {
    const now = this.now();
    let valid = 0;
    for (const entry of this.entries.values()) {
      if (now < entry.expiresAt) valid++;
    }
    return { total: this.entries.size, valid, expired: this.entries.size - valid };
  }

  async getOrCompute(key: string, ttlMs: number, compute: () => Promise<V>): Promise<V> {
    const hit = this.get(key);
    if (hit !== undefined) {
      log.debug("Cache hit", { key });
      return hit;
    }

    const value = await compute();
    this.put(key, value, ttlMs);
    return value;
  }

  // Key builders
  static opportunitiesKey(region: Region, realm: string): string {
    return `opportunities:${region}:${normalizeRealm(realm)}`;
  }

  static analysisKey(kind: AnalysisKind, region: Region, realm: string, topN: number): string {
    return `analysis:${kind}:${region}:${normalizeRealm(realm)}:${topN}`;
  }

  static tokenKey(region: Region): string {
    return `token:${region}`;
  }

  static itemKey(region: Region, itemId: number): string {
    return `item:${region}:${itemId}`;
  }
}
