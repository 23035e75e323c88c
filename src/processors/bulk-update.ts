import {
  DEFAULT_TOP_ITEMS,
  MIN_TOP_ITEMS,
  RESOURCE_LIMITS,
  type ResourceBudget,
} from "../config/constants.js";
import {
  ALL_US_REALMS,
  DEFAULT_REALMS,
  isRegion,
  normalizeRealm,
  POPULAR_REALMS,
  type RealmEntry,
  type Region,
} from "../config/regions.js";
import { HistoricalStore } from "../history/store.js";
import type { MarketDataSource } from "../services/battle-net.js";
import { errorMessage, RateLimitedError, ValidationError } from "../utils/errors.js";
import { intercept, loggingHooks, type InterceptorHooks } from "../utils/interceptor.js";
import { createLogger } from "../utils/logger.js";
import { clamp } from "../utils/math.js";
import type {
  PricePoint,
  RealmOutcome,
  SnapshotRecord,
  TruncationReason,
  UpdateSummary,
} from "../utils/types.js";
import { aggregateAuctions, topByVolume } from "./aggregate-auctions.js";

const log = createLogger("bulk-update");

const ERROR_SNIPPET_LENGTH = 100;

export type RealmPreset = "default" | "popular" | "all-us" | "custom";

export interface RealmSelection {
  preset: RealmPreset;
  realms: RealmEntry[];
}

/** Durable side of an update. Both calls may be sync (SQLite) or async. */
export interface PriceSink {
  storePricePoints(points: PricePoint[]): number | Promise<number>;
  recordSnapshot(record: SnapshotRecord): void | Promise<void>;
}

export interface BulkUpdateOptions {
  /** `realm:region,...`, `popular`, `all-us`, or empty for the defaults. */
  realms?: string;
  topItems?: number;
  includeAllItems?: boolean;
}

export interface BulkUpdaterDeps {
  source: MarketDataSource;
  store: HistoricalStore;
  sink?: PriceSink;
  budget?: ResourceBudget;
  now?: () => number;
  /** Epoch ms of the previous run, e.g. restored from the snapshot table. */
  lastRunAt?: number | null;
  hooks?: InterceptorHooks;
}

/**
 * Presets are fixed lists; a custom list is `realm[:region]` entries separated
 * by commas. An entry without a region is resolved by the realm lookup. Custom
 * lists longer than `maxRealms` are rejected.
 */
export function parseRealmSpec(
  spec: string | undefined,
  maxRealms: number = RESOURCE_LIMITS.maxRealmsPerRequest,
): RealmSelection {
  const trimmed = spec?.trim() ?? "";
  if (trimmed === "") return { preset: "default", realms: [...DEFAULT_REALMS] };

  switch (trimmed.toLowerCase()) {
    case "popular":
      return { preset: "popular", realms: [...POPULAR_REALMS] };
    case "all-us":
      log.warn("Limiting 'all-us' to the default realms", { realms: ALL_US_REALMS.length });
      return { preset: "all-us", realms: [...ALL_US_REALMS] };
  }

  const entries = trimmed
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s !== "");

  if (entries.length > maxRealms) {
    throw new ValidationError(`Too many realms (${entries.length}). Maximum ${maxRealms} allowed.`);
  }

  const realms = entries.map((entry): RealmEntry => {
    const [realm = "", region] = entry.split(":").map((s) => s.trim().toLowerCase());
    if (realm === "") {
      throw new ValidationError(`Invalid realm entry: "${entry}"`);
    }
    if (region === undefined) return { realm: normalizeRealm(realm) };
    if (!isRegion(region)) {
      throw new ValidationError(`Unsupported region "${region}" in "${entry}"`);
    }
    return { region, realm: normalizeRealm(realm) };
  });

  return { preset: "custom", realms };
}

/**
 * Multi-realm ingestion under the resource budget.
 *
 * Parameter and throttle checks run before any upstream call. Realms are
 * processed one at a time; elapsed time and the total item count are checked
 * between realms, and a breach ends the run with a truncated summary.
 */
export class BulkUpdater {
  private readonly source: MarketDataSource;
  private readonly store: HistoricalStore;
  private readonly sink: PriceSink | undefined;
  private readonly budget: ResourceBudget;
  private readonly now: () => number;
  private readonly hooks: InterceptorHooks;
  private last: number | null;
  private running = false;

  constructor(deps: BulkUpdaterDeps) {
    this.source = deps.source;
    this.store = deps.store;
    this.sink = deps.sink;
    this.budget = deps.budget ?? RESOURCE_LIMITS;
    this.now = deps.now ?? (() => Date.now());
    this.hooks = deps.hooks ?? loggingHooks(log);
    this.last = deps.lastRunAt ?? null;
  }

  get lastRunAt(): number | null {
    return this.last;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Seconds until another run is allowed; 0 when it is allowed now. */
  secondsUntilAllowed(): number {
    if (this.last === null) return 0;
    const waitMs = this.budget.minSecondsBetweenUpdates * 1000 - (this.now() - this.last);
    return waitMs > 0 ? Math.ceil(waitMs / 1000) : 0;
  }

  async run(options: BulkUpdateOptions = {}): Promise<UpdateSummary> {
    if (this.running) {
      throw new RateLimitedError(this.budget.minSecondsBetweenUpdates);
    }
    const wait = this.secondsUntilAllowed();
    if (wait > 0) {
      throw new RateLimitedError(wait);
    }

    if (options.includeAllItems && options.realms?.trim().toLowerCase() === "all-us") {
      throw new ValidationError("includeAllItems cannot be combined with realms=all-us");
    }

    if (options.topItems !== undefined && !Number.isFinite(options.topItems)) {
      throw new ValidationError(`Invalid topItems: ${options.topItems}`);
    }

    const selection = parseRealmSpec(options.realms, this.budget.maxRealmsPerRequest);
    const topItems = clamp(
      Math.floor(options.topItems ?? DEFAULT_TOP_ITEMS),
      MIN_TOP_ITEMS,
      this.budget.maxItemsPerRealm,
    );

    this.running = true;
    return intercept(
      "bulk-update",
      () => this.execute(selection, topItems, options.includeAllItems ?? false),
      this.hooks,
    ).finally(() => {
      this.running = false;
      this.last = this.now();
    });
  }

  private async execute(
    selection: RealmSelection,
    topItems: number,
    includeAllItems: boolean,
  ): Promise<UpdateSummary> {
    if (this.store.isOverBudget()) {
      this.store.enforceBudget();
    }

    const start = this.now();
    const outcomes: RealmOutcome[] = [];
    const errors: string[] = [];
    let itemsTracked = 0;
    let truncated: TruncationReason | null = null;

    log.info("Bulk update started", {
      preset: selection.preset,
      realms: selection.realms.length,
      topItems,
      includeAllItems,
    });

    for (const { region, realm } of selection.realms) {
      const elapsedSeconds = (this.now() - start) / 1000;
      if (elapsedSeconds > this.budget.maxExecutionSeconds) {
        truncated = "timeout";
        log.warn("Execution budget exhausted", { elapsedSeconds, processed: outcomes.length });
        break;
      }
      if (itemsTracked >= this.budget.maxTotalItems) {
        truncated = "item-limit";
        log.warn("Total item limit reached", { itemsTracked });
        break;
      }

      const remaining = this.budget.maxTotalItems - itemsTracked;
      const limit = includeAllItems ? remaining : Math.min(topItems, remaining);

      try {
        const updated = await this.updateRealm(realm, region, limit);
        itemsTracked += updated.itemsUpdated;
        outcomes.push({ region: updated.region, realm, status: "ok", itemsUpdated: updated.itemsUpdated });
      } catch (err) {
        const message = errorMessage(err).slice(0, ERROR_SNIPPET_LENGTH);
        log.error("Realm update failed", { region: region ?? "auto", realm, error: message });
        outcomes.push({ region: region ?? null, realm, status: "error", error: message });
        errors.push(`${realm}: ${message}`);
      }
    }

    const realmsUpdated = outcomes.filter((o) => o.status === "ok").length;
    const durationSeconds = (this.now() - start) / 1000;

    await this.recordSnapshot({
      successCount: realmsUpdated,
      itemsTracked,
      durationSeconds,
      success: realmsUpdated > 0,
      errorMessage: errors[0] ?? null,
    });

    log.info("Bulk update complete", { realmsUpdated, itemsTracked, durationSeconds, truncated });

    return {
      realms: outcomes,
      realmsRequested: selection.realms.length,
      realmsUpdated,
      itemsTracked,
      durationSeconds,
      truncated,
      errors,
      trackingMode: includeAllItems ? "all-items" : "top-items",
      topItems,
    };
  }

  private async updateRealm(
    realm: string,
    requested: Region | undefined,
    limit: number,
  ): Promise<{ region: Region; itemsUpdated: number }> {
    const { connectedRealmId, region } = await this.source.getConnectedRealm(realm, requested);
    const listings = await this.source.getAuctions(connectedRealmId, region);

    const aggregates = aggregateAuctions(listings);
    const picked = topByVolume(aggregates, limit);
    if (aggregates.size > limit) {
      log.debug("Limiting tracked items", { realm, available: aggregates.size, limit });
    }

    const timestamp = this.now();
    const points: PricePoint[] = picked.map((a) => {
      this.store.record(HistoricalStore.key(region, realm, a.itemId), a.avgPrice, a.totalQuantity, timestamp);
      return { region, realm, itemId: a.itemId, price: a.avgPrice, quantity: a.totalQuantity };
    });

    if (this.sink && points.length > 0) {
      const stored = await this.sink.storePricePoints(points);
      log.info("Stored price points", { region, realm, stored });
    }
    return { region, itemsUpdated: points.length };
  }

  private async recordSnapshot(record: SnapshotRecord): Promise<void> {
    if (!this.sink) return;
    try {
      await this.sink.recordSnapshot(record);
    } catch (err) {
      log.error("Failed to record snapshot", { error: errorMessage(err) });
    }
  }
}
