import type { Region } from "../config/regions.js";

// ── Upstream market data ───────────────────────────

/** One auction listing. `buyout` is the total for the stack, in copper. */
export interface Listing {
  itemId: number;
  buyout: number;
  quantity: number;
}

export interface ConnectedRealm {
  connectedRealmId: number;
  name: string | null;
  /** Region that answered the lookup; auctions for the realm live there too. */
  region: Region;
}

/** Static item metadata. `sellPrice` is the vendor price in copper. */
export interface ItemInfo {
  itemId: number;
  name: string;
  quality: string | null;
  itemClass: string | null;
  itemSubclass: string | null;
  level: number;
  requiredLevel: number;
  sellPrice: number;
}

/** Per-item summary of one auction snapshot. Prices are per unit. */
export interface ItemAggregate {
  itemId: number;
  avgPrice: number;
  minPrice: number;
  maxPrice: number;
  totalQuantity: number;
  listings: number;
}

// ── Price history ──────────────────────────────────

export interface SeriesKey {
  readonly region: Region;
  readonly realm: string;
  readonly itemId: number;
}

export interface DataPoint {
  /** Epoch milliseconds */
  readonly timestamp: number;
  /** Minor currency units (copper) */
  readonly price: number;
  readonly quantity: number;
}

/** Row handed to the durable store. */
export interface PricePoint {
  region: Region;
  realm: string;
  itemId: number;
  price: number;
  quantity: number;
}

// ── Analytics results ──────────────────────────────

export interface PriceTrends {
  status: "ok";
  avgPrice: number;
  minPrice: number;
  maxPrice: number;
  currentPrice: number;
  volatility: number;
  trend: number;
  avgQuantity: number;
  dataPoints: number;
  windowHours: number;
}

export interface InsufficientData {
  status: "insufficient";
  reason: "no-history" | "no-points-in-window" | "too-few-points";
}

export type TrendsResult = PriceTrends | InsufficientData;

// ── Bulk update ────────────────────────────────────

export type RealmOutcome =
  | { region: Region; realm: string; status: "ok"; itemsUpdated: number }
  | { region: Region | null; realm: string; status: "error"; error: string };

export type TruncationReason = "timeout" | "item-limit";

export interface UpdateSummary {
  realms: RealmOutcome[];
  realmsRequested: number;
  realmsUpdated: number;
  itemsTracked: number;
  durationSeconds: number;
  truncated: TruncationReason | null;
  errors: string[];
  trackingMode: "all-items" | "top-items";
  topItems: number;
}

export interface SnapshotRecord {
  successCount: number;
  itemsTracked: number;
  durationSeconds: number;
  success: boolean;
  errorMessage: string | null;
}
