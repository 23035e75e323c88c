import type Database from "better-sqlite3";
import { computeTrends } from "../analytics/market.js";
import type { Region } from "../config/regions.js";
import { normalizeRealm } from "../config/regions.js";
import { isoTimeAgo } from "../utils/datetime.js";
import type { DataPoint, PricePoint, SnapshotRecord, TrendsResult } from "../utils/types.js";

// ── Price points ───────────────────────────────────

export function storePricePoints(
  db: Database.Database,
  points: readonly PricePoint[],
  recordedAt: string = new Date().toISOString(),
): number {
  const insert = db.prepare(
    `INSERT INTO price_points (region, realm, item_id, price, quantity, recorded_at)
     VALUES (?, ?, ?, ?, ?, ?)`,
  );

  const insertAll = db.transaction((rows: readonly PricePoint[]) => {
    let stored = 0;
    for (const p of rows) {
      stored += insert.run(p.region, normalizeRealm(p.realm), p.itemId, p.price, p.quantity, recordedAt).changes;
    }
    return stored;
  });

  return insertAll(points);
}

interface PricePointRow {
  price: number;
  quantity: number;
  recorded_at: string;
}

/** Same shape as the in-memory trends, computed over the stored rows of one series. */
export function getPriceTrends(
  db: Database.Database,
  region: Region,
  realm: string,
  itemId: number,
  hours: number,
  now: number = Date.now(),
): TrendsResult {
  const slug = normalizeRealm(realm);
  const rows = db
    .prepare<[string, string, number, string, string], PricePointRow>(
      `SELECT price, quantity, recorded_at FROM price_points
       WHERE region = ? AND realm = ? AND item_id = ? AND recorded_at >= ? AND recorded_at <= ?
       ORDER BY recorded_at ASC, id ASC`,
    )
    .all(region, slug, itemId, isoTimeAgo(hours, now), new Date(now).toISOString());

  if (rows.length === 0) {
    const seen = db
      .prepare<[string, string, number], { found: number }>(
        "SELECT 1 as found FROM price_points WHERE region = ? AND realm = ? AND item_id = ? LIMIT 1",
      )
      .get(region, slug, itemId);
    return { status: "insufficient", reason: seen ? "no-points-in-window" : "no-history" };
  }

  const points: DataPoint[] = rows.map((r) => ({
    timestamp: Date.parse(r.recorded_at),
    price: r.price,
    quantity: r.quantity,
  }));
  return computeTrends(points, hours);
}

// ── Market snapshots ───────────────────────────────

export function recordSnapshot(
  db: Database.Database,
  record: SnapshotRecord,
  createdAt: string = new Date().toISOString(),
): void {
  db.prepare(
    `INSERT INTO market_snapshots
       (success_count, items_tracked, duration_seconds, success, error_message, created_at)
     VALUES (?, ?, ?, ?, ?, ?)`,
  ).run(
    record.successCount,
    record.itemsTracked,
    record.durationSeconds,
    record.success ? 1 : 0,
    record.errorMessage,
    createdAt,
  );
}

interface SnapshotRow {
  id: number;
  success_count: number;
  items_tracked: number;
  duration_seconds: number;
  success: number;
  error_message: string | null;
  created_at: string;
}

export interface StoredSnapshot extends SnapshotRecord {
  id: number;
  createdAt: string;
}

export function getSnapshotHistory(
  db: Database.Database,
  hours: number,
  now: number = Date.now(),
): StoredSnapshot[] {
  return db
    .prepare<[string], SnapshotRow>(
      "SELECT * FROM market_snapshots WHERE created_at >= ? ORDER BY created_at DESC, id DESC",
    )
    .all(isoTimeAgo(hours, now))
    .map((r) => ({
      id: r.id,
      successCount: r.success_count,
      itemsTracked: r.items_tracked,
      durationSeconds: r.duration_seconds,
      success: r.success === 1,
      errorMessage: r.error_message,
      createdAt: r.created_at,
    }));
}

/** Epoch ms of the most recent snapshot, or null when none was recorded. */
export function getLatestSnapshotTime(db: Database.Database): number | null {
  const row = db
    .prepare<[], { created_at: string | null }>("SELECT MAX(created_at) as created_at FROM market_snapshots")
    .get();
  return row?.created_at ? Date.parse(row.created_at) : null;
}

// ── System Meta ────────────────────────────────────

export function getMeta(db: Database.Database, key: string): { value: string } | undefined {
  return db.prepare<[string], { value: string }>("SELECT value FROM system_meta WHERE key = ?").get(key);
}

export function setMeta(db: Database.Database, key: string, value: string): void {
  db.prepare(
    "INSERT INTO system_meta (key, value, updated_at) VALUES (?, ?, datetime('now')) ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at",
  ).run(key, value);
}

// ── Stats ──────────────────────────────────────────

export interface TableCounts {
  pricePoints: number;
  series: number;
  snapshots: number;
  oldestPoint: string | null;
  newestPoint: string | null;
}

export function getTableCounts(db: Database.Database): TableCounts {
  const points = db
    .prepare<[], { cnt: number; oldest: string | null; newest: string | null }>(
      "SELECT COUNT(*) as cnt, MIN(recorded_at) as oldest, MAX(recorded_at) as newest FROM price_points",
    )
    .get();
  const series = db
    .prepare<[], { cnt: number }>(
      "SELECT COUNT(*) as cnt FROM (SELECT DISTINCT region, realm, item_id FROM price_points)",
    )
    .get();
  const snapshots = db.prepare<[], { cnt: number }>("SELECT COUNT(*) as cnt FROM market_snapshots").get();

  return {
    pricePoints: points?.cnt ?? 0,
    series: series?.cnt ?? 0,
    snapshots: snapshots?.cnt ?? 0,
    oldestPoint: points?.oldest ?? null,
    newestPoint: points?.newest ?? null,
  };
}
