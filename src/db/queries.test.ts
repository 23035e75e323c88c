import { describe, it, expect, beforeEach } from "vitest";
import Database from "better-sqlite3";
import { runMigrations } from "./database.js";
import {
  getLatestSnapshotTime,
  getMeta,
  getPriceTrends,
  getSnapshotHistory,
  getTableCounts,
  recordSnapshot,
  setMeta,
  storePricePoints,
} from "./queries.js";
import { isMaintenanceDue, runMaintenance } from "../cron/maintenance.js";

const NOW = Date.parse("2025-03-01T12:00:00.000Z");
const HOUR = 3_600_000;

function iso(msAgo: number): string {
  return new Date(NOW - msAgo).toISOString();
}

function createTestDb(): Database.Database {
  const db = new Database(":memory:");
  runMigrations(db);
  return db;
}

describe("runMigrations", () => {
  it("applies each migration once", () => {
    const db = new Database(":memory:");

    expect(runMigrations(db)).toBe(1);
    expect(runMigrations(db)).toBe(0);
  });
});

describe("price points", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
  });

  it("stores a batch and returns the count", () => {
    const stored = storePricePoints(
      db,
      [
        { region: "us", realm: "Stormrage", itemId: 1, price: 100, quantity: 5 },
        { region: "us", realm: "Stormrage", itemId: 2, price: 250.5, quantity: 1 },
      ],
      iso(0),
    );

    expect(stored).toBe(2);
    expect(getTableCounts(db)).toEqual({
      pricePoints: 2,
      series: 2,
      snapshots: 0,
      oldestPoint: iso(0),
      newestPoint: iso(0),
    });
  });

  it("computes trends over the requested window", () => {
    const prices = [10, 12, 11, 15, 9];
    prices.forEach((price, i) => {
      storePricePoints(db, [{ region: "us", realm: "stormrage", itemId: 7, price, quantity: 2 }], iso((5 - i) * HOUR));
    });
    // Outside a 6 hour window
    storePricePoints(db, [{ region: "us", realm: "stormrage", itemId: 7, price: 1000, quantity: 2 }], iso(10 * HOUR));

    const result = getPriceTrends(db, "us", "STORMRAGE", 7, 6, NOW);

    expect(result).toMatchObject({
      status: "ok",
      minPrice: 9,
      maxPrice: 15,
      currentPrice: 9,
      avgQuantity: 2,
      dataPoints: 5,
      windowHours: 6,
    });
    expect(result.status === "ok" && result.avgPrice).toBeCloseTo(11.4, 6);
  });

  it("distinguishes an unknown series from an empty window", () => {
    storePricePoints(db, [{ region: "eu", realm: "draenor", itemId: 3, price: 50, quantity: 1 }], iso(48 * HOUR));

    expect(getPriceTrends(db, "eu", "draenor", 3, 24, NOW)).toEqual({
      status: "insufficient",
      reason: "no-points-in-window",
    });
    expect(getPriceTrends(db, "eu", "draenor", 4, 24, NOW)).toEqual({
      status: "insufficient",
      reason: "no-history",
    });
  });
});

describe("market snapshots", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
  });

  it("records and lists snapshots newest first", () => {
    recordSnapshot(
      db,
      { successCount: 3, itemsTracked: 300, durationSeconds: 12.5, success: true, errorMessage: null },
      iso(2 * HOUR),
    );
    recordSnapshot(
      db,
      { successCount: 0, itemsTracked: 0, durationSeconds: 1, success: false, errorMessage: "stormrage: boom" },
      iso(1 * HOUR),
    );
    recordSnapshot(
      db,
      { successCount: 1, itemsTracked: 10, durationSeconds: 1, success: true, errorMessage: null },
      iso(30 * HOUR),
    );

    const history = getSnapshotHistory(db, 24, NOW);

    expect(history.map((s) => [s.successCount, s.success, s.errorMessage])).toEqual([
      [0, false, "stormrage: boom"],
      [3, true, null],
    ]);
    expect(history[1]?.durationSeconds).toBe(12.5);
    expect(getLatestSnapshotTime(db)).toBe(NOW - HOUR);
  });

  it("has no latest snapshot on an empty table", () => {
    expect(getLatestSnapshotTime(db)).toBeNull();
  });
});

describe("system meta", () => {
  it("upserts values", () => {
    const db = createTestDb();

    expect(getMeta(db, "k")).toBeUndefined();
    setMeta(db, "k", "one");
    setMeta(db, "k", "two");
    expect(getMeta(db, "k")).toEqual({ value: "two" });
  });
});

describe("runMaintenance", () => {
  it("prunes rows past retention and records the run", () => {
    const db = createTestDb();
    storePricePoints(db, [{ region: "us", realm: "a", itemId: 1, price: 1, quantity: 1 }], iso(8 * 24 * HOUR));
    storePricePoints(db, [{ region: "us", realm: "a", itemId: 1, price: 1, quantity: 1 }], iso(HOUR));
    recordSnapshot(
      db,
      { successCount: 1, itemsTracked: 1, durationSeconds: 1, success: true, errorMessage: null },
      iso(31 * 24 * HOUR),
    );

    expect(isMaintenanceDue(db, NOW)).toBe(true);

    const result = runMaintenance(db, NOW);

    expect(result).toEqual({ pricePointsDeleted: 1, snapshotsDeleted: 1, vacuumed: true });
    expect(getTableCounts(db).pricePoints).toBe(1);
    expect(isMaintenanceDue(db, NOW + HOUR)).toBe(false);
    expect(runMaintenance(db, NOW + HOUR).vacuumed).toBe(false);
  });
});
