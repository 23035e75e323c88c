import { describe, it, expect } from "vitest";
import Database from "better-sqlite3";
import { runUpdateCycle, runUpdateLoop } from "./update-loop.js";
import { createContext, type AppContext } from "../context.js";
import { runMigrations } from "../db/database.js";
import { getMeta, getTableCounts } from "../db/queries.js";
import { loadConfig } from "../env.js";
import type { MarketDataSource } from "../services/battle-net.js";
import { NotFoundError } from "../utils/errors.js";
import type { ConnectedRealm, ItemInfo, Listing } from "../utils/types.js";

class StubSource implements MarketDataSource {
  auctionCalls = 0;

  constructor(private readonly onAuctions: () => void = () => {}) {}

  async getConnectedRealm(realm: string): Promise<ConnectedRealm> {
    return { connectedRealmId: 1, name: realm, region: "us" };
  }

  async getAuctions(): Promise<Listing[]> {
    this.auctionCalls++;
    this.onAuctions();
    return [{ itemId: 1, buyout: 100, quantity: 1 }];
  }

  async getTokenPrice(): Promise<number> {
    return 0;
  }

  async getItem(itemId: number): Promise<ItemInfo> {
    throw new NotFoundError(`/data/wow/item/${itemId}`);
  }
}

function setup(source: StubSource, now: () => number): AppContext {
  const db = new Database(":memory:");
  runMigrations(db);
  return createContext(loadConfig({}), db, { source, limiter: null, tokens: null, requests: null }, now);
}

describe("runUpdateCycle", () => {
  it("runs maintenance once per day", async () => {
    let t = Date.parse("2025-03-01T00:00:00.000Z");
    const now = () => t;
    const ctx = setup(new StubSource(), now);

    const first = await runUpdateCycle(ctx, { realms: "stormrage" }, now);
    expect(first.summary.realmsUpdated).toBe(1);
    expect(first.maintenance).toEqual({ pricePointsDeleted: 0, snapshotsDeleted: 0, vacuumed: true });
    expect(getMeta(ctx.db, "last_maintenance")).toEqual({ value: "2025-03-01T00:00:00.000Z" });

    t += 120_000;
    const second = await runUpdateCycle(ctx, { realms: "stormrage" }, now);
    expect(second.summary.realmsUpdated).toBe(1);
    expect(second.maintenance).toBeNull();
  });
});

describe("runUpdateLoop", () => {
  it("does nothing when already aborted", async () => {
    const source = new StubSource();
    const ctx = setup(source, () => Date.now());
    const controller = new AbortController();
    controller.abort();

    expect(await runUpdateLoop(ctx, {}, 60_000, controller.signal)).toBe(0);
    expect(source.auctionCalls).toBe(0);
  });

  it("finishes the current cycle after an abort", async () => {
    const controller = new AbortController();
    const source = new StubSource(() => controller.abort());
    const ctx = setup(source, () => Date.now());

    expect(await runUpdateLoop(ctx, {}, 60_000, controller.signal)).toBe(1);
    // all five default realms were still processed
    expect(source.auctionCalls).toBe(5);
  });

  it("waits out the update throttle when a cycle runs long", async () => {
    let t = Date.parse("2025-03-01T00:00:00.000Z");
    const now = () => t;
    // 5 default realms at 6 s each: a 30 s cycle against a 60 s interval
    const source = new StubSource(() => {
      t += 6_000;
    });
    const ctx = setup(source, now);
    const controller = new AbortController();
    const sleeps: number[] = [];

    const cycles = await runUpdateLoop(ctx, {}, 60_000, controller.signal, {
      now,
      sleep: async (ms) => {
        sleeps.push(ms);
        t += ms;
        if (sleeps.length === 2) controller.abort();
      },
    });

    expect(cycles).toBe(2);
    expect(sleeps).toEqual([60_000, 60_000]);
    expect(source.auctionCalls).toBe(10);
    expect(getTableCounts(ctx.db)).toMatchObject({ snapshots: 2 });
  });
});
