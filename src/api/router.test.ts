import { describe, it, expect, beforeEach } from "vitest";
import Database from "better-sqlite3";
import { createApp } from "./router.js";
import { createContext } from "../context.js";
import { runMigrations } from "../db/database.js";
import { loadConfig } from "../env.js";
import type { Region } from "../config/regions.js";
import type { MarketDataSource } from "../services/battle-net.js";
import { NotFoundError } from "../utils/errors.js";
import type { ConnectedRealm, ItemInfo, Listing } from "../utils/types.js";

const NOW = 1_700_000_000_000;

const LINEN: ItemInfo = {
  itemId: 5,
  name: "Linen Cloth",
  quality: "Common",
  itemClass: "Tradeskill",
  itemSubclass: "Cloth",
  level: 1,
  requiredLevel: 0,
  sellPrice: 13,
};

class StubSource implements MarketDataSource {
  async getConnectedRealm(realm: string): Promise<ConnectedRealm> {
    if (realm === "nowhere") throw new NotFoundError(`/data/wow/realm/${realm}`);
    return { connectedRealmId: 3678, name: "Stormrage", region: "us" };
  }

  async getAuctions(): Promise<Listing[]> {
    return [
      { itemId: 5, buyout: 1000, quantity: 2 },
      { itemId: 6, buyout: 300, quantity: 3 },
    ];
  }

  async getTokenPrice(region: Region): Promise<number> {
    return region === "us" ? 2_500_000 : 3_000_000;
  }

  async getItem(itemId: number): Promise<ItemInfo> {
    if (itemId !== 5) throw new NotFoundError(`/data/wow/item/${itemId}`);
    return LINEN;
  }
}

function post(body: string) {
  return { method: "POST", body, headers: { "Content-Type": "application/json" } };
}

describe("HTTP API", () => {
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    const db = new Database(":memory:");
    runMigrations(db);
    const ctx = createContext(
      loadConfig({}),
      db,
      { source: new StubSource(), limiter: null, tokens: null, requests: null },
      () => NOW,
    );
    app = createApp(ctx);
  });

  it("rejects paths outside the API prefix", async () => {
    const res = await app.request("/status");

    expect(res.status).toBe(404);
    expect(await res.text()).toBe("Not Found");
  });

  it("reports status before any update", async () => {
    const res = await app.request("/api/v1/status");
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      status: "ok",
      region: "us",
      rateLimiter: null,
      tokenExchanges: null,
      upstreamRequests: null,
      lastUpdate: null,
      updateRunning: false,
      nextUpdateAllowedIn: 0,
      database: { pricePoints: 0, snapshots: 0 },
    });
  });

  it("maps validation errors to 400", async () => {
    const res = await app.request("/api/v1/history/xx/stormrage/5");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Invalid region "xx". Allowed: us, eu, kr, tw',
      code: "VALIDATION",
    });
  });

  it("rejects a non-numeric item id", async () => {
    const res = await app.request("/api/v1/history/us/stormrage/abc");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid item ID", code: "VALIDATION" });
  });

  it("rejects an unknown analysis kind", async () => {
    const res = await app.request("/api/v1/analysis/us/stormrage?kind=bogus");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Invalid analysis kind "bogus". Allowed: volatility, trends, opportunities',
      code: "VALIDATION",
    });
  });

  it("returns insufficient data for an unseen item", async () => {
    const res = await app.request("/api/v1/history/us/stormrage/5");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      region: "us",
      realm: "stormrage",
      itemId: 5,
      hours: 24,
      data: { status: "insufficient", reason: "no-history" },
    });
  });

  it("clamps the history window", async () => {
    const res = await app.request("/api/v1/history/us/stormrage/5?hours=9999");

    expect(await res.json()).toMatchObject({ hours: 168 });
  });

  it("maps upstream not-found to 404", async () => {
    const res = await app.request("/api/v1/opportunities/us/nowhere");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: "Resource not found: /data/wow/realm/nowhere",
      code: "NOT_FOUND",
    });
  });

  it("serves the token price in copper and gold", async () => {
    const res = await app.request("/api/v1/token/us");

    expect(await res.json()).toEqual({ region: "us", price: 2_500_000, gold: 250 });
  });

  it("runs an update and exposes its results", async () => {
    const res = await app.request("/api/v1/update", post(JSON.stringify({ realms: "stormrage", topItems: 10 })));

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: { realmsRequested: 1, realmsUpdated: 1, itemsTracked: 2, topItems: 10, truncated: null },
    });

    const history = await app.request("/api/v1/history/us/stormrage/5");
    expect(await history.json()).toMatchObject({
      data: { status: "ok", avgPrice: 500, currentPrice: 500, avgQuantity: 2, dataPoints: 1 },
    });

    const snapshots = await app.request("/api/v1/snapshots");
    expect(await snapshots.json()).toMatchObject({
      hours: 24,
      data: [{ successCount: 1, itemsTracked: 2, success: true, errorMessage: null }],
    });

    const status = await app.request("/api/v1/status");
    expect(await status.json()).toMatchObject({
      lastUpdate: new Date(NOW).toISOString(),
      nextUpdateAllowedIn: 60,
      database: { pricePoints: 2, snapshots: 1 },
    });
  });

  it("throttles a second update with Retry-After", async () => {
    await app.request("/api/v1/update", post("{}"));
    const res = await app.request("/api/v1/update", post("{}"));

    expect(res.status).toBe(429);
    expect(res.headers.get("Retry-After")).toBe("60");
    expect(await res.json()).toEqual({
      error: "Rate limited. Retry after 60s",
      code: "RATE_LIMITED",
      retryAfterSeconds: 60,
    });
  });

  it("rejects malformed update bodies", async () => {
    const notJson = await app.request("/api/v1/update", post("{bad"));
    expect(notJson.status).toBe(400);
    expect(await notJson.json()).toEqual({ error: "Request body must be JSON", code: "VALIDATION" });

    const wrongType = await app.request("/api/v1/update", post(JSON.stringify({ topItems: "ten" })));
    expect(wrongType.status).toBe(400);
    expect(await wrongType.json()).toEqual({ error: "Invalid update request: topItems", code: "VALIDATION" });
  });

  it("looks up one item", async () => {
    const res = await app.request("/api/v1/items/us/5");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ region: "us", data: LINEN });
  });

  it("looks up several items and lists the ones not found", async () => {
    const res = await app.request("/api/v1/items/eu?ids=5,77,5");

    expect(await res.json()).toEqual({
      data: { region: "eu", requested: 2, items: [LINEN], failed: [77] },
    });
  });

  it("requires ids for a multi-item lookup", async () => {
    const res = await app.request("/api/v1/items/us?ids=abc");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Query parameter ids must list at least one item ID",
      code: "VALIDATION",
    });
  });

  it("maps an unknown single item to 404", async () => {
    const res = await app.request("/api/v1/items/us/77");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Resource not found: /data/wow/item/77", code: "NOT_FOUND" });
  });

  it("reports and sweeps cache entries", async () => {
    await app.request("/api/v1/token/us");

    const stats = await app.request("/api/v1/cache");
    expect(await stats.json()).toMatchObject({ data: { tokenPrices: { total: 1, valid: 1, expired: 0 } } });

    const swept = await app.request("/api/v1/cache", { method: "DELETE" });
    expect(await swept.json()).toEqual({ removed: 0 });
  });
});
