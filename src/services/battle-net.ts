import { z } from "zod/v4";
import { detectRealmRegion, normalizeRealm, type Region } from "../config/regions.js";
import { ServerError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import type { ConnectedRealm, ItemInfo, Listing } from "../utils/types.js";
import type { RequestExecutor } from "./request-executor.js";

const log = createLogger("battle-net");

const RealmResponse = z.object({
  id: z.number().optional(),
  name: z.string().optional(),
  connected_realm: z.object({ href: z.string() }),
});

const AuctionsResponse = z.object({
  auctions: z
    .array(
      z.object({
        item: z.object({ id: z.number().int() }),
        buyout: z.number().optional(),
        unit_price: z.number().optional(),
        quantity: z.number().int(),
      }),
    )
    .default([]),
});

const Named = z.object({ name: z.string() });

// Names are plain strings when a locale is requested, otherwise keyed by locale
const ItemResponse = z.object({
  id: z.number().int(),
  name: z.union([z.string(), z.record(z.string(), z.string())]),
  quality: Named.optional(),
  item_class: Named.optional(),
  item_subclass: Named.optional(),
  level: z.number().optional(),
  required_level: z.number().optional(),
  sell_price: z.number().optional(),
});

const TokenIndexResponse = z.object({
  price: z.number(),
  last_updated_timestamp: z.number().optional(),
});

/** What the ingestion and analysis layers need from the upstream provider. */
export interface MarketDataSource {
  getConnectedRealm(realm: string, region?: Region): Promise<ConnectedRealm>;
  getAuctions(connectedRealmId: number, region: Region): Promise<Listing[]>;
  getTokenPrice(region: Region): Promise<number>;
  getItem(itemId: number, region: Region): Promise<ItemInfo>;
}

/** `https://us.api.blizzard.com/data/wow/connected-realm/1171?namespace=…` → 1171 */
export function parseConnectedRealmId(href: string): number | null {
  const last = href.split("?")[0]?.split("/").pop() ?? "";
  const id = Number(last);
  return last !== "" && Number.isInteger(id) && id > 0 ? id : null;
}

export class BattleNetClient implements MarketDataSource {
  constructor(private readonly executor: RequestExecutor) {}

  async getConnectedRealm(realm: string, region?: Region): Promise<ConnectedRealm> {
    const slug = normalizeRealm(realm);
    const path = `/data/wow/realm/${encodeURIComponent(slug)}`;
    const resolved = region ?? detectRealmRegion(slug);

    log.debug("Resolving connected realm", { realm: slug, region: resolved ?? "auto" });
    const { data, region: served } = await this.executor.executeWithRegionFallback({
      path,
      region: resolved,
      schema: RealmResponse,
    });

    const connectedRealmId = parseConnectedRealmId(data.connected_realm.href);
    if (connectedRealmId === null) {
      throw new ServerError(200, `Malformed connected realm href: ${data.connected_realm.href}`);
    }
    return { connectedRealmId, name: data.name ?? null, region: served };
  }

  async getAuctions(connectedRealmId: number, region: Region): Promise<Listing[]> {
    const data = await this.executor.execute({
      path: `/data/wow/connected-realm/${connectedRealmId}/auctions`,
      region,
      schema: AuctionsResponse,
    });

    // Commodities carry unit_price instead of buyout
    const listings = data.auctions.map((a) => ({
      itemId: a.item.id,
      buyout: a.buyout ?? (a.unit_price !== undefined ? a.unit_price * a.quantity : 0),
      quantity: a.quantity,
    }));

    log.info("Fetched auctions", { connectedRealmId, region, listings: listings.length });
    return listings;
  }

  async getItem(itemId: number, region: Region): Promise<ItemInfo> {
    const data = await this.executor.execute({
      path: `/data/wow/item/${itemId}`,
      region,
      schema: ItemResponse,
    });

    return {
      itemId: data.id,
      name: typeof data.name === "string" ? data.name : (data.name["en_US"] ?? "Unknown Item"),
      quality: data.quality?.name ?? null,
      itemClass: data.item_class?.name ?? null,
      itemSubclass: data.item_subclass?.name ?? null,
      level: data.level ?? 0,
      requiredLevel: data.required_level ?? 0,
      sellPrice: data.sell_price ?? 0,
    };
  }

  async getTokenPrice(region: Region): Promise<number> {
    const data = await this.executor.execute({
      path: "/data/wow/token/index",
      region,
      schema: TokenIndexResponse,
    });
    return data.price;
  }
}
