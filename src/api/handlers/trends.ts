import type { Context } from "hono";
import type { AppEnv } from "../middleware.js";
import { parseItemIds, parseRealm, parseRegion } from "../params.js";

export async function getTrends(c: Context<AppEnv>) {
  const { analysis } = c.get("ctx");
  const region = parseRegion(c.req.param("region") ?? "");
  const realm = parseRealm(c.req.param("realm") ?? "");
  const itemIds = parseItemIds(c.req.query("items"));

  return c.json({ data: await analysis.predictMarketTrends(region, realm, itemIds) });
}
