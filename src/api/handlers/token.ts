import type { Context } from "hono";
import type { AppEnv } from "../middleware.js";
import { parseRegion } from "../params.js";

export async function getToken(c: Context<AppEnv>) {
  const { analysis } = c.get("ctx");
  const region = parseRegion(c.req.param("region") ?? "");
  const price = await analysis.getTokenPrice(region);

  // Upstream prices are in copper
  return c.json({ region, price, gold: Math.floor(price / 10_000) });
}
