import type { Context } from "hono";
import type { AppEnv } from "../middleware.js";
import { parseRealm, parseRegion } from "../params.js";

export async function getOpportunities(c: Context<AppEnv>) {
  const { analysis } = c.get("ctx");
  const region = parseRegion(c.req.param("region") ?? "");
  const realm = parseRealm(c.req.param("realm") ?? "");

  return c.json({ data: await analysis.analyzeMarketOpportunities(region, realm) });
}
