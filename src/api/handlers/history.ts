import type { Context } from "hono";
import { DEFAULT_HISTORY_HOURS, MAX_HISTORY_HOURS } from "../../config/constants.js";
import type { AppEnv } from "../middleware.js";
import { boundedInt, parseItemId, parseRealm, parseRegion } from "../params.js";

export function getHistory(c: Context<AppEnv>) {
  const { analysis } = c.get("ctx");
  const region = parseRegion(c.req.param("region") ?? "");
  const realm = parseRealm(c.req.param("realm") ?? "");
  const itemId = parseItemId(c.req.param("itemId") ?? "");
  const hours = boundedInt(c.req.query("hours"), DEFAULT_HISTORY_HOURS, 1, MAX_HISTORY_HOURS);

  const trends = analysis.getHistoricalTrends(region, realm, itemId, hours);
  return c.json({ region, realm, itemId, hours, data: trends });
}
