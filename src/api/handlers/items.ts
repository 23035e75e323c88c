import type { Context } from "hono";
import { ValidationError } from "../../utils/errors.js";
import type { AppEnv } from "../middleware.js";
import { parseItemId, parseItemIds, parseRegion } from "../params.js";

export async function getItem(c: Context<AppEnv>) {
  const { analysis } = c.get("ctx");
  const region = parseRegion(c.req.param("region") ?? "");
  const itemId = parseItemId(c.req.param("itemId") ?? "");

  return c.json({ region, data: await analysis.getItem(region, itemId) });
}

export async function lookupItems(c: Context<AppEnv>) {
  const { analysis } = c.get("ctx");
  const region = parseRegion(c.req.param("region") ?? "");
  const ids = parseItemIds(c.req.query("ids"));
  if (ids.length === 0) {
    throw new ValidationError("Query parameter ids must list at least one item ID");
  }

  return c.json({ data: await analysis.lookupItems(region, ids) });
}
