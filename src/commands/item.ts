import { isRegion } from "../config/regions.js";
import { ValidationError } from "../utils/errors.js";
import { createRuntime, type CommonOptions } from "./runtime.js";

interface ItemOptions extends CommonOptions {
  region: string;
}

export async function itemCommand(itemIds: string, opts: ItemOptions): Promise<void> {
  const region = opts.region.toLowerCase();
  if (!isRegion(region)) {
    throw new ValidationError(`Invalid region "${opts.region}"`);
  }
  const ids = itemIds
    .split(",")
    .map((s) => Number(s.trim()))
    .filter((n) => Number.isInteger(n) && n > 0);
  if (ids.length === 0) {
    throw new ValidationError(`No valid item IDs in "${itemIds}"`);
  }

  const ctx = createRuntime(opts);
  try {
    const lookup = await ctx.analysis.lookupItems(region, ids);
    console.log(JSON.stringify(lookup, null, 2));
    if (lookup.items.length === 0) {
      process.exitCode = 1;
    }
  } finally {
    ctx.db.close();
  }
}
