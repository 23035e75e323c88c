import { DEFAULT_HISTORY_HOURS, MAX_HISTORY_HOURS } from "../config/constants.js";
import { isRegion, normalizeRealm } from "../config/regions.js";
import { getPriceTrends } from "../db/queries.js";
import { ValidationError } from "../utils/errors.js";
import { openMigratedDatabase, parsePositiveInt } from "./runtime.js";

interface HistoryOptions {
  db: string;
  region: string;
  hours?: string;
}

export function historyCommand(realm: string, itemId: string, opts: HistoryOptions): void {
  const region = opts.region.toLowerCase();
  if (!isRegion(region)) {
    throw new ValidationError(`Invalid region "${opts.region}"`);
  }
  const id = Number(itemId);
  if (!Number.isInteger(id) || id <= 0) {
    throw new ValidationError(`Invalid item ID "${itemId}"`);
  }
  const hours = Math.min(MAX_HISTORY_HOURS, parsePositiveInt(opts.hours, DEFAULT_HISTORY_HOURS));

  const db = openMigratedDatabase(opts.db);
  try {
    const trends = getPriceTrends(db, region, normalizeRealm(realm), id, hours);
    console.log(JSON.stringify({ region, realm: normalizeRealm(realm), itemId: id, ...trends }, null, 2));
  } finally {
    db.close();
  }
}
