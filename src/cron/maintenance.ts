import type Database from "better-sqlite3";
import { createLogger } from "../utils/logger.js";
import { getMeta, setMeta } from "../db/queries.js";
import { HOUR_MS, isoTimeAgo } from "../utils/datetime.js";
import { PRICE_POINT_RETENTION_DAYS, SNAPSHOT_RETENTION_DAYS } from "../config/constants.js";

const log = createLogger("maintenance");

const MAINTENANCE_INTERVAL_MS = 24 * HOUR_MS;
const VACUUM_INTERVAL_DAYS = 7;

export interface MaintenanceResult {
  pricePointsDeleted: number;
  snapshotsDeleted: number;
  vacuumed: boolean;
}

/** True when maintenance has never run or last ran over a day ago. */
export function isMaintenanceDue(db: Database.Database, now: number = Date.now()): boolean {
  const last = getMeta(db, "last_maintenance");
  return !last || now - Date.parse(last.value) >= MAINTENANCE_INTERVAL_MS;
}

export function runMaintenance(db: Database.Database, now: number = Date.now()): MaintenanceResult {
  log.info("Starting daily maintenance");
  const start = Date.now();

  // recorded_at and created_at use ISO 8601 format (from toISOString())
  const pricePoints = db
    .prepare("DELETE FROM price_points WHERE recorded_at < ?")
    .run(isoTimeAgo(PRICE_POINT_RETENTION_DAYS * 24, now));

  log.info("Deleted old price_points", { rowsDeleted: pricePoints.changes });

  const snapshots = db
    .prepare("DELETE FROM market_snapshots WHERE created_at < ?")
    .run(isoTimeAgo(SNAPSHOT_RETENTION_DAYS * 24, now));

  log.info("Deleted old market_snapshots", { rowsDeleted: snapshots.changes });

  // Weekly VACUUM to reclaim freed pages
  const lastVacuum = getMeta(db, "last_vacuum");
  const daysSinceVacuum = lastVacuum ? (now - Date.parse(lastVacuum.value)) / (24 * HOUR_MS) : Infinity;

  let vacuumed = false;
  if (daysSinceVacuum >= VACUUM_INTERVAL_DAYS) {
    log.info("Running weekly VACUUM");
    db.exec("VACUUM");
    setMeta(db, "last_vacuum", new Date(now).toISOString());
    vacuumed = true;
  }

  setMeta(db, "last_maintenance", new Date(now).toISOString());

  log.info("Maintenance completed", { elapsedMs: Date.now() - start });
  return {
    pricePointsDeleted: pricePoints.changes,
    snapshotsDeleted: snapshots.changes,
    vacuumed,
  };
}
