import { DEFAULT_HISTORY_HOURS } from "../config/constants.js";
import { getSnapshotHistory, getTableCounts } from "../db/queries.js";
import { openMigratedDatabase, parsePositiveInt } from "./runtime.js";

interface SnapshotsOptions {
  db: string;
  hours?: string;
}

export function snapshotsCommand(opts: SnapshotsOptions): void {
  const hours = parsePositiveInt(opts.hours, DEFAULT_HISTORY_HOURS);
  const db = openMigratedDatabase(opts.db);

  try {
    const counts = getTableCounts(db);
    const snapshots = getSnapshotHistory(db, hours);

    console.log(`\n=== Update snapshots (last ${hours}h) ===`);
    console.log(`Price points: ${counts.pricePoints.toLocaleString()} across ${counts.series.toLocaleString()} series`);
    console.log(`Oldest point: ${counts.oldestPoint ?? "N/A"}`);
    console.log(`Newest point: ${counts.newestPoint ?? "N/A"}\n`);

    if (snapshots.length === 0) {
      console.log("  No snapshots recorded");
    }
    for (const s of snapshots) {
      const status = s.success ? "ok  " : "FAIL";
      const detail = s.errorMessage ? `  ${s.errorMessage}` : "";
      console.log(
        `  ${s.createdAt}  ${status}  realms=${s.successCount}  items=${s.itemsTracked}  ${s.durationSeconds.toFixed(1)}s${detail}`,
      );
    }
    console.log("");
  } finally {
    db.close();
  }
}
