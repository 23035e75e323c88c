import type { Context } from "hono";
import { getSnapshotHistory } from "../../db/queries.js";
import { DEFAULT_HISTORY_HOURS, SNAPSHOT_RETENTION_DAYS } from "../../config/constants.js";
import type { AppEnv } from "../middleware.js";
import { boundedInt } from "../params.js";

export function listSnapshots(c: Context<AppEnv>) {
  const hours = boundedInt(c.req.query("hours"), DEFAULT_HISTORY_HOURS, 1, SNAPSHOT_RETENTION_DAYS * 24);
  const snapshots = getSnapshotHistory(c.get("ctx").db, hours);
  return c.json({ hours, data: snapshots });
}
