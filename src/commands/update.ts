import { dirname, resolve } from "node:path";
import { DAEMON_DEFAULT_INTERVAL_MINUTES } from "../config/constants.js";
import { runUpdateCycle, runUpdateLoop } from "../cron/update-loop.js";
import type { BulkUpdateOptions } from "../processors/bulk-update.js";
import { acquireLock, releaseLock } from "../utils/lock.js";
import { createLogger } from "../utils/logger.js";
import { abortOnShutdownSignals, createRuntime, parsePositiveInt, type CommonOptions } from "./runtime.js";

const log = createLogger("update-cmd");

interface UpdateOptions extends CommonOptions {
  realms?: string;
  topItems?: string;
  allItems?: boolean;
  daemon?: boolean;
  interval?: string;
}

function bulkOptions(opts: UpdateOptions): BulkUpdateOptions {
  return {
    realms: opts.realms,
    topItems: opts.topItems === undefined ? undefined : Number(opts.topItems),
    includeAllItems: opts.allItems ?? false,
  };
}

export async function updateCommand(opts: UpdateOptions): Promise<void> {
  const lockPath = resolve(dirname(resolve(opts.db)), "update.lock");
  if (!acquireLock(lockPath)) {
    log.info("Another update is running, skipping");
    return;
  }

  const ctx = createRuntime(opts);

  try {
    if (!opts.daemon) {
      const { summary, maintenance } = await runUpdateCycle(ctx, bulkOptions(opts));
      console.log(JSON.stringify({ ...summary, maintenance }, null, 2));
      if (summary.realmsUpdated === 0) {
        process.exitCode = 1;
      }
      return;
    }

    const intervalMinutes = parsePositiveInt(opts.interval, DAEMON_DEFAULT_INTERVAL_MINUTES);
    log.info("Starting daemon mode", { intervalMinutes });

    const controller = new AbortController();
    const removeHandlers = abortOnShutdownSignals(controller, log);
    try {
      await runUpdateLoop(ctx, bulkOptions(opts), intervalMinutes * 60_000, controller.signal);
    } finally {
      removeHandlers();
    }
  } finally {
    ctx.db.close();
    releaseLock(lockPath);
  }
}
