import { runUpdate, type AppContext } from "../context.js";
import type { BulkUpdateOptions } from "../processors/bulk-update.js";
import { abortableSleep } from "../utils/datetime.js";
import { errorMessage } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import type { UpdateSummary } from "../utils/types.js";
import { isMaintenanceDue, runMaintenance, type MaintenanceResult } from "./maintenance.js";

const log = createLogger("update-loop");

export interface CycleResult {
  summary: UpdateSummary;
  maintenance: MaintenanceResult | null;
}

/** One bulk update, then daily maintenance when it is due. */
export async function runUpdateCycle(
  ctx: AppContext,
  options: BulkUpdateOptions,
  now: () => number = () => Date.now(),
): Promise<CycleResult> {
  const summary = await runUpdate(ctx, options);

  let maintenance: MaintenanceResult | null = null;
  if (isMaintenanceDue(ctx.db, now())) {
    maintenance = runMaintenance(ctx.db, now());
  }

  // The in-memory store is capped separately from the database
  if (ctx.store.isOverBudget()) {
    ctx.store.enforceBudget();
  }
  ctx.analysis.sweepCaches();

  return { summary, maintenance };
}

export interface LoopTiming {
  now?: () => number;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

/**
 * Runs cycles every `intervalMs` (measured start to start) until the signal
 * aborts. The next cycle never starts inside the updater's throttle window.
 * A failed cycle is logged and retried next interval.
 */
export async function runUpdateLoop(
  ctx: AppContext,
  options: BulkUpdateOptions,
  intervalMs: number,
  signal: AbortSignal,
  timing: LoopTiming = {},
): Promise<number> {
  const now = timing.now ?? (() => Date.now());
  const pause = timing.sleep ?? abortableSleep;

  let cycle = 0;
  while (!signal.aborted) {
    cycle++;
    const cycleStart = now();
    log.info("Update cycle start", { cycle });

    try {
      const { summary } = await runUpdateCycle(ctx, options, now);
      log.info("Update cycle complete", {
        cycle,
        realmsUpdated: summary.realmsUpdated,
        itemsTracked: summary.itemsTracked,
        truncated: summary.truncated,
      });
    } catch (err) {
      log.error("Cycle failed (will retry next interval)", { cycle, error: errorMessage(err) });
    }

    const sleepMs = Math.max(0, intervalMs - (now() - cycleStart), ctx.updater.secondsUntilAllowed() * 1000);
    if (!signal.aborted && sleepMs > 0) {
      log.debug("Sleeping until next cycle", { sleepMs, cycle });
      await pause(sleepMs, signal);
    }
  }

  log.info("Update loop stopped", { cycles: cycle });
  return cycle;
}
