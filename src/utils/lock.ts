import { existsSync, readFileSync, unlinkSync, writeFileSync } from "node:fs";
import { z } from "zod/v4";
import { createLogger } from "./logger.js";

const log = createLogger("lock");

const LockSchema = z.object({
  pid: z.number().int(),
  timestamp: z.string(),
});

type LockData = z.infer<typeof LockSchema>;

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

function readLock(lockPath: string): LockData | null {
  try {
    const parsed = LockSchema.safeParse(JSON.parse(readFileSync(lockPath, "utf-8")));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/**
 * PID file guarding against two update processes writing the same database.
 * A lock left by a dead process, or one that cannot be read, is taken over.
 */
export function acquireLock(lockPath: string): boolean {
  if (existsSync(lockPath)) {
    const held = readLock(lockPath);

    if (held && isProcessAlive(held.pid)) {
      log.warn("Lock held by live process", { pid: held.pid, since: held.timestamp });
      return false;
    }

    if (held) {
      log.warn("Removing stale lock from dead process", { pid: held.pid, since: held.timestamp });
    } else {
      log.warn("Removing unreadable lock file");
    }
    unlinkSync(lockPath);
  }

  const data: LockData = { pid: process.pid, timestamp: new Date().toISOString() };
  writeFileSync(lockPath, JSON.stringify(data), "utf-8");
  return true;
}

export function releaseLock(lockPath: string): void {
  try {
    if (existsSync(lockPath)) {
      unlinkSync(lockPath);
    }
  } catch (err) {
    log.error("Failed to release lock", { error: String(err) });
  }
}
