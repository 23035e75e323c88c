import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { createContext, createMarketClient, type AppContext } from "../context.js";
import { openDatabase, runMigrations } from "../db/database.js";
import { loadConfig } from "../env.js";
import { setLogLevel, type Logger } from "../utils/logger.js";

export const DEFAULT_DB_PATH = "./data/market.db";

export interface CommonOptions {
  db: string;
  verbose?: boolean;
}

/** Config, migrated database and upstream client, shared by every networked command. */
export function createRuntime(opts: CommonOptions): AppContext {
  const config = loadConfig();
  setLogLevel(opts.verbose ? "debug" : config.logLevel);

  const db = openMigratedDatabase(opts.db);
  return createContext(config, db, createMarketClient(config));
}

export function openMigratedDatabase(path: string) {
  const dbPath = resolve(path);
  mkdirSync(dirname(dbPath), { recursive: true });

  const db = openDatabase(dbPath);
  runMigrations(db);
  return db;
}

/**
 * Aborts `controller` on SIGINT or SIGTERM so a loop can finish its current
 * cycle. Returns a function that removes the handlers.
 */
export function abortOnShutdownSignals(controller: AbortController, log: Logger): () => void {
  const shutdown = () => {
    if (!controller.signal.aborted) {
      log.info("Shutdown signal received, finishing current cycle…");
      controller.abort();
    }
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
  return () => {
    process.off("SIGINT", shutdown);
    process.off("SIGTERM", shutdown);
  };
}

export function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return parsed > 0 ? parsed : fallback;
}
