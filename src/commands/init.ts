import { resolve } from "node:path";
import { createLogger } from "../utils/logger.js";
import { openMigratedDatabase } from "./runtime.js";

const log = createLogger("init");

interface InitOptions {
  db: string;
}

export function initCommand(opts: InitOptions): void {
  const db = openMigratedDatabase(opts.db);
  db.close();
  log.info("Database initialized", { path: resolve(opts.db) });
}
