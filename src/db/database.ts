import Database from "better-sqlite3";
import { readFileSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { createLogger } from "../utils/logger.js";

const log = createLogger("database");

export type { Database };

/** `migrations/` at the package root, resolved from this module's location. */
export const MIGRATIONS_DIR = fileURLToPath(new URL("../../migrations/", import.meta.url));

export function openDatabase(dbPath: string): Database.Database {
  const db = new Database(dbPath);

  if (dbPath !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("busy_timeout = 5000");
  db.pragma("foreign_keys = ON");

  log.info("Opened database", { path: dbPath });
  return db;
}

export function runMigrations(db: Database.Database, migrationsDir: string = MIGRATIONS_DIR): number {
  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql"))
    .sort();

  if (files.length === 0) {
    log.warn("No migration files found", { dir: migrationsDir });
    return 0;
  }

  // Track applied migrations
  db.exec(`CREATE TABLE IF NOT EXISTS _migrations (
    name TEXT PRIMARY KEY,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  )`);

  const applied = new Set(
    db
      .prepare<[], { name: string }>("SELECT name FROM _migrations")
      .all()
      .map((row) => row.name),
  );

  const record = db.prepare("INSERT INTO _migrations (name) VALUES (?)");
  let count = 0;
  for (const file of files) {
    if (applied.has(file)) continue;

    const sql = readFileSync(join(migrationsDir, file), "utf-8");
    log.info("Applying migration", { file });

    db.transaction(() => {
      db.exec(sql);
      record.run(file);
    })();
    count++;
  }

  log.info("Migrations complete", { total: files.length, applied: count });
  return count;
}
