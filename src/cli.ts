#!/usr/bin/env node
import { Command } from "commander";
import { DAEMON_DEFAULT_INTERVAL_MINUTES, DEFAULT_HISTORY_HOURS } from "./config/constants.js";
import { initCommand } from "./commands/init.js";
import { updateCommand } from "./commands/update.js";
import { serveCommand } from "./commands/serve.js";
import { historyCommand } from "./commands/history.js";
import { snapshotsCommand } from "./commands/snapshots.js";
import { itemCommand } from "./commands/item.js";
import { DEFAULT_DB_PATH } from "./commands/runtime.js";
import { errorMessage } from "./utils/errors.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("cli");

const program = new Command();

program
  .name("ah-tracker")
  .description("Auction house price tracker backed by the Battle.net Game Data API")
  .version("1.0.0");

program
  .command("init")
  .description("Create/migrate the SQLite database")
  .option("--db <path>", "SQLite file path", DEFAULT_DB_PATH)
  .action(initCommand);

program
  .command("update")
  .description("Fetch auctions for a set of realms and record price history")
  .option("--db <path>", "SQLite file path", DEFAULT_DB_PATH)
  .option("--realms <spec>", "realm[:region],... or a preset (popular, all-us)")
  .option("--top-items <n>", "Items tracked per realm by volume (10-500)")
  .option("--all-items", "Track every item instead of the top by volume")
  .option("--daemon", "Run continuously in a loop instead of exiting after one cycle")
  .option("--interval <minutes>", "Minutes between cycles in daemon mode", String(DAEMON_DEFAULT_INTERVAL_MINUTES))
  .option("--verbose", "Debug logging")
  .action(updateCommand);

program
  .command("serve")
  .description("Start local HTTP API server")
  .option("--db <path>", "SQLite file path", DEFAULT_DB_PATH)
  .option("--port <port>", "Port to listen on", "3000")
  .option("--update-interval <minutes>", "Minutes between background updates (0 disables)", "0")
  .option("--verbose", "Debug logging")
  .action(serveCommand);

program
  .command("history")
  .description("Print price trends for one item from the database")
  .argument("<realm>", "Realm slug")
  .argument("<itemId>", "Item ID")
  .option("--db <path>", "SQLite file path", DEFAULT_DB_PATH)
  .option("--region <region>", "us, eu, kr or tw", "us")
  .option("--hours <n>", "Window in hours (max 168)", String(DEFAULT_HISTORY_HOURS))
  .action(historyCommand);

program
  .command("snapshots")
  .description("List recent bulk update runs")
  .option("--db <path>", "SQLite file path", DEFAULT_DB_PATH)
  .option("--hours <n>", "Window in hours", String(DEFAULT_HISTORY_HOURS))
  .action(snapshotsCommand);

program
  .command("item")
  .description("Look up item names and details by ID")
  .argument("<itemIds>", "Comma-separated item IDs")
  .option("--db <path>", "SQLite file path", DEFAULT_DB_PATH)
  .option("--region <region>", "us, eu, kr or tw", "us")
  .option("--verbose", "Debug logging")
  .action(itemCommand);

program.parseAsync().catch((err) => {
  log.error("Command failed", { error: errorMessage(err) });
  process.exitCode = 1;
});
