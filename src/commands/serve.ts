import { serve } from "@hono/node-server";
import { createApp } from "../api/router.js";
import { runUpdateLoop } from "../cron/update-loop.js";
import { errorMessage } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { createRuntime, parsePositiveInt, type CommonOptions } from "./runtime.js";

const log = createLogger("serve-cmd");

interface ServeOptions extends CommonOptions {
  port: string;
  /** Minutes between in-process updates; "0" disables the loop. */
  updateInterval: string;
}

export function serveCommand(opts: ServeOptions): void {
  const port = parsePositiveInt(opts.port, 3000);
  const intervalMinutes = parseInt(opts.updateInterval, 10) || 0;

  const ctx = createRuntime(opts);
  const app = createApp(ctx);
  const controller = new AbortController();

  const server = serve({ fetch: app.fetch, port }, (info) => {
    log.info("HTTP server listening", { port: info.port, region: ctx.config.region });
  });

  if (intervalMinutes > 0) {
    runUpdateLoop(ctx, {}, intervalMinutes * 60_000, controller.signal).catch((err) => {
      log.error("Update loop crashed", { error: errorMessage(err) });
    });
  }

  const shutdown = () => {
    if (controller.signal.aborted) return;
    log.info("Shutting down");
    controller.abort();
    server.close(() => ctx.db.close());
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}
