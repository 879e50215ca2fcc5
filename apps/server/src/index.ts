/**
 * ledger-tools server entry point.
 *
 * Serves the Hono app on Node.js.
 */

import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { createConsoleLogger } from "./logger.js";
import { shutdown } from "./shutdown.js";

const config = loadConfig();
const logger = createConsoleLogger("ledger-tools", config.logLevel);
const app = createApp({ logger });

const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
  logger.info(`Server running at http://${config.host}:${info.port}`);
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    logger.info(`Received ${signal}, shutting down`);
    shutdown(server, logger);
  });
}
