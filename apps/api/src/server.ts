/**
 * ─────────────────────────────────────────────────────────
 *  Product feedback API
 *  Stack: Node.js + TypeScript + Express + pino
 * ─────────────────────────────────────────────────────────
 *
 *  GET  /                          index page (views/)
 *  GET  /static/*                  front-end assets (static/)
 *  GET  /status                    liveness text
 *  GET  /products                  the board game catalog
 *  POST /products/:slug/feedback   echo the product (feedback is not stored)
 */

import { createApp } from "./app";
import { createSeedCatalog } from "./catalog";
import { config } from "./config";
import { logger } from "./logger";

const app = createApp({
  catalog: createSeedCatalog(),
  logger,
  viewsDir: config.viewsDir,
  staticDir: config.staticDir,
  rateLimitPerMinute: config.rateLimitPerMinute,
});

// ─── Graceful Shutdown ────────────────────────────────────
const server = app.listen(config.port, () => {
  logger.info(`listening on :${config.port}`);
});

const shutdown = (signal: string) => {
  logger.info(`${signal}: shutting down`);
  server.close(() => process.exit(0));
  setTimeout(() => process.exit(1), 10_000).unref();
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
