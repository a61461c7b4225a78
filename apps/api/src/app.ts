import express from "express";
import type { Request, Response, NextFunction } from "express";
import compression from "compression";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import type { Logger } from "pino";
import { accessLog } from "./accessLog";
import type { Catalog } from "./catalog";
import { createRouter } from "./routes";

export interface AppDeps {
  catalog: Catalog;
  logger: Logger;
  viewsDir: string;
  staticDir: string;
  rateLimitPerMinute: number;
}

export const createApp = ({ catalog, logger, viewsDir, staticDir, rateLimitPerMinute }: AppDeps) => {
  const app = express();

  // First, so every request gets a line: rate-limited ones included,
  // and the size counted is what compression() actually sends.
  app.use(accessLog(logger));

  app.use(helmet()); // secure HTTP headers
  app.use(compression());

  // Rate limit per IP. Over the budget even a valid feedback POST gets a 429.
  app.use(
    rateLimit({
      windowMs: 60_000,
      max: rateLimitPerMinute,
      standardHeaders: true,
      legacyHeaders: false,
    }),
  );

  // Front end: index page on "/" only, assets under /static/ with the prefix stripped.
  // Missing files fall through to the default 404.
  app.get("/", express.static(viewsDir));
  app.use("/static", express.static(staticDir));

  app.use(createRouter(catalog));

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err }, "Unhandled error");
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
};
