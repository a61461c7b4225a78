import path from "path";

// ─── Config ───────────────────────────────────────────────
// Defaults reproduce the fixed setup: port 3000, ./views and ./static.
export const config = {
  port:               Number(process.env.PORT) || 3000,
  logLevel:           process.env.LOG_LEVEL || "info",
  viewsDir:           path.resolve(process.env.VIEWS_DIR || "views"),
  staticDir:          path.resolve(process.env.STATIC_DIR || "static"),
  rateLimitPerMinute: Number(process.env.RATE_LIMIT_PER_MINUTE) || 5_000,
};
