import pino from "pino";
import { config } from "./config";

// Pretty-printed outside production; one JSON object per line in production.
export const logger = pino({
  level     : config.logLevel,
  transport : process.env.NODE_ENV !== "production" ? { target: "pino-pretty" } : undefined,
});
