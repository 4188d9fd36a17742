/**
 * Structured Logger (Pino)
 *
 * All modules import { logger } from this file instead of using console.log.
 * Produces JSON logs in production and pretty-printed logs in development.
 *
 * Every log entry includes:
 * - service: "portal-report-scraper" (for log aggregation)
 * - pid: process ID
 * - Contextual fields passed as the first argument object
 *
 * Components log through child loggers tagged with a `component` field.
 */
import pino, { Logger } from "pino";
import config from "../config";

export const logger = pino({
  level: config.logLevel,
  // In development, use pino-pretty for human-readable output
  transport:
    config.env === "development"
      ? { target: "pino-pretty", options: { colorize: true } }
      : undefined,
  base: {
    service: "portal-report-scraper",
    pid: process.pid,
  },
});

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
