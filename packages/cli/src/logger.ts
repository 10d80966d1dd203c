/**
 * @bank-import/cli — Logger setup.
 *
 * Logs go to stderr so that stdout stays free for the report.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { AppConfig } from "./config.js";

export function createLogger(config: Pick<AppConfig, "LOG_LEVEL" | "LOG_PRETTY">): Logger {
  if (config.LOG_PRETTY) {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }
  return pino({ level: config.LOG_LEVEL }, pino.destination(2));
}
