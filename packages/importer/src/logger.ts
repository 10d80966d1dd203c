import pino from "pino";
import type { Logger } from "pino";

/** Logger used when the caller supplies none. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
