import pino, { type Logger } from "pino";
import type { CollectorConfig } from "./config.ts";

export type { Logger };

export function createLogger(config: Pick<CollectorConfig, "LOG_LEVEL">): Logger {
  return pino({
    name: "price-collector",
    level: config.LOG_LEVEL,
  });
}

/** Logger for tests and scripts that should not write anything. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
