import { type Clock, systemClock } from "@price-collector/primitives";
import type { CollectorConfig } from "./config.ts";
import type { Logger } from "./logger.ts";

/**
 * Everything a component needs from its surroundings. Built once in the
 * entry point and handed to constructors; nothing reads process-wide state.
 */
export interface ServiceContext {
  config: CollectorConfig;
  logger: Logger;
  clock: Clock;
  sleep: (ms: number) => Promise<void>;
}

export function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createServiceContext(
  config: CollectorConfig,
  logger: Logger,
  overrides: Partial<Pick<ServiceContext, "clock" | "sleep">> = {},
): ServiceContext {
  return {
    config,
    logger,
    clock: overrides.clock ?? systemClock,
    sleep: overrides.sleep ?? wait,
  };
}
