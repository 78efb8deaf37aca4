import type { Clock } from "@price-collector/primitives";
import type { DurableLog } from "./durable-log.ts";
import { errorMessage } from "./errors.ts";
import type { Logger } from "./logger.ts";
import type { MemoryBuffer } from "./memory-buffer.ts";

export interface SweepResult {
  memory: number;
  durable: number;
}

interface RetentionReaperOptions {
  memory: MemoryBuffer;
  durable: DurableLog;
  clock: Clock;
  logger: Logger;
  retentionSeconds: number;
  intervalMs: number;
}

export class RetentionReaper {
  private readonly options: RetentionReaperOptions;
  private intervalId: NodeJS.Timeout | null = null;
  private currentSweep: Promise<SweepResult | null> | null = null;
  private lastResult: SweepResult | null = null;

  constructor(options: RetentionReaperOptions) {
    this.options = options;
  }

  start(): void {
    if (this.intervalId) {
      this.options.logger.warn("retention reaper already running");
      return;
    }

    this.options.logger.info(
      {
        intervalMs: this.options.intervalMs,
        retentionSeconds: this.options.retentionSeconds,
      },
      "starting retention reaper",
    );
    this.intervalId = setInterval(() => {
      void this.tick();
    }, this.options.intervalMs);
  }

  /** Clears the timer and lets a sweep already underway finish. */
  async stop(): Promise<void> {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      this.options.logger.info("retention reaper stopped");
    }
    if (this.currentSweep) {
      await this.currentSweep;
    }
  }

  /**
   * One pass over both tiers. Throws on storage failure; the scheduled tick
   * logs instead and tries again next interval.
   */
  async sweep(): Promise<SweepResult> {
    const memory = this.options.memory.evictExpired();
    const cutoff = this.options.clock() - this.options.retentionSeconds;
    const durable = await this.options.durable.prune(cutoff);

    const result = { memory, durable };
    this.lastResult = result;
    if (memory > 0 || durable > 0) {
      this.options.logger.info(
        { ...result, retentionSeconds: this.options.retentionSeconds },
        "cleaned up old records",
      );
    }
    return result;
  }

  getLastResult(): SweepResult | null {
    return this.lastResult;
  }

  private async tick(): Promise<SweepResult | null> {
    if (this.currentSweep) {
      this.options.logger.debug("retention tick skipped - sweep in progress");
      return null;
    }

    this.currentSweep = this.sweep()
      .catch((error: unknown) => {
        this.options.logger.error(
          { error: errorMessage(error) },
          "retention sweep failed",
        );
        return null;
      })
      .finally(() => {
        this.currentSweep = null;
      });
    return this.currentSweep;
  }
}
