import type { Clock } from "@price-collector/primitives";
import { errorMessage } from "../errors.ts";
import type { FailoverController } from "../failover-controller.ts";
import type { Logger } from "../logger.ts";
import type { FeedStatus, ObservationSink, PriceFeed } from "./types.ts";

interface PollingFeedOptions {
  name: string;
  kind: string;
  controller: FailoverController;
  symbols: readonly string[];
  intervalMs: number;
  clock: Clock;
  logger: Logger;
  sink: ObservationSink;
}

export class PollingFeed implements PriceFeed {
  readonly name: string;
  private readonly options: PollingFeedOptions;
  private intervalId: NodeJS.Timeout | null = null;
  private currentCycle: Promise<void> | null = null;
  private lastObservationAt: number | null = null;
  private skipped = 0;

  constructor(options: PollingFeedOptions) {
    this.options = options;
    this.name = options.name;
  }

  start(): void {
    if (this.intervalId) {
      this.options.logger.warn({ feed: this.name }, "feed already running");
      return;
    }

    this.options.logger.info(
      {
        feed: this.name,
        symbols: this.options.symbols,
        intervalMs: this.options.intervalMs,
      },
      "starting polling feed",
    );
    this.intervalId = setInterval(() => {
      void this.tick();
    }, this.options.intervalMs);

    void this.tick();
  }

  async stop(): Promise<void> {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      this.options.logger.info({ feed: this.name }, "polling feed stopped");
    }
    if (this.currentCycle) {
      await this.currentCycle;
    }
  }

  status(): FeedStatus {
    const stats = this.options.controller.getStats();
    return {
      name: this.name,
      kind: this.options.kind,
      connected: stats.connected,
      lastObservationAt: this.lastObservationAt,
      errors: stats.failures,
      detail: {
        endpoint: stats.endpoint,
        cursor: stats.cursor,
        rotations: stats.rotations,
        skipped: this.skipped,
        symbols: [...this.options.symbols],
      },
    };
  }

  /** Polls every symbol once. An unavailable symbol is skipped this cycle. */
  async pollOnce(): Promise<void> {
    for (const symbol of this.options.symbols) {
      const outcome = await this.options.controller.getLatest(symbol);
      if (outcome.status === "unavailable") {
        this.skipped += 1;
        this.options.logger.debug(
          { feed: this.name, symbol, reason: outcome.reason },
          "skipping symbol this cycle",
        );
        continue;
      }
      this.lastObservationAt = this.options.clock();
      this.options.sink(outcome.observation);
    }
  }

  private async tick(): Promise<void> {
    if (this.currentCycle) {
      this.options.logger.debug({ feed: this.name }, "poll tick skipped - cycle in progress");
      return;
    }

    this.currentCycle = this.pollOnce()
      .catch((error: unknown) => {
        this.options.logger.error(
          { error: errorMessage(error), feed: this.name },
          "poll cycle failed",
        );
      })
      .finally(() => {
        this.currentCycle = null;
      });
    await this.currentCycle;
  }
}
