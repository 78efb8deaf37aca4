import path from "node:path";
import { normalizeSymbol, type RawObservation } from "@price-collector/primitives";
import type { ServiceContext } from "./context.ts";
import { DurableLog, type StoreFs } from "./durable-log.ts";
import { MemoryBuffer } from "./memory-buffer.ts";
import { IngestionPipeline } from "./pipeline.ts";
import { QueryEngine } from "./query-engine.ts";
import { RetentionReaper } from "./retention-reaper.ts";
import { createFeed, type PriceFeed } from "./sources/index.ts";

interface CollectorServiceOptions {
  /** Replaces the feeds built from FEED_SOURCES. */
  feeds?: (service: CollectorService) => PriceFeed[];
  fs?: StoreFs;
}

/**
 * Builds the tiers, the pipeline and the feeds from one service context
 * and owns their lifecycle.
 */
export class CollectorService {
  readonly memory: MemoryBuffer;
  readonly durable: DurableLog;
  readonly pipeline: IngestionPipeline;
  readonly engine: QueryEngine;
  readonly reaper: RetentionReaper;
  readonly feeds: PriceFeed[];
  private readonly context: ServiceContext;
  private running = false;

  constructor(context: ServiceContext, options: CollectorServiceOptions = {}) {
    this.context = context;
    const { config, clock, logger } = context;
    const quote = config.QUOTE_CURRENCY;
    const symbols = [
      ...new Set(config.SYMBOLS.map((symbol) => normalizeSymbol(symbol, quote))),
    ];

    this.memory = new MemoryBuffer({
      maxAgeSeconds: config.BUFFER_MAX_AGE_SECONDS,
      clock,
    });
    this.durable = new DurableLog({
      dataDir: path.resolve(config.DATA_DIR),
      logger: logger.child({ component: "durable-log" }),
      fs: options.fs,
    });
    this.pipeline = new IngestionPipeline({
      memory: this.memory,
      durable: this.durable,
      clock,
      logger: logger.child({ component: "pipeline" }),
      quote,
      symbols,
    });

    const sink = (observation: RawObservation) => {
      this.pipeline.accept(observation);
    };
    this.feeds = options.feeds
      ? options.feeds(this)
      : config.FEED_SOURCES.map((kind) => createFeed(kind, context, sink));

    this.engine = new QueryEngine({
      memory: this.memory,
      durable: this.durable,
      pipeline: this.pipeline,
      clock,
      quote,
      symbols,
      feedStatus: () => this.feeds.map((feed) => feed.status()),
    });
    this.reaper = new RetentionReaper({
      memory: this.memory,
      durable: this.durable,
      clock,
      logger: logger.child({ component: "retention" }),
      retentionSeconds: config.DATA_RETENTION_HOURS * 3600,
      intervalMs: config.CLEANUP_INTERVAL_SECONDS * 1000,
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    await this.durable.open();
    for (const feed of this.feeds) {
      feed.start();
    }
    this.reaper.start();
    this.running = true;
    this.context.logger.info(
      {
        feeds: this.feeds.map((feed) => feed.name),
        symbols: this.context.config.SYMBOLS,
        storeFile: this.durable.storeFile,
      },
      "collector started",
    );
  }

  /**
   * Feeds first so nothing new arrives, then the reaper, then whatever
   * durable writes are still in flight.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    await Promise.all(this.feeds.map((feed) => feed.stop()));
    await this.reaper.stop();
    await this.pipeline.drain();
    await this.durable.flush();
    this.context.logger.info("collector stopped");
  }
}
