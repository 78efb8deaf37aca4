import {
  type Clock,
  describeTime,
  normalizeSymbol,
  type PriceMatch,
  type PriceObservation,
  type StorageTier,
} from "@price-collector/primitives";
import type { DurableLog } from "./durable-log.ts";
import type { MemoryBuffer } from "./memory-buffer.ts";
import type { IngestionPipeline, PipelineStats } from "./pipeline.ts";
import type { FeedStatus } from "./sources/types.ts";

export interface CollectorStatus {
  status: "ok";
  timestamp: number;
  symbols: string[];
  lastSeen: Record<string, number>;
  feeds: FeedStatus[];
  tiers: {
    memory: { entries: number; maxAgeSeconds: number };
    durable: { entries: number };
  };
  pipeline: PipelineStats;
}

interface QueryEngineOptions {
  memory: MemoryBuffer;
  durable: DurableLog;
  pipeline: IngestionPipeline;
  clock: Clock;
  quote: string;
  symbols: readonly string[];
  feedStatus?: () => FeedStatus[];
}

/**
 * Memory first, durable second. Memory wins even when both tiers hold a
 * match: a fresh sample can be there before its durable write lands.
 */
export class QueryEngine {
  private readonly options: QueryEngineOptions;

  constructor(options: QueryEngineOptions) {
    this.options = options;
  }

  now(): number {
    return this.options.clock();
  }

  canonical(symbol: string): string {
    return normalizeSymbol(symbol, this.options.quote);
  }

  isSupported(symbol: string): boolean {
    return this.options.symbols.includes(this.canonical(symbol));
  }

  lookup(symbol: string, targetTs: number, tolerance: number): PriceMatch | null {
    const canonical = this.canonical(symbol);

    const fromMemory = this.options.memory.query(canonical, targetTs, tolerance);
    if (fromMemory) {
      return annotate(fromMemory, "memory", targetTs);
    }

    const fromDurable = this.options.durable.query(
      canonical,
      targetTs,
      tolerance,
    );
    if (fromDurable) {
      return annotate(fromDurable, "durable", targetTs);
    }

    return null;
  }

  latest(): PriceMatch[] {
    const matches: PriceMatch[] = [];
    for (const symbol of this.options.symbols) {
      const fromMemory = this.options.memory.latest(symbol);
      if (fromMemory) {
        matches.push(annotate(fromMemory, "memory", null));
        continue;
      }
      const fromDurable = this.options.durable.latest(symbol);
      if (fromDurable) {
        matches.push(annotate(fromDurable, "durable", null));
      }
    }
    return matches;
  }

  status(): CollectorStatus {
    return {
      status: "ok",
      timestamp: this.options.clock(),
      symbols: [...this.options.symbols],
      lastSeen: this.options.pipeline.lastSeenBySymbol(),
      feeds: this.options.feedStatus?.() ?? [],
      tiers: {
        memory: {
          entries: this.options.memory.size(),
          maxAgeSeconds: this.options.memory.maxAgeSeconds,
        },
        durable: { entries: this.options.durable.size() },
      },
      pipeline: this.options.pipeline.getStats(),
    };
  }
}

function annotate(
  observation: PriceObservation,
  tier: StorageTier,
  requestedAt: number | null,
): PriceMatch {
  return {
    observation,
    tier,
    requestedAt,
    timeInfo: describeTime(observation.observedAt),
  };
}
