import {
  type Clock,
  normalizeSymbol,
  type PriceObservation,
  type RawObservation,
} from "@price-collector/primitives";
import type { DurableLog } from "./durable-log.ts";
import { errorMessage } from "./errors.ts";
import type { Logger } from "./logger.ts";
import type { MemoryBuffer } from "./memory-buffer.ts";

export type IngestResult = "accepted" | "duplicate" | "rejected";

export interface PipelineStats {
  accepted: number;
  duplicates: number;
  rejected: number;
  persistFailures: number;
  pendingWrites: number;
}

interface IngestionPipelineOptions {
  memory: MemoryBuffer;
  durable: DurableLog;
  clock: Clock;
  logger: Logger;
  quote: string;
  /** Canonical symbols to accept; anything else is rejected. */
  symbols?: readonly string[];
}

export class IngestionPipeline {
  private readonly options: IngestionPipelineOptions;
  private readonly supported: Set<string> | null;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly lastSeen = new Map<string, number>();
  private stats = {
    accepted: 0,
    duplicates: 0,
    rejected: 0,
    persistFailures: 0,
  };

  constructor(options: IngestionPipelineOptions) {
    this.options = options;
    this.supported = options.symbols ? new Set(options.symbols) : null;
  }

  /**
   * Writes through to the memory tier and starts the durable append. The
   * durable index is updated synchronously, so the result is final even
   * though the file write finishes later.
   */
  accept(raw: RawObservation): IngestResult {
    const symbol = normalizeSymbol(raw.symbol, this.options.quote);
    const reason = this.validate(symbol, raw);
    if (reason) {
      this.stats.rejected += 1;
      this.options.logger.debug({ symbol: raw.symbol, reason }, "rejected observation");
      return "rejected";
    }

    if (this.options.durable.has(symbol, raw.sequenceId)) {
      this.stats.duplicates += 1;
      return "duplicate";
    }

    const observation: PriceObservation = {
      symbol,
      price: raw.price,
      observedAt: raw.observedAt,
      sequenceId: raw.sequenceId,
      ingestedAt: this.options.clock(),
    };

    this.options.memory.add(observation);
    this.persist(observation);
    this.stats.accepted += 1;
    this.lastSeen.set(symbol, observation.observedAt);
    return "accepted";
  }

  /** Resolves once every durable write started so far has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  lastSeenBySymbol(): Record<string, number> {
    return Object.fromEntries(this.lastSeen);
  }

  getStats(): PipelineStats {
    return { ...this.stats, pendingWrites: this.inFlight.size };
  }

  private validate(symbol: string, raw: RawObservation): string | null {
    if (!symbol) {
      return "empty symbol";
    }
    if (this.supported && !this.supported.has(symbol)) {
      return "unsupported symbol";
    }
    if (!Number.isFinite(raw.price) || raw.price < 0) {
      return "invalid price";
    }
    if (!Number.isFinite(raw.observedAt)) {
      return "invalid timestamp";
    }
    if (!Number.isInteger(raw.sequenceId) || raw.sequenceId < 0) {
      return "invalid sequence id";
    }
    return null;
  }

  private persist(observation: PriceObservation): void {
    const write = this.options.durable
      .append(observation)
      .then(() => {
        this.options.logger.debug(
          {
            symbol: observation.symbol,
            price: observation.price,
            observedAt: observation.observedAt,
            sequenceId: observation.sequenceId,
          },
          "saved observation",
        );
      })
      .catch((error: unknown) => {
        this.stats.persistFailures += 1;
        this.options.logger.error(
          { error: errorMessage(error), symbol: observation.symbol },
          "failed to persist observation",
        );
      })
      .finally(() => {
        this.inFlight.delete(write);
      });
    this.inFlight.add(write);
  }
}
