import nodeFs from "node:fs/promises";
import path from "node:path";
import {
  decodeStore,
  encodeStore,
  type PriceObservation,
  STORE_FILE_NAME,
} from "@price-collector/primitives";
import pLimit from "p-limit";
import { errorMessage, StorageIOError } from "./errors.ts";
import type { Logger } from "./logger.ts";
import { closestTo } from "./nearest.ts";

export type StoreFs = Pick<
  typeof nodeFs,
  "readFile" | "writeFile" | "rename" | "mkdir" | "rm"
>;

interface DurableLogOptions {
  dataDir: string;
  logger: Logger;
  fs?: StoreFs;
}

interface WriteTicket {
  started: boolean;
  promise: Promise<void>;
}

export function dedupKey(symbol: string, sequenceId: number): string {
  return `${symbol}#${sequenceId}`;
}

/**
 * Tier of record. The whole set lives in memory with a dedup-key index and a
 * per-symbol index; every change rewrites `prices.json` through a temp file
 * and a rename, one write at a time.
 */
export class DurableLog {
  private readonly fs: StoreFs;
  private readonly logger: Logger;
  private readonly limit = pLimit(1);
  readonly storeFile: string;
  private records: PriceObservation[] = [];
  private bySymbol = new Map<string, PriceObservation[]>();
  private keys = new Set<string>();
  private dirty = false;
  private queuedWrite: WriteTicket | null = null;
  private tempCounter = 0;

  constructor(private readonly options: DurableLogOptions) {
    this.fs = options.fs ?? nodeFs;
    this.logger = options.logger;
    this.storeFile = path.join(options.dataDir, STORE_FILE_NAME);
  }

  /**
   * Storage failures here are logged rather than thrown: the store starts
   * empty and the next append retries the write.
   */
  async open(): Promise<void> {
    await this.fs.mkdir(this.options.dataDir, { recursive: true });

    let content: string;
    try {
      content = await this.fs.readFile(this.storeFile, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
        await this.quarantine(`read failed: ${errorMessage(error)}`);
        return;
      }
      this.logger.info({ storeFile: this.storeFile }, "initialized price store");
      this.load([]);
      this.dirty = true;
      try {
        await this.schedulePersist();
      } catch (writeError) {
        this.logger.error(
          { error: errorMessage(writeError), storeFile: this.storeFile },
          "failed to create price store, will retry on next write",
        );
      }
      return;
    }

    try {
      this.load(decodeStore(content).records);
      this.logger.info(
        { storeFile: this.storeFile, records: this.records.length },
        "hydrated price store from disk",
      );
    } catch (error) {
      await this.quarantine(errorMessage(error));
    }
  }

  has(symbol: string, sequenceId: number): boolean {
    if (sequenceId === 0) {
      return false;
    }
    return this.keys.has(dedupKey(symbol, sequenceId));
  }

  /**
   * Index updates happen before the first await, so a `has` check made right
   * after calling `append` already sees the record. Resolves to false when
   * the dedup key was already present.
   */
  async append(observation: PriceObservation): Promise<boolean> {
    if (this.has(observation.symbol, observation.sequenceId)) {
      return false;
    }
    this.index(observation);
    this.dirty = true;
    await this.schedulePersist();
    return true;
  }

  query(
    symbol: string,
    targetTs: number,
    tolerance: number,
  ): PriceObservation | null {
    return closestTo(this.bySymbol.get(symbol) ?? [], targetTs, tolerance);
  }

  latest(symbol: string): PriceObservation | null {
    let latest: PriceObservation | null = null;
    for (const record of this.bySymbol.get(symbol) ?? []) {
      if (!latest || record.ingestedAt >= latest.ingestedAt) {
        latest = record;
      }
    }
    return latest;
  }

  latestAll(): PriceObservation[] {
    const result: PriceObservation[] = [];
    for (const symbol of this.bySymbol.keys()) {
      const latest = this.latest(symbol);
      if (latest) {
        result.push(latest);
      }
    }
    return result;
  }

  /**
   * Removes records ingested before `cutoffSeconds`; returns the count.
   * A write left pending by an earlier failure is retried even when
   * nothing new expired.
   */
  async prune(cutoffSeconds: number): Promise<number> {
    const kept = this.records.filter(
      (record) => record.ingestedAt >= cutoffSeconds,
    );
    const removed = this.records.length - kept.length;
    if (removed === 0) {
      if (this.dirty) {
        await this.schedulePersist();
      }
      return 0;
    }

    this.load(kept);
    this.dirty = true;
    await this.schedulePersist();
    return removed;
  }

  size(): number {
    return this.records.length;
  }

  symbols(): string[] {
    return [...this.bySymbol.keys()];
  }

  /** Waits for queued writes; retries the last one if it had failed. */
  async flush(): Promise<void> {
    if (this.dirty) {
      await this.schedulePersist();
      return;
    }
    await this.limit(() => Promise.resolve());
  }

  private load(records: PriceObservation[]): void {
    this.records = [];
    this.bySymbol = new Map();
    this.keys = new Set();
    for (const record of records) {
      this.index(record);
    }
  }

  private index(observation: PriceObservation): void {
    this.records.push(observation);
    let series = this.bySymbol.get(observation.symbol);
    if (!series) {
      series = [];
      this.bySymbol.set(observation.symbol, series);
    }
    series.push(observation);
    if (observation.sequenceId !== 0) {
      this.keys.add(dedupKey(observation.symbol, observation.sequenceId));
    }
  }

  /** Appends that land while a write is still queued share that write. */
  private schedulePersist(): Promise<void> {
    if (this.queuedWrite && !this.queuedWrite.started) {
      return this.queuedWrite.promise;
    }
    const ticket: WriteTicket = { started: false, promise: Promise.resolve() };
    ticket.promise = this.limit(async () => {
      ticket.started = true;
      await this.writeSnapshot();
    });
    this.queuedWrite = ticket;
    return ticket.promise;
  }

  private async writeSnapshot(): Promise<void> {
    if (!this.dirty) {
      return;
    }
    this.dirty = false;

    const body = encodeStore(this.records);
    this.tempCounter += 1;
    const tempFile = `${this.storeFile}.${process.pid}.${this.tempCounter}.tmp`;

    try {
      await this.fs.writeFile(tempFile, body, "utf-8");
      await this.fs.rename(tempFile, this.storeFile);
      this.logger.debug(
        { records: this.records.length },
        "persisted price store",
      );
    } catch (error) {
      this.dirty = true;
      await this.fs.rm(tempFile, { force: true }).catch((cleanupError) => {
        this.logger.warn(
          { error: errorMessage(cleanupError), tempFile },
          "failed to remove temp store file",
        );
      });
      throw new StorageIOError(
        `Failed to persist price store: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  /** Moves the unusable store file aside and starts empty. */
  private async quarantine(reason: string): Promise<void> {
    this.load([]);
    const quarantine = `${this.storeFile}.corrupt-${Date.now()}`;
    try {
      await this.fs.rename(this.storeFile, quarantine);
    } catch (error) {
      this.logger.error(
        { error: reason, renameError: errorMessage(error), storeFile: this.storeFile },
        "price store unreadable and could not be moved aside, starting empty",
      );
      return;
    }
    this.logger.error(
      { error: reason, quarantine },
      "price store unreadable, moved aside and starting empty",
    );
  }
}
