import type { Clock, PriceObservation } from "@price-collector/primitives";
import { closestTo } from "./nearest.ts";

/**
 * Append-only queue with a moving head so eviction from the front is O(1)
 * amortized. The backing array is compacted once the dead prefix dominates.
 */
class ObservationQueue {
  private items: PriceObservation[] = [];
  private head = 0;

  get length(): number {
    return this.items.length - this.head;
  }

  push(observation: PriceObservation): void {
    this.items.push(observation);
  }

  peek(): PriceObservation | undefined {
    return this.items[this.head];
  }

  shift(): void {
    this.head += 1;
    if (this.head > 64 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
  }

  last(): PriceObservation | undefined {
    return this.length > 0 ? this.items[this.items.length - 1] : undefined;
  }

  snapshot(): PriceObservation[] {
    return this.items.slice(this.head);
  }
}

export interface MemoryBufferOptions {
  maxAgeSeconds: number;
  clock: Clock;
}

/**
 * Short recency window in front of the durable log. Entries are appended in
 * ingestion order, so the front of each queue is always the oldest.
 */
export class MemoryBuffer {
  private readonly queues = new Map<string, ObservationQueue>();

  constructor(private readonly options: MemoryBufferOptions) {}

  get maxAgeSeconds(): number {
    return this.options.maxAgeSeconds;
  }

  add(observation: PriceObservation): void {
    let queue = this.queues.get(observation.symbol);
    if (!queue) {
      queue = new ObservationQueue();
      this.queues.set(observation.symbol, queue);
    }
    queue.push(observation);
    this.evictFrom(queue, this.options.clock());
  }

  query(
    symbol: string,
    targetTs: number,
    tolerance: number,
  ): PriceObservation | null {
    const queue = this.queues.get(symbol);
    if (!queue) {
      return null;
    }
    const now = this.options.clock();
    const live = queue
      .snapshot()
      .filter((observation) => !this.isExpired(observation, now));
    return closestTo(live, targetTs, tolerance);
  }

  latest(symbol: string): PriceObservation | null {
    const candidate = this.queues.get(symbol)?.last();
    if (!candidate || this.isExpired(candidate, this.options.clock())) {
      return null;
    }
    return candidate;
  }

  /** Drops expired entries in every queue and returns how many went. */
  evictExpired(): number {
    const now = this.options.clock();
    let removed = 0;
    for (const [symbol, queue] of this.queues) {
      removed += this.evictFrom(queue, now);
      if (queue.length === 0) {
        this.queues.delete(symbol);
      }
    }
    return removed;
  }

  size(): number {
    let total = 0;
    for (const queue of this.queues.values()) {
      total += queue.length;
    }
    return total;
  }

  symbols(): string[] {
    return [...this.queues.keys()];
  }

  private evictFrom(queue: ObservationQueue, now: number): number {
    let removed = 0;
    let front = queue.peek();
    while (front && this.isExpired(front, now)) {
      queue.shift();
      removed += 1;
      front = queue.peek();
    }
    return removed;
  }

  private isExpired(observation: PriceObservation, now: number): boolean {
    return now - observation.ingestedAt > this.options.maxAgeSeconds;
  }
}
