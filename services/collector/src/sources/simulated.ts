import {
  baseOf,
  type Clock,
  normalizeSymbol,
  type RawObservation,
} from "@price-collector/primitives";
import type { PollAdapter } from "./types.ts";

interface SimulatedAdapterOptions {
  clock: Clock;
  quote: string;
  seed?: number;
  startPrices?: Record<string, number>;
  firstRound?: number;
}

const DEFAULT_START_PRICES: Record<string, number> = {
  BTC: 50_000,
  ETH: 3_000,
  SOL: 100,
};

const DEFAULT_START_PRICE = 100;
const FIRST_ROUND = 1000;

const mulberry32 = (seed: number): (() => number) => {
  let state = seed;

  return () => {
    state += 0x6d2b79f5;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

/**
 * Random walk per symbol with a round counter, standing in for an oracle
 * when no network source is configured. Each step moves at most 1% of the
 * starting price.
 */
export class SimulatedAdapter implements PollAdapter {
  readonly kind = "simulated";
  private readonly options: SimulatedAdapterOptions;
  private readonly rng: () => number;
  private readonly prices = new Map<string, number>();
  private readonly rounds = new Map<string, number>();
  private readonly steps = new Map<string, number>();

  constructor(options: SimulatedAdapterOptions) {
    this.options = options;
    this.rng = mulberry32(options.seed ?? Date.now());
  }

  async connect(): Promise<void> {
    // nothing derived from the endpoint
  }

  async poll(symbol: string): Promise<RawObservation> {
    const base = baseOf(symbol, this.options.quote);
    const current = this.prices.get(base) ?? this.startPrice(base);
    const step = this.steps.get(base) ?? current * 0.01;
    this.steps.set(base, step);

    const next = Math.max(0.01, current + (this.rng() - 0.5) * 2 * step);
    this.prices.set(base, next);

    const round =
      (this.rounds.get(base) ?? this.options.firstRound ?? FIRST_ROUND) + 1;
    this.rounds.set(base, round);

    return {
      symbol: normalizeSymbol(base, this.options.quote),
      price: next,
      observedAt: this.options.clock(),
      sequenceId: round,
    };
  }

  private startPrice(base: string): number {
    return (
      this.options.startPrices?.[base] ??
      DEFAULT_START_PRICES[base] ??
      DEFAULT_START_PRICE
    );
  }
}
