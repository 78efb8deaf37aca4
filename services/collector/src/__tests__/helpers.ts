import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { Clock, PriceObservation } from "@price-collector/primitives";

export interface FakeClock {
  clock: Clock;
  set(seconds: number): void;
  advance(seconds: number): void;
}

export function fakeClock(start: number): FakeClock {
  let now = start;
  return {
    clock: () => now,
    set: (seconds) => {
      now = seconds;
    },
    advance: (seconds) => {
      now += seconds;
    },
  };
}

export function observation(
  overrides: Partial<PriceObservation> = {},
): PriceObservation {
  return {
    symbol: "BTCUSD",
    price: 50_000,
    observedAt: 1_000,
    sequenceId: 1,
    ingestedAt: 1_000,
    ...overrides,
  };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(tmpdir(), "price-collector-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
