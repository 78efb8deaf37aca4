/**
 * One price sample as produced by an upstream source, before the pipeline
 * has accepted it. The symbol may not be canonical yet.
 */
export interface RawObservation {
  symbol: string;
  price: number;
  /**
   * Seconds since epoch (UTC) at which the source considers the price valid.
   */
  observedAt: number;
  /**
   * Source round id, or 0 when the source has none.
   */
  sequenceId: number;
}

export interface PriceObservation extends RawObservation {
  /**
   * Wall-clock seconds at which the pipeline accepted the sample.
   */
  ingestedAt: number;
}

export type StorageTier = "memory" | "durable";

export interface EasternTimeParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  formatted: string;
}

export interface TimeInfo {
  utc: string;
  et: string;
  etParts: EasternTimeParts;
}

export interface PriceMatch {
  observation: PriceObservation;
  tier: StorageTier;
  requestedAt: number | null;
  timeInfo: TimeInfo;
}

/** Seconds since epoch. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export const DEFAULT_STORE_VERSION = 1;
