import type { PriceObservation } from "@price-collector/primitives";

/**
 * Picks the observation whose `observedAt` is nearest to `targetTs`, within
 * `tolerance` seconds. `candidates` must be in ingestion order: on equal
 * distance the later entry wins.
 */
export function closestTo(
  candidates: readonly PriceObservation[],
  targetTs: number,
  tolerance: number,
): PriceObservation | null {
  let best: PriceObservation | null = null;
  let bestDistance = Number.POSITIVE_INFINITY;

  for (const candidate of candidates) {
    const distance = Math.abs(candidate.observedAt - targetTs);
    if (distance > tolerance) {
      continue;
    }
    if (distance <= bestDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }

  return best;
}
