import type { RawObservation } from "@price-collector/primitives";
import pLimit from "p-limit";
import { errorMessage, RateLimitedError } from "./errors.ts";
import type { Logger } from "./logger.ts";
import type { PollAdapter } from "./sources/types.ts";

export type PollOutcome =
  | { status: "ok"; observation: RawObservation; endpoint: string }
  | { status: "unavailable"; reason: string };

interface FailoverControllerOptions {
  adapter: PollAdapter;
  endpoints: readonly string[];
  maxRetries: number;
  backoffBaseMs: number;
  logger: Logger;
  sleep: (ms: number) => Promise<void>;
}

/**
 * Owns the endpoint pool of one poll adapter. Rate limits rotate to the next
 * endpoint; everything else ends the attempt. Calls are serialized so the
 * cursor only ever moves one step at a time.
 */
export class FailoverController {
  private readonly options: FailoverControllerOptions;
  private readonly limit = pLimit(1);
  private index = 0;
  private connectedTo: string | null = null;
  private rotations = 0;
  private failures = 0;

  constructor(options: FailoverControllerOptions) {
    if (options.endpoints.length === 0) {
      throw new Error("FailoverController needs at least one endpoint");
    }
    if (options.maxRetries < 1) {
      throw new Error("maxRetries must be at least 1");
    }
    this.options = options;
  }

  cursor(): number {
    return this.index;
  }

  currentEndpoint(): string {
    return this.options.endpoints[this.index];
  }

  isConnected(): boolean {
    return this.connectedTo !== null;
  }

  getStats() {
    return {
      endpoint: this.currentEndpoint(),
      cursor: this.index,
      connected: this.isConnected(),
      rotations: this.rotations,
      failures: this.failures,
    };
  }

  getLatest(symbol: string): Promise<PollOutcome> {
    return this.limit(() => this.attempt(symbol));
  }

  private async attempt(symbol: string): Promise<PollOutcome> {
    const { maxRetries, backoffBaseMs, logger } = this.options;
    let backoffMs = backoffBaseMs;

    for (let attempt = 1; attempt <= maxRetries; attempt += 1) {
      const endpoint = this.currentEndpoint();
      try {
        await this.ensureConnected();
        const observation = await this.options.adapter.poll(symbol);
        return { status: "ok", observation, endpoint };
      } catch (error) {
        if (!(error instanceof RateLimitedError)) {
          this.failures += 1;
          logger.error(
            { error: errorMessage(error), symbol, endpoint },
            "poll failed",
          );
          return { status: "unavailable", reason: errorMessage(error) };
        }

        logger.warn(
          { symbol, endpoint, attempt, maxRetries },
          "rate limited, rotating endpoint",
        );
        if (attempt === maxRetries) {
          break;
        }

        const rotated = await this.rotate();
        if (!rotated) {
          logger.warn({ backoffMs, endpoint }, "rotation failed, backing off");
          await this.options.sleep(backoffMs);
          backoffMs *= 2;
        }
      }
    }

    this.failures += 1;
    return {
      status: "unavailable",
      reason: `Rate limited on every attempt (${maxRetries})`,
    };
  }

  private async ensureConnected(): Promise<void> {
    const endpoint = this.currentEndpoint();
    if (this.connectedTo === endpoint) {
      return;
    }
    this.connectedTo = null;
    await this.options.adapter.connect(endpoint);
    this.connectedTo = endpoint;
  }

  /**
   * Moves the cursor forward and rebuilds the adapter's endpoint state. On
   * failure the cursor goes back and the previous endpoint is reconnected
   * lazily on the next attempt. A pool of one cannot rotate.
   */
  private async rotate(): Promise<boolean> {
    if (this.options.endpoints.length === 1) {
      return false;
    }
    const previous = this.index;
    this.index = (this.index + 1) % this.options.endpoints.length;
    try {
      await this.ensureConnected();
      this.rotations += 1;
      this.options.logger.info(
        { endpoint: this.currentEndpoint(), cursor: this.index },
        "rotated to next endpoint",
      );
      return true;
    } catch (error) {
      this.options.logger.warn(
        { error: errorMessage(error), endpoint: this.currentEndpoint() },
        "could not establish next endpoint",
      );
      this.index = previous;
      return false;
    }
  }
}
