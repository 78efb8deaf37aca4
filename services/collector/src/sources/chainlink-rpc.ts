import {
  baseOf,
  normalizeSymbol,
  type RawObservation,
} from "@price-collector/primitives";
import { z } from "zod";
import {
  errorMessage,
  ProtocolError,
  RateLimitedError,
  SourceUnavailableError,
} from "../errors.ts";
import type { Logger } from "../logger.ts";
import type { PollAdapter } from "./types.ts";

// 4-byte selectors of the aggregator interface
const SELECTOR_DECIMALS = "0x313ce567";
const SELECTOR_LATEST_ROUND_DATA = "0xfeaf968c";

const RATE_LIMIT_CODES = new Set([-32005, -32029, -32090]);
const TWO_POW_255 = 1n << 255n;
const TWO_POW_256 = 1n << 256n;
const AGGREGATOR_ROUND_BITS = 64n;
const MAX_AGGREGATOR_ROUND = 1n << 32n;

const rpcResponseSchema = z.union([
  z.object({ result: z.string().regex(/^0x[0-9a-fA-F]*$/) }),
  z.object({
    error: z.object({ code: z.number(), message: z.string() }),
  }),
]);

export interface RoundData {
  roundId: bigint;
  answer: bigint;
  startedAt: bigint;
  updatedAt: bigint;
  answeredInRound: bigint;
}

interface ChainlinkRpcAdapterOptions {
  /** Base symbol to aggregator contract address. */
  feeds: Record<string, string>;
  quote: string;
  timeoutMs: number;
  logger: Logger;
  fetch?: typeof fetch;
}

/**
 * Reads Chainlink aggregators over plain JSON-RPC `eth_call`. Decimals are
 * resolved per endpoint on `connect` and reused until the next rotation.
 */
export class ChainlinkRpcAdapter implements PollAdapter {
  readonly kind = "rpc";
  private readonly options: ChainlinkRpcAdapterOptions;
  private readonly fetchImpl: typeof fetch;
  private endpoint: string | null = null;
  private decimals = new Map<string, number>();
  private requestId = 0;

  constructor(options: ChainlinkRpcAdapterOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async connect(endpoint: string): Promise<void> {
    this.endpoint = null;
    this.decimals = new Map();

    const resolved = new Map<string, number>();
    for (const [base, address] of Object.entries(this.options.feeds)) {
      const word = await this.call(endpoint, address, SELECTOR_DECIMALS);
      resolved.set(base, Number(readWord(word, 0)));
    }

    this.decimals = resolved;
    this.endpoint = endpoint;
    this.options.logger.info(
      { endpoint, feeds: Object.keys(this.options.feeds) },
      "connected to rpc endpoint",
    );
  }

  async poll(symbol: string): Promise<RawObservation> {
    const base = baseOf(symbol, this.options.quote);
    const address = this.options.feeds[base];
    const decimals = this.decimals.get(base);
    if (!address || decimals === undefined) {
      throw new SourceUnavailableError(`No aggregator configured for ${base}`);
    }
    if (!this.endpoint) {
      throw new SourceUnavailableError("Not connected to an rpc endpoint");
    }

    const result = await this.call(
      this.endpoint,
      address,
      SELECTOR_LATEST_ROUND_DATA,
    );
    const round = decodeRoundData(result);
    if (round.answer < 0n) {
      throw new ProtocolError(`Negative answer for ${base}`);
    }

    return {
      symbol: normalizeSymbol(base, this.options.quote),
      price: scaleAnswer(round.answer, decimals),
      observedAt: Number(round.updatedAt),
      sequenceId: toSequenceId(round.roundId),
    };
  }

  private async call(
    endpoint: string,
    to: string,
    data: string,
  ): Promise<string> {
    this.requestId += 1;
    let response: Response;
    try {
      response = await this.fetchImpl(endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          jsonrpc: "2.0",
          id: this.requestId,
          method: "eth_call",
          params: [{ to, data }, "latest"],
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new SourceUnavailableError(
        `RPC request to ${endpoint} failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    if (response.status === 429) {
      throw new RateLimitedError(`RPC endpoint ${endpoint} returned 429`);
    }
    if (!response.ok) {
      throw new SourceUnavailableError(
        `RPC endpoint ${endpoint} returned ${response.status}`,
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new ProtocolError(
        `RPC endpoint ${endpoint} sent invalid JSON: ${errorMessage(error)}`,
      );
    }

    const parsed = rpcResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProtocolError(`Unexpected RPC response from ${endpoint}`);
    }
    if ("error" in parsed.data) {
      const { code, message } = parsed.data.error;
      if (RATE_LIMIT_CODES.has(code)) {
        throw new RateLimitedError(`RPC rate limit (${code}): ${message}`);
      }
      throw new SourceUnavailableError(`RPC error (${code}): ${message}`);
    }
    return parsed.data.result;
  }
}

function readWord(hex: string, index: number): bigint {
  const body = hex.startsWith("0x") ? hex.slice(2) : hex;
  const start = index * 64;
  if (body.length < start + 64) {
    throw new ProtocolError(
      `ABI result too short: expected word ${index}, got ${body.length / 2} bytes`,
    );
  }
  return BigInt(`0x${body.slice(start, start + 64)}`);
}

function toSigned(value: bigint): bigint {
  return value >= TWO_POW_255 ? value - TWO_POW_256 : value;
}

export function decodeRoundData(hex: string): RoundData {
  return {
    roundId: readWord(hex, 0),
    answer: toSigned(readWord(hex, 1)),
    startedAt: readWord(hex, 2),
    updatedAt: readWord(hex, 3),
    answeredInRound: readWord(hex, 4),
  };
}

export function scaleAnswer(answer: bigint, decimals: number): number {
  const divisor = 10n ** BigInt(decimals);
  const whole = answer / divisor;
  const fraction = answer % divisor;
  return Number(whole) + Number(fraction) / Number(divisor);
}

/**
 * Round ids pack a phase id above a 64-bit aggregator round and overflow
 * a double. Re-pack as phase * 2^32 + aggregator round so the id stays an
 * exact, ordered integer.
 */
export function toSequenceId(roundId: bigint): number {
  const phase = roundId >> AGGREGATOR_ROUND_BITS;
  const aggregatorRound = roundId & ((1n << AGGREGATOR_ROUND_BITS) - 1n);
  if (aggregatorRound >= MAX_AGGREGATOR_ROUND || phase >= 1n << 16n) {
    throw new ProtocolError(`Round id ${roundId} out of range`);
  }
  return Number(phase * MAX_AGGREGATOR_ROUND + aggregatorRound);
}
