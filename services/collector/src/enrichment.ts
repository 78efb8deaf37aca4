import { type Clock, formatTime } from "@price-collector/primitives";
import { z } from "zod";
import { errorMessage, SourceUnavailableError } from "./errors.ts";
import type { Logger } from "./logger.ts";

const TIMESTAMP_LINE = /^(\d{2})\/(\d{2})\/(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

const enrichmentConfigSchema = z.object({
  COLLECTOR_URL: z.string().url().default("http://localhost:3000"),
  LOCAL_UTC_OFFSET_HOURS: z.coerce.number().min(-12).max(14).default(3),
  ENRICH_SYMBOLS: z
    .string()
    .transform((value) =>
      value
        .split(",")
        .map((item) => item.trim().toUpperCase())
        .filter(Boolean),
    )
    .pipe(z.array(z.string()).min(1))
    .default("BTC,ETH,SOL"),
  ENRICH_TOLERANCE_SECONDS: z.coerce.number().int().nonnegative().default(300),
  ENRICH_BATCH_SIZE: z.coerce.number().int().positive().default(50),
  ENRICH_BATCH_PAUSE_MS: z.coerce.number().int().nonnegative().default(1000),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info"),
});

export type EnrichmentConfig = z.infer<typeof enrichmentConfigSchema>;

export function loadEnrichmentConfig(
  env: Record<string, string | undefined> = process.env,
): EnrichmentConfig {
  const result = enrichmentConfigSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    throw new Error(
      `Invalid enrichment configuration: ${JSON.stringify(issues, null, 2)}`,
    );
  }
  return result.data;
}

/**
 * Parses `MM/DD/YY HH:MM:SS` written in a fixed UTC offset and returns
 * epoch seconds. Two-digit years below 69 are 20xx, the rest 19xx.
 */
export function parseTradeTimestamp(
  line: string,
  utcOffsetHours: number,
): number | null {
  const match = TIMESTAMP_LINE.exec(line.trim());
  if (!match) {
    return null;
  }
  const [month, day, shortYear, hour, minute, second] = match
    .slice(1)
    .map((part) => Number.parseInt(part, 10));
  const year = shortYear < 69 ? 2000 + shortYear : 1900 + shortYear;

  const ms = Date.UTC(year, month - 1, day, hour, minute, second);
  const check = new Date(ms);
  if (
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    return null;
  }
  return ms / 1000 - Math.round(utcOffsetHours * 3600);
}

export interface TimestampFile {
  total: number;
  invalid: string[];
  /** Sorted, without duplicates. */
  unique: number[];
}

export function readTimestamps(
  content: string,
  utcOffsetHours: number,
): TimestampFile {
  const seen = new Set<number>();
  const invalid: string[] = [];
  let total = 0;

  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line) continue;
    const timestamp = parseTradeTimestamp(line, utcOffsetHours);
    if (timestamp === null) {
      invalid.push(line);
      continue;
    }
    total += 1;
    seen.add(timestamp);
  }

  return {
    total,
    invalid,
    unique: [...seen].sort((a, b) => a - b),
  };
}

const priceResponseSchema = z.object({ price: z.number() });

interface PriceApiClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export class PriceApiClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: PriceApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /** Null when the collector has nothing within tolerance. */
  async getPriceAt(
    symbol: string,
    timestamp: number,
    tolerance: number,
  ): Promise<number | null> {
    const url = new URL(
      `${this.baseUrl}/collector/price/${encodeURIComponent(symbol)}`,
    );
    url.searchParams.set("timestamp", String(timestamp));
    url.searchParams.set("tolerance", String(tolerance));

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new SourceUnavailableError(
        `Price request failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      throw new SourceUnavailableError(
        `Collector returned ${response.status} for ${symbol}`,
      );
    }

    const parsed = priceResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new SourceUnavailableError(`Unexpected price response for ${symbol}`);
    }
    return parsed.data.price;
  }
}

export interface AnnotatedTrade {
  timestamp: number;
  utc: string;
  prices: Record<string, number | null>;
}

export interface EnrichmentReport {
  metadata: {
    input_file: string;
    total_timestamps: number;
    unique_timestamps: number;
    invalid_lines: number;
    timestamps_with_prices: number;
    price_coverage: number;
    prices_found: Record<string, number>;
    local_utc_offset_hours: number;
    tolerance_seconds: number;
    generated_at: string;
  };
  trades: AnnotatedTrade[];
}

interface AnnotateOptions {
  inputFile: string;
  file: TimestampFile;
  client: Pick<PriceApiClient, "getPriceAt">;
  symbols: readonly string[];
  toleranceSeconds: number;
  utcOffsetHours: number;
  batchSize: number;
  batchPauseMs: number;
  clock: Clock;
  sleep: (ms: number) => Promise<void>;
  logger: Logger;
}

export async function annotateTimestamps(
  options: AnnotateOptions,
): Promise<EnrichmentReport> {
  const { file, symbols, client, logger } = options;
  const trades: AnnotatedTrade[] = [];
  const found: Record<string, number> = Object.fromEntries(
    symbols.map((symbol) => [symbol, 0]),
  );

  for (let start = 0; start < file.unique.length; start += options.batchSize) {
    const batch = file.unique.slice(start, start + options.batchSize);
    logger.info(
      {
        batch: start / options.batchSize + 1,
        batches: Math.ceil(file.unique.length / options.batchSize),
        size: batch.length,
      },
      "processing batch",
    );

    for (const timestamp of batch) {
      const prices: Record<string, number | null> = {};
      for (const symbol of symbols) {
        try {
          prices[symbol] = await client.getPriceAt(
            symbol,
            timestamp,
            options.toleranceSeconds,
          );
        } catch (error) {
          logger.warn(
            { error: errorMessage(error), symbol, timestamp },
            "price lookup failed",
          );
          prices[symbol] = null;
        }
        if (prices[symbol] !== null) {
          found[symbol] += 1;
        }
      }
      trades.push({ timestamp, utc: formatTime(timestamp, "UTC"), prices });
    }

    if (start + options.batchSize < file.unique.length) {
      await options.sleep(options.batchPauseMs);
    }
  }

  const withPrices = trades.filter((trade) =>
    Object.values(trade.prices).some((price) => price !== null),
  ).length;

  return {
    metadata: {
      input_file: options.inputFile,
      total_timestamps: file.total,
      unique_timestamps: file.unique.length,
      invalid_lines: file.invalid.length,
      timestamps_with_prices: withPrices,
      price_coverage: file.unique.length > 0 ? withPrices / file.unique.length : 0,
      prices_found: found,
      local_utc_offset_hours: options.utcOffsetHours,
      tolerance_seconds: options.toleranceSeconds,
      generated_at: new Date(options.clock() * 1000).toISOString(),
    },
    trades,
  };
}

export function defaultOutputPath(inputFile: string): string {
  return inputFile.endsWith(".txt")
    ? inputFile.replace(/\.txt$/, "_with_prices.json")
    : `${inputFile}_with_prices.json`;
}
