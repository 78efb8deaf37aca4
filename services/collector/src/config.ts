import { z } from "zod";

const FEED_KINDS = ["simulated", "rpc", "push"] as const;
export type FeedKind = (typeof FEED_KINDS)[number];

const DEFAULT_CHAINLINK_FEEDS = [
  "BTC=0xc907E116054Ad103354f2D350FD2514433D57F6f",
  "ETH=0xF9680D99D6C9589e2a93a78A04A279e509205945",
  "SOL=0x10C8264C0935b3B9870013e057f330Ff3e9C56dC",
].join(",");

const commaList = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim())
      .filter(Boolean),
  );

const feedAddresses = z.string().transform((value, ctx) => {
  const feeds: Record<string, string> = {};
  for (const entry of value.split(",").map((item) => item.trim())) {
    if (!entry) continue;
    const [symbol, address] = entry.split("=").map((part) => part.trim());
    if (!symbol || !address || !/^0x[0-9a-fA-F]{40}$/.test(address)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected SYMBOL=0xaddress, received "${entry}"`,
      });
      return z.NEVER;
    }
    feeds[symbol.toUpperCase()] = address;
  }
  return feeds;
});

const configSchema = z.object({
  PORT: z.coerce.number().int().default(3000),
  FEED_SOURCES: commaList
    .pipe(z.array(z.enum(FEED_KINDS)).min(1))
    .default("simulated"),
  SYMBOLS: commaList.pipe(z.array(z.string()).min(1)).default("BTC,ETH,SOL"),
  QUOTE_CURRENCY: z.string().min(1).default("USD"),
  COLLECTION_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  RPC_ENDPOINTS: commaList
    .pipe(z.array(z.string().url()).min(1))
    .default("https://polygon-rpc.com"),
  CHAINLINK_FEEDS: feedAddresses.default(DEFAULT_CHAINLINK_FEEDS),
  RPC_MAX_RETRIES: z.coerce.number().int().positive().default(3),
  RPC_BACKOFF_BASE_MS: z.coerce.number().int().positive().default(1000),
  RPC_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  PUSH_FEED_URL: z.string().url().default("wss://ws-live-data.polymarket.com"),
  PUSH_FEED_TOPIC: z.string().min(1).default("crypto_prices_chainlink"),
  PUSH_PING_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
  PUSH_RECONNECT_DELAY_MS: z.coerce.number().int().positive().default(5_000),
  BUFFER_MAX_AGE_SECONDS: z.coerce.number().int().positive().default(60),
  DATA_RETENTION_HOURS: z.coerce.number().positive().default(12),
  CLEANUP_INTERVAL_SECONDS: z.coerce.number().int().positive().default(600),
  DATA_DIR: z.string().default("data"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info"),
});

export type CollectorConfig = z.infer<typeof configSchema>;

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): CollectorConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    throw new Error(
      `Invalid collector configuration: ${JSON.stringify(issues, null, 2)}`,
    );
  }
  return result.data;
}
