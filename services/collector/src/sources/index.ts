import { baseOf } from "@price-collector/primitives";
import type { FeedKind } from "../config.ts";
import type { ServiceContext } from "../context.ts";
import { FailoverController } from "../failover-controller.ts";
import { ChainlinkRpcAdapter } from "./chainlink-rpc.ts";
import { PollingFeed } from "./polling-feed.ts";
import { PushFeedAdapter } from "./push-feed.ts";
import { SimulatedAdapter } from "./simulated.ts";
import type { ObservationSink, PollAdapter, PriceFeed } from "./types.ts";

export type { FeedStatus, ObservationSink, PollAdapter, PriceFeed } from "./types.ts";

const SIMULATED_ENDPOINT = "simulated://local";

export function createFeed(
  kind: FeedKind,
  context: ServiceContext,
  sink: ObservationSink,
): PriceFeed {
  const { config, clock } = context;
  const logger = context.logger.child({ feed: kind });

  if (kind === "push") {
    return new PushFeedAdapter({
      url: config.PUSH_FEED_URL,
      topic: config.PUSH_FEED_TOPIC,
      quote: config.QUOTE_CURRENCY,
      pingIntervalMs: config.PUSH_PING_INTERVAL_MS,
      reconnectDelayMs: config.PUSH_RECONNECT_DELAY_MS,
      clock,
      logger,
      sink,
    });
  }

  let adapter: PollAdapter;
  let endpoints: string[];
  let symbols = config.SYMBOLS;
  if (kind === "rpc") {
    adapter = new ChainlinkRpcAdapter({
      feeds: config.CHAINLINK_FEEDS,
      quote: config.QUOTE_CURRENCY,
      timeoutMs: config.RPC_TIMEOUT_MS,
      logger,
    });
    endpoints = config.RPC_ENDPOINTS;
    symbols = symbols.filter(
      (symbol) => baseOf(symbol, config.QUOTE_CURRENCY) in config.CHAINLINK_FEEDS,
    );
  } else {
    adapter = new SimulatedAdapter({ clock, quote: config.QUOTE_CURRENCY });
    endpoints = [SIMULATED_ENDPOINT];
  }

  const controller = new FailoverController({
    adapter,
    endpoints,
    maxRetries: config.RPC_MAX_RETRIES,
    backoffBaseMs: config.RPC_BACKOFF_BASE_MS,
    logger,
    sleep: context.sleep,
  });

  return new PollingFeed({
    name: kind,
    kind: adapter.kind,
    controller,
    symbols,
    intervalMs: config.COLLECTION_INTERVAL_MS,
    clock,
    logger,
    sink,
  });
}
