import { describe, expect, test } from "vitest";
import { loadConfig } from "../config.ts";
import { createServiceContext } from "../context.ts";
import { createSilentLogger } from "../logger.ts";
import { createFeed } from "../sources/index.ts";

const context = createServiceContext(
  loadConfig({
    SYMBOLS: "BTC,ETH,DOGE",
    RPC_ENDPOINTS: "https://rpc-a.test,https://rpc-b.test",
    PUSH_FEED_URL: "ws://127.0.0.1:1",
  }),
  createSilentLogger(),
  { clock: () => 1_000 },
);

describe("createFeed", () => {
  test("builds a polling feed over the rpc endpoint pool", () => {
    const feed = createFeed("rpc", context, () => {});
    expect(feed.name).toBe("rpc");
    expect(feed.status()).toEqual({
      name: "rpc",
      kind: "rpc",
      connected: false,
      lastObservationAt: null,
      errors: 0,
      detail: {
        endpoint: "https://rpc-a.test",
        cursor: 0,
        rotations: 0,
        skipped: 0,
        symbols: ["BTC", "ETH"],
      },
    });
  });

  test("matches rpc feeds for symbols written with a quote suffix", () => {
    const quoted = createServiceContext(
      loadConfig({
        SYMBOLS: "BTCUSD,eth/usd,DOGE-USDT",
        RPC_ENDPOINTS: "https://rpc-a.test",
      }),
      createSilentLogger(),
      { clock: () => 1_000 },
    );
    const feed = createFeed("rpc", quoted, () => {});
    expect(feed.status().detail).toMatchObject({ symbols: ["BTCUSD", "eth/usd"] });
  });

  test("builds a polling feed over the simulated source", () => {
    const feed = createFeed("simulated", context, () => {});
    expect(feed.status()).toMatchObject({
      kind: "simulated",
      detail: { endpoint: "simulated://local" },
    });
  });

  test("builds a push feed without connecting", () => {
    const feed = createFeed("push", context, () => {});
    expect(feed.status()).toEqual({
      name: "push",
      kind: "push",
      connected: false,
      lastObservationAt: null,
      errors: 0,
      detail: { url: "ws://127.0.0.1:1", reconnects: 0, dropped: 0 },
    });
  });
});
