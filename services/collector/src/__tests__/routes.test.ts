import { once } from "node:events";
import type { Server } from "node:http";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { createApp } from "../app.ts";
import { CollectorService } from "../collector-service.ts";
import { loadConfig } from "../config.ts";
import { createServiceContext } from "../context.ts";
import { createSilentLogger } from "../logger.ts";
import { fakeClock, makeTempDir, removeTempDir } from "./helpers.ts";

// 2024-01-15 12:30:00 UTC
const NOW = 1_705_321_800;

describe("collector routes", () => {
  let dataDir: string;
  let service: CollectorService;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    dataDir = await makeTempDir();
    const config = loadConfig({ DATA_DIR: dataDir, SYMBOLS: "BTC,ETH", LOG_LEVEL: "silent" });
    const logger = createSilentLogger();
    const time = fakeClock(NOW);
    service = new CollectorService(
      createServiceContext(config, logger, { clock: time.clock }),
      { feeds: () => [] },
    );
    await service.start();

    server = createApp(service.engine, config, logger).listen(0);
    await once(server, "listening");
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("expected a TCP address");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await service.stop();
    await removeTempDir(dataDir);
  });

  async function get(path: string) {
    const response = await fetch(`${baseUrl}${path}`);
    return { status: response.status, body: await response.json() };
  }

  function seed() {
    service.pipeline.accept({ symbol: "BTC", price: 42_000, observedAt: NOW, sequenceId: 11 });
  }

  test("returns the price closest to a timestamp", async () => {
    seed();

    const { status, body } = await get(`/collector/price/btc?timestamp=${NOW + 20}`);

    expect(status).toBe(200);
    expect(body).toEqual({
      symbol: "BTCUSD",
      price: 42_000,
      timestamp: NOW,
      requested_timestamp: NOW + 20,
      round_id: 11,
      source: "memory",
      time_info: {
        utc: "2024-01-15 12:30:00 UTC",
        et: "2024-01-15 07:30:00 EST",
      },
    });
  });

  test("honors the tolerance parameter", async () => {
    seed();

    const { status, body } = await get(`/collector/price/BTC?timestamp=${NOW + 20}&tolerance=10`);

    expect(status).toBe(404);
    expect(body).toEqual({
      error: `No price found for BTCUSD at timestamp ${NOW + 20} (±10s)`,
    });
  });

  test("rejects unsupported symbols", async () => {
    const { status, body } = await get(`/collector/price/DOGE?timestamp=${NOW}`);
    expect(status).toBe(400);
    expect(body).toEqual({ error: "Unsupported symbol: DOGE" });
  });

  test("rejects missing or malformed parameters", async () => {
    expect(await get("/collector/price/BTC")).toEqual({
      status: 400,
      body: { error: "timestamp parameter required" },
    });
    expect(await get("/collector/price/BTC?timestamp=soon")).toEqual({
      status: 400,
      body: { error: "Invalid timestamp" },
    });
    expect(await get(`/collector/price/BTC?timestamp=${NOW}&tolerance=-1`)).toEqual({
      status: 400,
      body: { error: "Invalid tolerance" },
    });
  });

  test("lists the latest price per symbol", async () => {
    seed();

    const { status, body } = await get("/collector/latest");

    expect(status).toBe(200);
    expect(body).toEqual({
      source: "collector",
      prices: [
        {
          symbol: "BTCUSD",
          price: 42_000,
          timestamp: NOW,
          round_id: 11,
          source: "memory",
          time_info: {
            utc: "2024-01-15 12:30:00 UTC",
            et: "2024-01-15 07:30:00 EST",
          },
        },
      ],
    });
  });

  test("reports health", async () => {
    seed();

    const { status, body } = await get("/collector/health");

    expect(status).toBe(200);
    expect(body).toMatchObject({
      status: "ok",
      timestamp: NOW,
      symbols: ["BTCUSD", "ETHUSD"],
      lastSeen: { BTCUSD: NOW },
      feeds: [],
      tiers: { memory: { entries: 1, maxAgeSeconds: 60 }, durable: { entries: 1 } },
      time_info: { utc: "2024-01-15 12:30:00 UTC" },
    });
  });

  test("describes the current time and retention", async () => {
    const { body } = await get("/collector/timezones");

    expect(body).toEqual({
      current_timestamp: NOW,
      time_info: {
        utc: "2024-01-15 12:30:00 UTC",
        et: "2024-01-15 07:30:00 EST",
        buffer_max_age_seconds: 60,
        data_retention_hours: 12,
      },
    });
  });

  test("hides internal failures behind a 503", async () => {
    vi.spyOn(service.engine, "latest").mockImplementation(() => {
      throw new Error("index corrupted");
    });

    expect(await get("/collector/latest")).toEqual({
      status: 503,
      body: { error: "Service unavailable" },
    });
  });
});
