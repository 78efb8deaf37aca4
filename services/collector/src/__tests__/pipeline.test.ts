import nodeFs from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { DurableLog, type StoreFs } from "../durable-log.ts";
import { createSilentLogger } from "../logger.ts";
import { MemoryBuffer } from "../memory-buffer.ts";
import { IngestionPipeline } from "../pipeline.ts";
import { fakeClock, makeTempDir, removeTempDir } from "./helpers.ts";

const logger = createSilentLogger();

describe("IngestionPipeline", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dataDir);
  });

  async function setup(fs?: StoreFs) {
    const time = fakeClock(2_000);
    const memory = new MemoryBuffer({ maxAgeSeconds: 60, clock: time.clock });
    const durable = new DurableLog({ dataDir, logger, fs });
    await durable.open();
    const pipeline = new IngestionPipeline({
      memory,
      durable,
      clock: time.clock,
      logger,
      quote: "USD",
      symbols: ["BTCUSD", "ETHUSD"],
    });
    return { time, memory, durable, pipeline };
  }

  test("normalizes and writes through to both tiers", async () => {
    const { memory, durable, pipeline } = await setup();

    const result = pipeline.accept({
      symbol: "btc/usdt",
      price: 64_000,
      observedAt: 1_990,
      sequenceId: 5,
    });
    await pipeline.drain();

    expect(result).toBe("accepted");
    expect(memory.latest("BTCUSD")).toEqual({
      symbol: "BTCUSD",
      price: 64_000,
      observedAt: 1_990,
      sequenceId: 5,
      ingestedAt: 2_000,
    });
    expect(durable.has("BTCUSD", 5)).toBe(true);
    expect(pipeline.lastSeenBySymbol()).toEqual({ BTCUSD: 1_990 });
  });

  test("drops a repeated sequence id without writing", async () => {
    const { memory, pipeline } = await setup();
    const raw = { symbol: "ETH", price: 3_000, observedAt: 1_995, sequenceId: 9 };

    expect(pipeline.accept(raw)).toBe("accepted");
    expect(pipeline.accept({ ...raw, price: 3_001 })).toBe("duplicate");
    await pipeline.drain();

    expect(memory.size()).toBe(1);
    expect(memory.latest("ETHUSD")?.price).toBe(3_000);
    expect(pipeline.getStats()).toMatchObject({ accepted: 1, duplicates: 1 });
  });

  test("always inserts observations without a sequence id", async () => {
    const { memory, durable, pipeline } = await setup();

    expect(pipeline.accept({ symbol: "BTC", price: 1, observedAt: 1_998, sequenceId: 0 })).toBe("accepted");
    expect(pipeline.accept({ symbol: "BTC", price: 1, observedAt: 1_998, sequenceId: 0 })).toBe("accepted");
    await pipeline.drain();

    expect(memory.size()).toBe(2);
    expect(durable.size()).toBe(2);
  });

  test("rejects invalid observations", async () => {
    const { memory, pipeline } = await setup();

    expect(pipeline.accept({ symbol: "DOGE", price: 1, observedAt: 1, sequenceId: 1 })).toBe("rejected");
    expect(pipeline.accept({ symbol: "  ", price: 1, observedAt: 1, sequenceId: 1 })).toBe("rejected");
    expect(pipeline.accept({ symbol: "BTC", price: -5, observedAt: 1, sequenceId: 1 })).toBe("rejected");
    expect(pipeline.accept({ symbol: "BTC", price: Number.NaN, observedAt: 1, sequenceId: 1 })).toBe("rejected");
    expect(pipeline.accept({ symbol: "BTC", price: 1, observedAt: Number.POSITIVE_INFINITY, sequenceId: 1 })).toBe("rejected");
    expect(pipeline.accept({ symbol: "BTC", price: 1, observedAt: 1, sequenceId: 1.5 })).toBe("rejected");

    expect(memory.size()).toBe(0);
    expect(pipeline.getStats().rejected).toBe(6);
  });

  test("rejects a symbol with nothing before its separator", async () => {
    const time = fakeClock(2_000);
    const memory = new MemoryBuffer({ maxAgeSeconds: 60, clock: time.clock });
    const durable = new DurableLog({ dataDir, logger });
    await durable.open();
    const unrestricted = new IngestionPipeline({ memory, durable, clock: time.clock, logger, quote: "USD" });

    expect(unrestricted.accept({ symbol: "/btc", price: 1, observedAt: 1, sequenceId: 1 })).toBe("rejected");
    expect(unrestricted.accept({ symbol: "-usd", price: 1, observedAt: 1, sequenceId: 2 })).toBe("rejected");
    expect(memory.size()).toBe(0);
    expect(memory.latest("USD")).toBeNull();
  });

  test("keeps the memory write when persistence fails", async () => {
    const failing: StoreFs = {
      readFile: nodeFs.readFile,
      mkdir: nodeFs.mkdir,
      rename: nodeFs.rename,
      rm: nodeFs.rm,
      writeFile: async () => {
        throw new Error("disk full");
      },
    };
    await nodeFs.writeFile(`${dataDir}/prices.json`, "", "utf-8");
    const { memory, pipeline } = await setup(failing);

    expect(pipeline.accept({ symbol: "BTC", price: 2, observedAt: 1_999, sequenceId: 3 })).toBe("accepted");
    await pipeline.drain();

    expect(memory.latest("BTCUSD")?.price).toBe(2);
    expect(pipeline.getStats()).toMatchObject({
      accepted: 1,
      persistFailures: 1,
      pendingWrites: 0,
    });
  });
});
