import nodeFs from "node:fs/promises";
import path from "node:path";
import { decodeStore } from "@price-collector/primitives";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { DurableLog, type StoreFs } from "../durable-log.ts";
import { StorageIOError } from "../errors.ts";
import { createSilentLogger } from "../logger.ts";
import { MemoryBuffer } from "../memory-buffer.ts";
import { RetentionReaper } from "../retention-reaper.ts";
import { fakeClock, makeTempDir, observation, removeTempDir } from "./helpers.ts";

const logger = createSilentLogger();
const NOW = 100_000;
const TWELVE_HOURS = 12 * 3600;

describe("RetentionReaper", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await makeTempDir();
  });

  afterEach(async () => {
    vi.useRealTimers();
    await removeTempDir(dataDir);
  });

  async function readStore() {
    return decodeStore(
      await nodeFs.readFile(path.join(dataDir, "prices.json"), "utf-8"),
    );
  }

  async function setup(fs?: StoreFs, reaperLogger = logger) {
    const time = fakeClock(NOW);
    const memory = new MemoryBuffer({ maxAgeSeconds: 60, clock: time.clock });
    const durable = new DurableLog({ dataDir, logger, fs });
    await durable.open();
    const reaper = new RetentionReaper({
      memory,
      durable,
      clock: time.clock,
      logger: reaperLogger,
      retentionSeconds: TWELVE_HOURS,
      intervalMs: 600_000,
    });
    return { time, memory, durable, reaper };
  }

  test("trims both tiers and reports the counts", async () => {
    const { time, memory, durable, reaper } = await setup();
    for (let i = 0; i < 10; i += 1) {
      await durable.append(
        observation({ sequenceId: i + 1, ingestedAt: NOW - TWELVE_HOURS - 1 - i }),
      );
    }
    await durable.append(observation({ sequenceId: 100, ingestedAt: NOW - 10 }));
    await durable.append(observation({ sequenceId: 101, ingestedAt: NOW - TWELVE_HOURS }));

    time.set(NOW - 100);
    for (let i = 0; i < 3; i += 1) {
      memory.add(observation({ symbol: "ETHUSD", sequenceId: i + 1, ingestedAt: NOW - 100 }));
    }
    time.set(NOW);
    memory.add(observation({ sequenceId: 100, ingestedAt: NOW }));

    const result = await reaper.sweep();

    expect(result).toEqual({ memory: 3, durable: 10 });
    expect(reaper.getLastResult()).toEqual(result);
    expect(memory.size()).toBe(1);
    expect(durable.size()).toBe(2);
  });

  test("a sweep with nothing to do removes nothing", async () => {
    const { durable, reaper } = await setup();
    await durable.append(observation({ sequenceId: 1, ingestedAt: NOW }));

    expect(await reaper.sweep()).toEqual({ memory: 0, durable: 0 });
  });

  test("surfaces storage failures from the durable prune", async () => {
    let failWrites = false;
    const flaky: StoreFs = {
      readFile: nodeFs.readFile,
      mkdir: nodeFs.mkdir,
      rename: nodeFs.rename,
      rm: nodeFs.rm,
      writeFile: async (...args: Parameters<typeof nodeFs.writeFile>) => {
        if (failWrites) {
          throw new Error("read-only filesystem");
        }
        return nodeFs.writeFile(...args);
      },
    };
    const { durable, reaper } = await setup(flaky);
    await durable.append(observation({ sequenceId: 1, ingestedAt: 0 }));

    failWrites = true;
    await expect(reaper.sweep()).rejects.toBeInstanceOf(StorageIOError);
  });

  test("stop is safe when never started", async () => {
    const { reaper } = await setup();
    await expect(reaper.stop()).resolves.toBeUndefined();
  });

  test("a failed scheduled sweep is logged and the next interval retries it", async () => {
    vi.useFakeTimers({ toFake: ["setInterval", "clearInterval"] });
    let failWrites = false;
    const flaky: StoreFs = {
      readFile: nodeFs.readFile,
      mkdir: nodeFs.mkdir,
      rename: nodeFs.rename,
      rm: nodeFs.rm,
      writeFile: async (...args: Parameters<typeof nodeFs.writeFile>) => {
        if (failWrites) {
          throw new Error("read-only filesystem");
        }
        return nodeFs.writeFile(...args);
      },
    };
    const reaperLogger = createSilentLogger();
    const errorSpy = vi.spyOn(reaperLogger, "error");
    const { durable, reaper } = await setup(flaky, reaperLogger);
    await durable.append(observation({ sequenceId: 1, ingestedAt: 0 }));
    await durable.append(observation({ sequenceId: 2, ingestedAt: NOW }));

    failWrites = true;
    reaper.start();
    await vi.advanceTimersByTimeAsync(600_000);
    await vi.waitFor(() => expect(errorSpy).toHaveBeenCalledTimes(1));
    expect(errorSpy).toHaveBeenCalledWith(
      { error: "Failed to persist price store: read-only filesystem" },
      "retention sweep failed",
    );
    expect(reaper.getLastResult()).toBeNull();
    expect((await readStore()).records.map((record) => record.sequenceId)).toEqual([1, 2]);

    failWrites = false;
    await vi.advanceTimersByTimeAsync(600_000);
    await vi.waitFor(() => expect(reaper.getLastResult()).toEqual({ memory: 0, durable: 0 }));
    expect((await readStore()).records.map((record) => record.sequenceId)).toEqual([2]);
    expect(errorSpy).toHaveBeenCalledTimes(1);

    await reaper.stop();
  });

  test("stop waits for a sweep that is already underway", async () => {
    vi.useFakeTimers({ toFake: ["setInterval", "clearInterval"] });
    let holdWrites = false;
    let heldWrites = 0;
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const gated: StoreFs = {
      readFile: nodeFs.readFile,
      mkdir: nodeFs.mkdir,
      rename: nodeFs.rename,
      rm: nodeFs.rm,
      writeFile: async (...args: Parameters<typeof nodeFs.writeFile>) => {
        if (holdWrites) {
          heldWrites += 1;
          await gate;
        }
        return nodeFs.writeFile(...args);
      },
    };
    const { durable, reaper } = await setup(gated);
    await durable.append(observation({ sequenceId: 1, ingestedAt: 0 }));

    holdWrites = true;
    reaper.start();
    await vi.advanceTimersByTimeAsync(600_000);
    await vi.waitFor(() => expect(heldWrites).toBe(1));

    let stopped = false;
    const stopping = reaper.stop().then(() => {
      stopped = true;
    });
    await new Promise((resolve) => setImmediate(resolve));
    expect(stopped).toBe(false);
    expect(vi.getTimerCount()).toBe(0);

    release();
    await stopping;
    expect(reaper.getLastResult()).toEqual({ memory: 0, durable: 1 });
    expect((await readStore()).records).toEqual([]);
  });
});
