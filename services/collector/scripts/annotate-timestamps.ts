#!/usr/bin/env npx tsx

/**
 * Trade Timestamp Annotator
 *
 * Reads trade times (`MM/DD/YY HH:MM:SS`, one per line, in the local UTC
 * offset) and asks a running collector for the price of each symbol at
 * every one of them.
 *
 * Usage:
 *   npx tsx scripts/annotate-timestamps.ts trades.txt
 *   npx tsx scripts/annotate-timestamps.ts trades.txt report.json
 *
 * Environment: COLLECTOR_URL, LOCAL_UTC_OFFSET_HOURS, ENRICH_SYMBOLS,
 * ENRICH_TOLERANCE_SECONDS, ENRICH_BATCH_SIZE, ENRICH_BATCH_PAUSE_MS
 */

import "dotenv/config";
import { readFile, writeFile } from "node:fs/promises";
import { systemClock } from "@price-collector/primitives";
import { wait } from "../src/context.ts";
import {
  annotateTimestamps,
  defaultOutputPath,
  loadEnrichmentConfig,
  PriceApiClient,
  readTimestamps,
} from "../src/enrichment.ts";
import { createLogger } from "../src/logger.ts";

async function main() {
  const [inputFile, outputArg] = process.argv.slice(2);
  if (!inputFile) {
    console.log("Usage: annotate-timestamps.ts <input.txt> [output.json]");
    process.exit(1);
  }

  const config = loadEnrichmentConfig();
  const logger = createLogger(config);

  const file = readTimestamps(await readFile(inputFile, "utf-8"), config.LOCAL_UTC_OFFSET_HOURS);
  logger.info(
    {
      inputFile,
      total: file.total,
      unique: file.unique.length,
      invalid: file.invalid.length,
    },
    "read timestamps",
  );
  for (const line of file.invalid) {
    logger.warn({ line }, "skipping unparseable line");
  }

  const report = await annotateTimestamps({
    inputFile,
    file,
    client: new PriceApiClient({ baseUrl: config.COLLECTOR_URL }),
    symbols: config.ENRICH_SYMBOLS,
    toleranceSeconds: config.ENRICH_TOLERANCE_SECONDS,
    utcOffsetHours: config.LOCAL_UTC_OFFSET_HOURS,
    batchSize: config.ENRICH_BATCH_SIZE,
    batchPauseMs: config.ENRICH_BATCH_PAUSE_MS,
    clock: systemClock,
    sleep: wait,
    logger,
  });

  const outputFile = outputArg ?? defaultOutputPath(inputFile);
  await writeFile(outputFile, `${JSON.stringify(report, null, 2)}\n`, "utf-8");
  logger.info(
    {
      outputFile,
      withPrices: report.metadata.timestamps_with_prices,
      coverage: report.metadata.price_coverage,
      found: report.metadata.prices_found,
    },
    "wrote price report",
  );
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
