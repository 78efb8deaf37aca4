import { describeTime, type PriceMatch } from "@price-collector/primitives";
import { Router } from "express";
import type { CollectorConfig } from "./config.ts";
import type { Logger } from "./logger.ts";
import type { QueryEngine } from "./query-engine.ts";

const DEFAULT_TOLERANCE_SECONDS = 60;
const INTEGER = /^-?\d+$/;

type RouteConfig = Pick<
  CollectorConfig,
  "BUFFER_MAX_AGE_SECONDS" | "DATA_RETENTION_HOURS"
>;

function parseInteger(value: unknown): number | null {
  if (typeof value !== "string" || !INTEGER.test(value.trim())) {
    return null;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

function toPriceBody(match: PriceMatch) {
  const { observation, timeInfo } = match;
  return {
    symbol: observation.symbol,
    price: observation.price,
    timestamp: observation.observedAt,
    round_id: observation.sequenceId,
    source: match.tier,
    time_info: { utc: timeInfo.utc, et: timeInfo.et },
  };
}

export function createRouter(
  engine: QueryEngine,
  config: RouteConfig,
  logger: Logger,
): Router {
  const router = Router();

  /**
   * GET /collector/price/:symbol?timestamp=1700000000&tolerance=60
   * Price closest to the timestamp, memory tier first
   */
  router.get("/price/:symbol", (req, res) => {
    try {
      const symbol = engine.canonical(req.params.symbol);
      if (!engine.isSupported(symbol)) {
        return res
          .status(400)
          .json({ error: `Unsupported symbol: ${req.params.symbol}` });
      }

      if (req.query.timestamp === undefined) {
        return res.status(400).json({ error: "timestamp parameter required" });
      }
      const timestamp = parseInteger(req.query.timestamp);
      if (timestamp === null) {
        return res.status(400).json({ error: "Invalid timestamp" });
      }

      const tolerance =
        req.query.tolerance === undefined
          ? DEFAULT_TOLERANCE_SECONDS
          : parseInteger(req.query.tolerance);
      if (tolerance === null || tolerance < 0) {
        return res.status(400).json({ error: "Invalid tolerance" });
      }

      const match = engine.lookup(symbol, timestamp, tolerance);
      if (!match) {
        return res.status(404).json({
          error: `No price found for ${symbol} at timestamp ${timestamp} (±${tolerance}s)`,
        });
      }

      return res.json({
        ...toPriceBody(match),
        requested_timestamp: timestamp,
      });
    } catch (error) {
      logger.error({ error, symbol: req.params.symbol }, "Failed to look up price");
      return res.status(503).json({ error: "Service unavailable" });
    }
  });

  /**
   * GET /collector/latest
   * Most recent price per configured symbol
   */
  router.get("/latest", (req, res) => {
    try {
      const prices = engine.latest().map(toPriceBody);
      res.json({ prices, source: "collector" });
    } catch (error) {
      logger.error({ error }, "Failed to get latest prices");
      res.status(503).json({ error: "Service unavailable" });
    }
  });

  /**
   * GET /collector/health
   * Liveness, last seen per symbol, feed states and tier sizes
   */
  router.get("/health", (req, res) => {
    try {
      const status = engine.status();
      res.json({
        ...status,
        time_info: describeTime(status.timestamp),
      });
    } catch (error) {
      logger.error({ error }, "Health check failed");
      res.status(503).json({ error: "Service unavailable" });
    }
  });

  /**
   * GET /collector/timezones
   * Current time in UTC and ET plus the retention settings
   */
  router.get("/timezones", (req, res) => {
    try {
      const now = engine.now();
      const timeInfo = describeTime(now);
      res.json({
        current_timestamp: now,
        time_info: {
          utc: timeInfo.utc,
          et: timeInfo.et,
          buffer_max_age_seconds: config.BUFFER_MAX_AGE_SECONDS,
          data_retention_hours: config.DATA_RETENTION_HOURS,
        },
      });
    } catch (error) {
      logger.error({ error }, "Failed to get time info");
      res.status(503).json({ error: "Service unavailable" });
    }
  });

  return router;
}
