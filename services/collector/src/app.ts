import cors from "cors";
import express from "express";
import type { CollectorConfig } from "./config.ts";
import type { Logger } from "./logger.ts";
import type { QueryEngine } from "./query-engine.ts";
import { createRouter } from "./routes.ts";

export function createApp(
  engine: QueryEngine,
  config: Pick<CollectorConfig, "BUFFER_MAX_AGE_SECONDS" | "DATA_RETENTION_HOURS">,
  logger: Logger,
): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      logger.info(
        {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          duration: Date.now() - start,
        },
        "request completed",
      );
    });
    next();
  });

  app.use("/collector", createRouter(engine, config, logger));

  app.get("/", (req, res) => {
    res.json({
      name: "Price Collector",
      endpoints: {
        health: "/collector/health",
        latest: "/collector/latest",
        price: "/collector/price/:symbol?timestamp=1700000000&tolerance=60",
        timezones: "/collector/timezones",
      },
    });
  });

  app.use(
    (
      err: Error,
      req: express.Request,
      res: express.Response,
      _next: express.NextFunction,
    ) => {
      logger.error({ error: err, path: req.path }, "Unhandled error");
      res.status(503).json({ error: "Service unavailable" });
    },
  );

  return app;
}
