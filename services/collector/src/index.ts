import "dotenv/config";
import type { Server } from "node:http";
import { createApp } from "./app.ts";
import { CollectorService } from "./collector-service.ts";
import { loadConfig } from "./config.ts";
import { createServiceContext } from "./context.ts";
import { createLogger, type Logger } from "./logger.ts";

let logger: Logger | undefined;

async function main() {
  const config = loadConfig();
  logger = createLogger(config);
  const log = logger;
  log.info(
    {
      feeds: config.FEED_SOURCES,
      symbols: config.SYMBOLS,
      dataDir: config.DATA_DIR,
    },
    "Price collector starting",
  );

  const context = createServiceContext(config, log);
  const service = new CollectorService(context);
  await service.start();

  const app = createApp(service.engine, config, log);
  const server: Server = app.listen(config.PORT, () => {
    log.info({ port: config.PORT }, "Price collector listening");
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, "Shutting down gracefully");
    server.close();
    service
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error({ error }, "Shutdown failed");
        process.exit(1);
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error) => {
  if (logger) {
    logger.error({ error }, "Fatal collector error");
  } else {
    console.error("Fatal collector error", error);
  }
  process.exit(1);
});
