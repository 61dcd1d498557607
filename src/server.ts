import "dotenv/config";
import { createApp } from "./api/app.js";
import { loadConfig } from "./shared/config.js";
import { createLogger } from "./shared/logger.js";
import { createStorage } from "./storage/index.js";
import { WorldPool } from "./world/pool.js";

const config = loadConfig();
const logger = createLogger({ level: config.log.level, prettyPrint: config.log.pretty });
const storage = createStorage(config.storage);
const pool = new WorldPool({ maxIdlePerTemplate: config.worldCacheSize, logger });

const app = createApp({ storage, logger, pool });

const server = app.listen(config.port, () => {
  logger.info(`Pressroom API running on port ${config.port}`, { storage: config.storage.driver });
});

function shutdown(signal: string): void {
  logger.info("Shutting down", { signal });
  server.close(() => {
    (storage.close?.() ?? Promise.resolve())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error(err instanceof Error ? err : String(err));
        process.exit(1);
      });
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
