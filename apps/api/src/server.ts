import "dotenv/config";
import { createApp } from "./app";
import { corsOriginsFrom, loadEnv } from "./config/env";
import { MemoryLibraryStore } from "./db/memory-store";
import { runMigrations } from "./db/migrate";
import { createPgPool } from "./db/postgres";
import { PostgresLibraryStore } from "./db/postgres-store";
import type { LibraryStore } from "./db/store";
import { createLogger, type Logger } from "./lib/logger";
import { systemClock } from "./lib/time";

const env = loadEnv();
const logger = createLogger({ level: env.LOG_LEVEL, pretty: env.LOG_PRETTY });

const openStore = async (log: Logger): Promise<LibraryStore> => {
  if (env.STORE_DRIVER === "memory" || !env.DATABASE_URL) {
    log.warn("using the in-memory store; records are lost on restart");
    return new MemoryLibraryStore();
  }
  const pool = createPgPool({ connectionString: env.DATABASE_URL, max: env.PG_POOL_MAX }, log);
  await runMigrations(pool, log, env.MIGRATIONS_DIR);
  return new PostgresLibraryStore(pool);
};

const start = async (): Promise<void> => {
  const store = await openStore(logger);
  const app = createApp({
    store,
    clock: systemClock,
    logger,
    corsOrigins: corsOriginsFrom(env)
  });

  const server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT, storeDriver: env.STORE_DRIVER }, "library ledger API listening");
  });

  const gracefulShutdown = async (): Promise<void> => {
    server.close();
    await store.close();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void gracefulShutdown();
  });
  process.on("SIGTERM", () => {
    void gracefulShutdown();
  });
};

start().catch((error: unknown) => {
  logger.fatal({ err: error }, "failed to start");
  process.exit(1);
});
