/**
 * ─────────────────────────────────────────────────────────
 *  Items Service
 *  Stack: Node.js + TypeScript + Express + PostgreSQL (pg)
 * ─────────────────────────────────────────────────────────
 *
 *  Startup order:
 *  - settings from the environment (and .env); bad values exit 1
 *  - pg pool + session factory
 *  - items table/indexes/trigger, created only if absent
 *  - optional demo rows into an empty table
 *  - listen, then drain the pool on SIGTERM/SIGINT
 */

import { config as loadEnv } from "dotenv";
import pino from "pino";
import { createApp } from "./app";
import { ConfigError, loadSettings, redactDatabaseUrl, type Settings } from "./config";
import { createPgPool, SessionFactory } from "./db";
import { ensureSchema, seedSampleItems } from "./items";
import { createLogger } from "./logger";
import { createMetrics } from "./metrics";

const readSettings = (): Settings => {
  loadEnv();
  try {
    return loadSettings();
  } catch (err) {
    if (err instanceof ConfigError) {
      pino().fatal({ issues: err.issues }, "Refusing to start with invalid configuration");
      process.exit(1);
    }
    throw err;
  }
};

const main = async () => {
  const settings = readSettings();
  const logger = createLogger(settings);

  const sessions = new SessionFactory(createPgPool(settings, logger), logger);
  const metrics = createMetrics({ availableConnections: () => sessions.available });

  await sessions.withSession(ensureSchema);
  if (settings.seedSampleData) {
    const seeded = await sessions.withSession(seedSampleItems);
    if (seeded > 0) logger.info({ seeded }, "Inserted sample items");
  }

  const app = createApp({ settings, logger, sessions, metrics });
  const server = app.listen(settings.port, () => {
    logger.info(`Starting API in ${settings.environment} environment`);
    logger.info(`Database: ${redactDatabaseUrl(settings.databaseUrl)}`);
    logger.info(`Listening on :${settings.port}`);
  });

  // ─── Graceful Shutdown ────────────────────────────────────
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down API`);
    server.close(() => {
      sessions
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, "Failed to drain database pool");
          process.exit(1);
        });
    });
    setTimeout(() => process.exit(1), 10_000).unref();
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
};

main().catch((err: unknown) => {
  pino().fatal({ err }, "API failed to start");
  process.exit(1);
});
