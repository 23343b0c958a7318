import { serve } from "@hono/node-server";
import { logger } from "./logger";
import { openDatabase, checkDatabaseIntegrity } from "./db";
import { seedCompanies } from "./db/operations";
import { loadConfig, type AppConfig } from "./config";
import { createApp } from "./api";
import { createScoringModel } from "./ai";
import { createTelegramNotifier } from "./alerts";
import { buildScheduledJobs, createScheduler } from "./scheduler";
import type { PipelineDeps } from "./pipeline";
import type { Database } from "./db";

logger.info("═══════════════════════════════════════════════════");
logger.info("  Job Scout — discovery & relevance engine");
logger.info("═══════════════════════════════════════════════════");

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  logger.error("Failed to load configuration:", error);
  process.exit(1);
}

let db: Database;
try {
  db = openDatabase(config.env.databasePath);
  const seeded = seedCompanies(db, config.companies.directory);
  logger.info(`Company directory: ${seeded} companies seeded`);
} catch (error) {
  logger.error("Failed to initialize database:", error);
  process.exit(1);
}

const integrity = checkDatabaseIntegrity(db);
if (!integrity.ok) {
  logger.error(`Database integrity check failed: ${integrity.result}`);
  logger.error(`Restore from backup or delete ${config.env.databasePath} to recreate.`);
  process.exit(1);
}

const deps: PipelineDeps = {
  db,
  config,
  complete: createScoringModel(config),
  notify: createTelegramNotifier({
    botToken: config.env.telegramBotToken,
    dryRun: config.env.dryRun,
    db,
  }),
};

const app = createApp(deps);
const scheduler = createScheduler(
  buildScheduledJobs(config.schedule, deps),
  config.env.timezone,
);
scheduler.start();

const port = config.env.port;
const server = serve({ fetch: app.fetch, port }, (info) => {
  logger.info(`✅ Job Scout started on http://localhost:${info.port}`);
  logger.info(`   Health: http://localhost:${info.port}/health`);
  logger.info(`   Status: http://localhost:${info.port}/status`);
});

function shutdown(signal: string): void {
  logger.info(`${signal} received — shutting down`);
  scheduler.stop();
  server.close(() => {
    db.close();
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
