import { logger } from "../logger";
import { getDatabaseStats, openDatabase } from "../db";
import { getLastScoutRun } from "../db/operations";
import { getConfig } from "../config";

const config = getConfig();
const db = openDatabase(config.env.databasePath);

logger.info("═══════════════════════════════════════════════════");
logger.info("  System Status");
logger.info("═══════════════════════════════════════════════════");

const stats = getDatabaseStats(db);
logger.info(`📊 Pool jobs: ${stats.scouted_jobs ?? 0}`);
logger.info(`🎯 User matches: ${stats.user_scouted_jobs ?? 0}`);
logger.info(`🤖 AI-scored results: ${stats.scout_results ?? 0}`);
logger.info(`📋 Pipeline jobs: ${stats.pipeline_jobs ?? 0}`);
logger.info(`📝 Notifications: ${stats.notifications ?? 0}`);

for (const kind of ["shared_pool", "on_demand"] as const) {
  const run = getLastScoutRun(db, kind);
  if (run) {
    logger.info(`\n🕐 Last ${kind} run: ${run.runId}`);
    logger.info(`   Started: ${run.startedAt}`);
    logger.info(`   Finished: ${run.finishedAt ?? "still running"}`);
    logger.info(`   Status: ${run.status}`);
  } else {
    logger.info(`\n🕐 No ${kind} runs recorded yet`);
  }
}

const credentials = {
  adzuna: Boolean(config.env.adzunaAppId && config.env.adzunaAppKey),
  serpapi: Boolean(config.env.serpApiKey),
  serper: Boolean(config.env.serperApiKey),
  ai: Boolean(config.env.aiApiKey),
  telegram: Boolean(config.env.telegramBotToken),
};

logger.info(`\n⚙️  Environment: ${config.env.nodeEnv}`);
logger.info(`🧪 Dry run: ${config.env.dryRun}`);
logger.info(
  `🔑 Credentials: ${Object.entries(credentials)
    .map(([name, ok]) => `${name}=${ok ? "yes" : "no"}`)
    .join(", ")}`,
);
logger.info(
  `🏢 ATS boards: ${config.companies.greenhouse.length + config.companies.lever.length}, directory: ${config.companies.directory.length}`,
);

const enabledSources = Object.entries(config.sources.sources)
  .filter(([, s]) => s.enabled)
  .map(([name]) => name);
logger.info(
  `📡 Enabled sources: ${enabledSources.length > 0 ? enabledSources.join(", ") : "none"}`,
);

logger.info("═══════════════════════════════════════════════════");
db.close();
