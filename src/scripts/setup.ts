import { logger } from "../logger";
import { openDatabase } from "../db";
import { seedCompanies } from "../db/operations";
import { loadConfig } from "../config";
import { createScoringModel } from "../ai";
import { createTelegramNotifier } from "../alerts";
import type { PipelineDeps } from "../pipeline";

/** Same wiring as the server, for one-off runs from the command line. */
export function setupScriptDeps(title: string): PipelineDeps {
  logger.info("═══════════════════════════════════════════════════");
  logger.info(`  ${title}`);
  logger.info("═══════════════════════════════════════════════════");

  const config = loadConfig();
  const db = openDatabase(config.env.databasePath);
  seedCompanies(db, config.companies.directory);

  return {
    db,
    config,
    complete: createScoringModel(config),
    notify: createTelegramNotifier({
      botToken: config.env.telegramBotToken,
      dryRun: config.env.dryRun,
      db,
    }),
  };
}

export function printErrors(errors: string[]): void {
  if (errors.length === 0) return;
  logger.warn("Errors encountered:");
  for (const error of errors.slice(0, 10)) {
    logger.warn(`  - ${error}`);
  }
  if (errors.length > 10) {
    logger.warn(`  ... and ${errors.length - 10} more`);
  }
}
