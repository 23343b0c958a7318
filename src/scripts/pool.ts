import { logger } from "../logger";
import { runSharedPool } from "../pipeline";
import { printErrors, setupScriptDeps } from "./setup";

const deps = setupScriptDeps("Manual Run — Shared Pool Refresh");
const startedAt = Date.now();

const summary = await runSharedPool(deps);

logger.info("═══════════════════════════════════════════════════");
logger.info("  Pool Run Complete");
logger.info("═══════════════════════════════════════════════════");
logger.info(`  Run ID:          ${summary.runId}`);
logger.info(`  Sources:         ${summary.sourcesQueried}`);
logger.info(`  Fetched:         ${summary.totalFetched}`);
logger.info(`  New:             ${summary.inserted}`);
logger.info(`  Refreshed:       ${summary.refreshed}`);
logger.info(`  Marked inactive: ${summary.markedInactive}`);
logger.info(`  Users scored:    ${summary.usersScored}`);
logger.info(`  Matches created: ${summary.matchesCreated}`);
logger.info(`  Duration:        ${((Date.now() - startedAt) / 1000).toFixed(1)}s`);

printErrors(summary.errors);
deps.db.close();
