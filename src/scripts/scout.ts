import { logger } from "../logger";
import { runScout } from "../pipeline";
import { printErrors, setupScriptDeps } from "./setup";

// Usage: npm run scout -- [userId]
const arg = process.argv[2];
const userId = arg ? Number.parseInt(arg, 10) : null;

const deps = setupScriptDeps("Manual Run — On-Demand Scout");

if (userId !== null && Number.isNaN(userId)) {
  logger.error(`Invalid user id: ${arg}`);
  process.exit(1);
}

const summary = await runScout(userId, deps);

logger.info("═══════════════════════════════════════════════════");
logger.info("  Scout Complete");
logger.info("═══════════════════════════════════════════════════");
logger.info(`  Run ID:         ${summary.runId}`);
logger.info(`  Sources:        ${summary.sourcesQueried}`);
logger.info(`  Fetched:        ${summary.totalFetched}`);
logger.info(`  After dedup:    ${summary.afterDedup}`);
logger.info(`  After filter:   ${summary.afterPrefilter}`);
logger.info(`  AI scored:      ${summary.aiScored}`);
logger.info(`  Promoted:       ${summary.promotedToPipeline}`);
logger.info(`  For review:     ${summary.savedForReview}`);
logger.info(`  Dismissed:      ${summary.dismissed}`);

printErrors(summary.errors);
deps.db.close();
