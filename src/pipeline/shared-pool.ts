import { logger } from "../logger";
import { PersistenceError, errorMessage } from "../errors";
import { collapseByFingerprint } from "../dedup";
import { scoreJob } from "../scoring";
import { formatPoolSummary } from "../alerts";
import {
  createScoutRun,
  finishScoutRun,
  getAllCompanies,
  getPreferences,
  getUnmatchedActiveJobs,
  getUser,
  getUserIdsWithPreferences,
  insertUserScoutedJob,
  markStaleScoutedJobs,
  resolveCompanyByNormalizedName,
  upsertScoutedJob,
} from "../db/operations";
import type { SearchRequest } from "../connectors";
import type { SearchConfig } from "../config";
import type { Company, PoolRunSummary, PostingCandidate } from "../types";
import {
  NOTIFY_FAILED_ERROR,
  deliver,
  fetchPostings,
  generateRunId,
  type PipelineDeps,
} from "./common";

export const STALE_AFTER_DAYS = 7;
const DAY_MS = 24 * 60 * 60 * 1000;

export function buildPoolSearches(search: SearchConfig): SearchRequest[] {
  return search.poolLocations.flatMap((location) =>
    search.poolQueries.map((template) => ({
      query: template.replace("{location}", location),
      location,
    })),
  );
}

interface UpsertCounts {
  inserted: number;
  refreshed: number;
  markedInactive: number;
}

function upsertPool(
  deps: PipelineDeps,
  candidates: PostingCandidate[],
  now: Date,
): UpsertCounts {
  const { db } = deps;
  const seenAt = now.toISOString();
  const cutoff = new Date(now.getTime() - STALE_AFTER_DAYS * DAY_MS).toISOString();

  const run = db.transaction((): UpsertCounts => {
    const counts: UpsertCounts = { inserted: 0, refreshed: 0, markedInactive: 0 };
    for (const candidate of candidates) {
      const companyId = resolveCompanyByNormalizedName(db, candidate.company);
      const outcome = upsertScoutedJob(db, candidate, companyId, seenAt);
      counts[outcome] += 1;
    }
    counts.markedInactive = markStaleScoutedJobs(db, cutoff);
    return counts;
  });

  try {
    return run();
  } catch (error) {
    throw new PersistenceError(`Pool upsert failed: ${errorMessage(error)}`, "pool", {
      cause: error,
    });
  }
}

/** Scores one user's unmatched backlog; returns how many matches were created. */
export function matchUser(
  deps: PipelineDeps,
  userId: number,
  companies: Map<number, Company>,
  now: Date,
): number {
  const { db } = deps;
  const prefs = getPreferences(db, userId);
  if (!prefs) return 0;

  const backlog = getUnmatchedActiveJobs(db, userId);
  const matchedAt = now.toISOString();

  const run = db.transaction((): number => {
    let created = 0;
    for (const job of backlog) {
      const company =
        job.matchedCompanyId !== null ? (companies.get(job.matchedCompanyId) ?? null) : null;
      const score = scoreJob(job, prefs, company, now);
      if (score.hardFiltered || score.total < prefs.minScore) continue;

      // A concurrent run may have matched the pair already
      const inserted = insertUserScoutedJob(db, {
        userId,
        scoutedJobId: job.id,
        relevanceScore: score.total,
        scoreBreakdown: score.breakdown,
        matchReasons: score.reasons,
        matchedAt,
      });
      if (inserted) created += 1;
    }
    return created;
  });

  try {
    return run();
  } catch (error) {
    throw new PersistenceError(
      `Matching for user ${userId} failed: ${errorMessage(error)}`,
      `user:${userId}`,
      { cause: error },
    );
  }
}

/**
 * Scheduled run: refresh the shared pool from every source, retire postings
 * not seen for a week, then score each user's unmatched backlog.
 * A failed unit is rolled back and reported; later units still run.
 */
export async function runSharedPool(deps: PipelineDeps): Promise<PoolRunSummary> {
  const { db, config } = deps;
  const now = deps.now?.() ?? new Date();
  const runId = generateRunId(now);
  const tag = `[POOL ${runId}]`;

  logger.info(`${tag} starting`);
  createScoutRun(db, runId, "shared_pool", null);

  const summary: PoolRunSummary = {
    runId,
    sourcesQueried: 0,
    totalFetched: 0,
    inserted: 0,
    refreshed: 0,
    markedInactive: 0,
    usersScored: 0,
    matchesCreated: 0,
    errors: [],
  };

  try {
    // 1. Fetch
    const fetched = await fetchPostings(
      deps,
      { searches: buildPoolSearches(config.search), includeAts: true },
      tag,
    );
    summary.sourcesQueried = fetched.sourcesQueried;
    summary.totalFetched = fetched.candidates.length;
    summary.errors.push(...fetched.errors);

    if (fetched.sourcesQueried === 0) {
      finishScoutRun(db, runId, "completed", summary);
      return summary;
    }

    // 2. Upsert + retire stale
    try {
      const counts = upsertPool(deps, collapseByFingerprint(fetched.candidates), now);
      summary.inserted = counts.inserted;
      summary.refreshed = counts.refreshed;
      summary.markedInactive = counts.markedInactive;
      logger.info(
        `${tag} pool: ${counts.inserted} new, ${counts.refreshed} refreshed, ${counts.markedInactive} marked inactive`,
      );
    } catch (error) {
      logger.error(`${tag} ${errorMessage(error)}`);
      summary.errors.push(errorMessage(error));
    }

    // 3. Match every user with preferences
    const companies = getAllCompanies(db);
    for (const userId of getUserIdsWithPreferences(db)) {
      try {
        const created = matchUser(deps, userId, companies, now);
        summary.usersScored += 1;
        summary.matchesCreated += created;
        logger.info(`${tag} user ${userId}: ${created} new matches`);
      } catch (error) {
        logger.error(`${tag} ${errorMessage(error)}`);
        summary.errors.push(errorMessage(error));
      }
    }

    // 4. Notify the owner
    const ownerId = config.env.ownerUserId;
    const owner = ownerId !== null ? getUser(db, ownerId) : null;
    if (owner?.telegramChatId && deps.notify) {
      const delivered = await deliver(
        deps.notify,
        owner.telegramChatId,
        formatPoolSummary(summary),
      );
      if (!delivered) summary.errors.push(NOTIFY_FAILED_ERROR);
    }

    logger.info(
      `${tag} complete: ${summary.usersScored} users scored, ${summary.matchesCreated} matches, ${summary.errors.length} errors`,
    );
    finishScoutRun(db, runId, "completed", summary);
    return summary;
  } catch (error) {
    logger.error(`${tag} failed:`, error);
    finishScoutRun(db, runId, "failed", { errors: [...summary.errors, errorMessage(error)] });
    throw error;
  }
}
