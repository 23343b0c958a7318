import { logger } from "../logger";
import { PersistenceError, errorMessage } from "../errors";
import { buildDedupStore, deduplicate } from "../dedup";
import { prefilter } from "../prefilter";
import {
  buildProfileSummary,
  categorize,
  createScoringModel,
  scoreCandidates,
  type ScoredCandidate,
} from "../ai";
import { formatScoutSummary } from "../alerts";
import { getOrCreatePreferences } from "../preferences";
import {
  createScoutRun,
  finishScoutRun,
  getExcludedCompanyNames,
  getProfile,
  getUser,
  getUserDedupRows,
  insertPipelineJob,
  insertScoutResult,
} from "../db/operations";
import type { SearchRequest } from "../connectors";
import type { SearchConfig } from "../config";
import type { ScoutRunSummary, UserScoutPreferences } from "../types";
import {
  NOTIFY_FAILED_ERROR,
  deliver,
  fetchPostings,
  generateRunId,
  type PipelineDeps,
} from "./common";

function emptySummary(runId: string, errors: string[], sourcesQueried = 0): ScoutRunSummary {
  return {
    runId,
    sourcesQueried,
    totalFetched: 0,
    afterDedup: 0,
    afterPrefilter: 0,
    aiScored: 0,
    promotedToPipeline: 0,
    savedForReview: 0,
    dismissed: 0,
    errors,
  };
}

export function resolveTargets(
  prefs: UserScoutPreferences,
  search: SearchConfig,
): { roles: string[]; locations: string[] } {
  return {
    roles: prefs.targetRoles.length > 0 ? prefs.targetRoles : search.onDemand.defaultRoles,
    locations:
      prefs.targetLocations.length > 0 ? prefs.targetLocations : search.onDemand.defaultLocations,
  };
}

export function buildOnDemandSearches(roles: string[], search: SearchConfig): SearchRequest[] {
  const { queryTemplate, maxRoles, location } = search.onDemand;
  return roles.slice(0, maxRoles).map((role) => ({
    query: queryTemplate.replace("{role}", role),
    location,
  }));
}

interface PersistedRun {
  promoted: ScoredCandidate[];
  reviewCount: number;
  dismissedCount: number;
}

function persistScoredCandidates(
  deps: PipelineDeps,
  userId: number,
  runId: string,
  scored: ScoredCandidate[],
): PersistedRun {
  const { db } = deps;

  const persist = db.transaction((): PersistedRun => {
    const outcome: PersistedRun = { promoted: [], reviewCount: 0, dismissedCount: 0 };

    for (const candidate of scored) {
      const status = categorize(candidate.fitScore);
      let pipelineJobId: number | null = null;

      if (status === "promoted") {
        pipelineJobId = insertPipelineJob(db, {
          userId,
          title: candidate.title,
          company: candidate.company,
          location: candidate.location,
          url: candidate.sourceUrl,
          source: candidate.source,
          salaryMin: candidate.salaryMin,
          salaryMax: candidate.salaryMax,
          notes: `Auto-discovered by Job Scout (run ${runId}). Fit score: ${candidate.fitScore}/10.`,
        });
        outcome.promoted.push(candidate);
      } else if (status === "new") {
        outcome.reviewCount += 1;
      } else {
        outcome.dismissedCount += 1;
      }

      insertScoutResult(db, {
        userId,
        candidate,
        fitScore: candidate.fitScore,
        b2cValidated: candidate.b2cValidated,
        aiReasoning: candidate.aiReasoning,
        status,
        pipelineJobId,
        scoutRunId: runId,
      });
    }
    return outcome;
  });

  try {
    return persist();
  } catch (error) {
    throw new PersistenceError(
      `Scout run ${runId}: saving results failed: ${errorMessage(error)}`,
      `user:${userId}`,
      { cause: error },
    );
  }
}

/**
 * On-demand run for one user: fetch, dedupe against what the user has
 * already seen, pre-filter, AI-score, persist and notify.
 * Only a persistence failure escapes; everything else lands in `errors`.
 */
export async function runScout(
  userId: number | null,
  deps: PipelineDeps,
): Promise<ScoutRunSummary> {
  const { db, config } = deps;
  const now = deps.now?.() ?? new Date();
  const runId = generateRunId(now);
  const tag = `[SCOUT ${runId}]`;

  const targetUserId = userId ?? config.env.ownerUserId;
  const user = targetUserId !== null ? getUser(db, targetUserId) : null;
  if (!user) {
    logger.error(`${tag} user not found`);
    return emptySummary(runId, ["User not found"]);
  }

  logger.info(`${tag} starting for user ${user.id}`);
  createScoutRun(db, runId, "on_demand", user.id);

  try {
    const prefs = getOrCreatePreferences(db, user.id);
    const profile = getProfile(db, user.id);
    const { roles, locations } = resolveTargets(prefs, config.search);

    // 1. Fetch
    const fetched = await fetchPostings(
      deps,
      { searches: buildOnDemandSearches(roles, config.search), includeAts: true },
      tag,
    );
    const errors = fetched.errors;
    const totalFetched = fetched.candidates.length;

    if (totalFetched === 0) {
      if (fetched.sourcesQueried > 0) errors.push("No results fetched from any source");
      logger.warn(`${tag} nothing fetched`);
      const summary = emptySummary(runId, errors, fetched.sourcesQueried);
      finishScoutRun(db, runId, "completed", summary);
      return summary;
    }

    // 2. Dedup against this user's results and pipeline
    const store = buildDedupStore(getUserDedupRows(db, user.id));
    const { unique } = deduplicate(fetched.candidates, store);
    logger.info(`${tag} ${unique.length} after dedup (from ${totalFetched})`);

    // 3. Pre-filter
    const { passed, rejected } = prefilter(unique, config.filters, {
      excludedCompanies: getExcludedCompanyNames(db, prefs.excludedCompanyIds),
      targetRoles: roles,
      targetLocations: locations,
    });
    logger.info(
      `${tag} ${passed.length} after pre-filter (company ${rejected.excluded_company + rejected.excluded_keyword}, location ${rejected.location}, title ${rejected.title} rejected)`,
    );

    // 4. AI score
    const complete = deps.complete ?? createScoringModel(config);
    const scoring = await scoreCandidates(passed, buildProfileSummary(profile, prefs), complete);
    errors.push(...scoring.failures);

    // 5. Persist + promote
    const persisted = persistScoredCandidates(deps, user.id, runId, scoring.scored);

    const summary: ScoutRunSummary = {
      runId,
      sourcesQueried: fetched.sourcesQueried,
      totalFetched,
      afterDedup: unique.length,
      afterPrefilter: passed.length,
      aiScored: scoring.scored.length,
      promotedToPipeline: persisted.promoted.length,
      savedForReview: persisted.reviewCount,
      dismissed: persisted.dismissedCount,
      errors,
    };

    logger.info(
      `${tag} complete: ${summary.promotedToPipeline} promoted, ${summary.savedForReview} for review, ${summary.dismissed} dismissed`,
    );

    // 6. Notify
    const message = formatScoutSummary(summary, persisted.promoted);
    if (message && user.telegramChatId && deps.notify) {
      const delivered = await deliver(deps.notify, user.telegramChatId, message);
      if (!delivered) errors.push(NOTIFY_FAILED_ERROR);
    }

    finishScoutRun(db, runId, "completed", summary);
    return summary;
  } catch (error) {
    logger.error(`${tag} failed:`, error);
    finishScoutRun(db, runId, "failed", { errors: [errorMessage(error)] });
    throw error;
  }
}
