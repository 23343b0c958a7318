import { logger } from "../logger";
import { PersistenceError } from "../errors";
import { normalizeCompany, normalizeForMatching } from "../normalizer";
import type { Database } from "../db";
import {
  countDismissals,
  getPreferences,
  getScoutedJob,
  getUserScoutedJob,
  savePreferences,
  setUserScoutedJobStatus,
} from "../db/operations";
import type {
  DismissReason,
  LearnedAdjustment,
  ScoutedJob,
  UserScoutedJob,
  UserScoutPreferences,
} from "../types";

export const COMPANY_PENALTY = 15;
export const TITLE_WORD_PENALTY = 5;
export const DISMISSAL_THRESHOLD = 3;
export const SALARY_RAISE = 1.1;
const MAX_TITLE_WORDS = 5;

const DISMISS_REASONS: readonly DismissReason[] = [
  "wrong_company",
  "salary_low",
  "wrong_location",
  "wrong_role",
  "other",
];

export function toDismissReason(value: string | null | undefined): DismissReason | null {
  const normalized = (value ?? "").trim().toLowerCase();
  return DISMISS_REASONS.find((r) => r === normalized) ?? null;
}

export function extractTitleWords(title: string): string[] {
  const words = normalizeForMatching(title)
    .split(" ")
    .filter((w) => w.length >= 3);
  return [...new Set(words)].slice(0, MAX_TITLE_WORDS);
}

function addPenalty(
  penalties: LearnedAdjustment[],
  kind: LearnedAdjustment["kind"],
  key: string,
  points: number,
): LearnedAdjustment[] {
  const existing = penalties.find((p) => p.kind === kind && p.key === key);
  if (!existing) return [...penalties, { kind, key, points }];
  return penalties.map((p) => (p === existing ? { ...p, points: p.points + points } : p));
}

/**
 * Folds one dismissal into the learned model. `dismissalCount` is how many
 * dismissals with this reason the user has made, including this one.
 * Repeated feedback compounds.
 */
export function applyDismissFeedback(
  prefs: UserScoutPreferences,
  reason: DismissReason,
  job: Pick<ScoutedJob, "title" | "company" | "matchedCompanyId">,
  dismissalCount: number,
): UserScoutPreferences {
  switch (reason) {
    case "wrong_company": {
      const learnedPenalties =
        job.matchedCompanyId !== null
          ? addPenalty(prefs.learnedPenalties, "company", String(job.matchedCompanyId), COMPANY_PENALTY)
          : addPenalty(prefs.learnedPenalties, "company_name", normalizeCompany(job.company), COMPANY_PENALTY);
      return { ...prefs, learnedPenalties };
    }

    case "salary_low":
      if (dismissalCount < DISMISSAL_THRESHOLD || !prefs.minSalary) return prefs;
      return { ...prefs, minSalary: Math.round(prefs.minSalary * SALARY_RAISE) };

    case "wrong_location":
      if (dismissalCount < DISMISSAL_THRESHOLD) return prefs;
      return { ...prefs, locationFlexibility: "strict" };

    case "wrong_role": {
      let learnedPenalties = prefs.learnedPenalties;
      for (const word of extractTitleWords(job.title)) {
        learnedPenalties = addPenalty(learnedPenalties, "title_word", word, TITLE_WORD_PENALTY);
      }
      return { ...prefs, learnedPenalties };
    }

    case "other":
      return prefs;
  }
}

export interface DismissOutcome {
  match: UserScoutedJob;
  preferences: UserScoutPreferences | null;
}

/**
 * Dismiss a pool match and learn from the reason, in one transaction.
 * Returns null when the match does not exist or belongs to another user.
 */
export function dismissMatch(
  db: Database,
  userId: number,
  matchId: number,
  rawReason: string | null,
): DismissOutcome | null {
  const match = getUserScoutedJob(db, matchId);
  if (!match || match.userId !== userId) return null;

  const job = getScoutedJob(db, match.scoutedJobId);
  const reason = toDismissReason(rawReason);

  const run = db.transaction((): UserScoutPreferences | null => {
    setUserScoutedJobStatus(db, matchId, "dismissed", reason ?? rawReason);

    const prefs = getPreferences(db, userId);
    if (!prefs || !job || !reason) return prefs;

    const count = countDismissals(db, userId, reason);
    const updated = applyDismissFeedback(prefs, reason, job, count);
    if (updated !== prefs) savePreferences(db, updated);
    return updated;
  });

  try {
    const preferences = run();
    logger.info(`Learning: user ${userId} dismissed match ${matchId} (${reason ?? "unspecified"})`);
    return {
      match: { ...match, status: "dismissed", dismissReason: reason ?? rawReason },
      preferences,
    };
  } catch (error) {
    throw new PersistenceError(`Failed to record dismissal of match ${matchId}`, `user:${userId}`, {
      cause: error,
    });
  }
}
