import { normalizeCompany, normalizeForMatching } from "../normalizer";
import type {
  Company,
  LearnedAdjustment,
  ScoreBreakdown,
  ScoutedJob,
  UserScoutPreferences,
} from "../types";

export type ScorableJob = Pick<
  ScoutedJob,
  | "title"
  | "company"
  | "location"
  | "city"
  | "description"
  | "salaryMin"
  | "salaryMax"
  | "postedDate"
  | "matchedCompanyId"
>;

export interface RelevanceScore {
  total: number;
  breakdown: ScoreBreakdown;
  reasons: string[];
  hardFiltered: boolean;
}

interface FactorScore {
  points: number;
  reason: string | null;
}

const NONE: FactorScore = { points: 0, reason: null };
const DAY_MS = 24 * 60 * 60 * 1000;
const TITLE_STOP_WORDS = new Set(["of", "and", "the", "for", "in", "at"]);

function emptyBreakdown(): ScoreBreakdown {
  return { title: 0, company: 0, location: 0, salary: 0, keywords: 0, recency: 0, learned: 0 };
}

function overlaps(a: string, b: string): boolean {
  return a.includes(b) || b.includes(a);
}

function matchesAny(value: string | null, terms: string[]): boolean {
  const normalized = normalizeForMatching(value ?? "");
  if (!normalized) return false;
  return terms
    .map(normalizeForMatching)
    .some((term) => term.length > 0 && overlaps(normalized, term));
}

// Score a Single Job

/**
 * Deterministic relevance of a pool job for one user, 0-100.
 * Factors are summed signed and clamped once at the end, so strict-mode
 * penalties can pull a good title match down to zero.
 */
export function scoreJob(
  job: ScorableJob,
  prefs: UserScoutPreferences,
  company: Company | null = null,
  now: Date = new Date(),
): RelevanceScore {
  const companyId = company?.id ?? job.matchedCompanyId;

  if (companyId !== null && prefs.excludedCompanyIds.includes(companyId)) {
    return hardFiltered("Company is excluded");
  }
  if (company && matchesAny(company.sector, prefs.excludedIndustries)) {
    return hardFiltered("Industry is excluded");
  }

  const factors: Array<[keyof ScoreBreakdown, FactorScore]> = [
    ["title", scoreTitle(job.title, prefs)],
    ["company", scoreCompany(companyId, company, prefs)],
    ["location", scoreLocation(job.location, job.city, prefs)],
    ["salary", scoreSalary(job.salaryMin ?? job.salaryMax, prefs)],
    ["keywords", scoreKeywords(job.description, prefs.roleKeywords)],
    ["recency", scoreRecency(job.postedDate, now)],
    ["learned", scoreLearned(job, companyId, prefs)],
  ];

  const breakdown = emptyBreakdown();
  const reasons: string[] = [];
  let sum = 0;

  for (const [key, factor] of factors) {
    breakdown[key] = factor.points;
    sum += factor.points;
    if (factor.points !== 0 && factor.reason) reasons.push(factor.reason);
  }

  return {
    total: Math.max(0, Math.min(100, sum)),
    breakdown,
    reasons,
    hardFiltered: false,
  };
}

function hardFiltered(reason: string): RelevanceScore {
  return { total: 0, breakdown: emptyBreakdown(), reasons: [reason], hardFiltered: true };
}

// Title Scoring

export function titleKeywords(prefs: UserScoutPreferences): string[] {
  const explicit = prefs.roleKeywords.map(normalizeForMatching).filter(Boolean);
  if (explicit.length > 0) return explicit;

  return prefs.targetRoles
    .flatMap((role) => normalizeForMatching(role).split(" "))
    .filter((word) => word.length > 0 && !TITLE_STOP_WORDS.has(word));
}

export function scoreTitle(title: string, prefs: UserScoutPreferences): FactorScore {
  const titleNorm = normalizeForMatching(title);
  if (!titleNorm) return NONE;

  const roles = prefs.targetRoles.map(normalizeForMatching).filter(Boolean);
  if (roles.some((role) => titleNorm.includes(role))) {
    return { points: 40, reason: "Exact match with target role" };
  }

  const hits = titleKeywords(prefs).filter((k) => titleNorm.includes(k)).length;
  if (hits >= 2) return { points: 25, reason: "2+ keyword matches in title" };
  if (hits === 1) return { points: 15, reason: "1 keyword match in title" };
  return NONE;
}

// Company Scoring

export function scoreCompany(
  companyId: number | null,
  company: Company | null,
  prefs: UserScoutPreferences,
): FactorScore {
  if (companyId !== null && prefs.targetCompanyIds.includes(companyId)) {
    return { points: 25, reason: "Company in target list" };
  }
  if (!company) return NONE;
  if (matchesAny(company.sector, prefs.targetIndustries)) {
    return { points: 15, reason: "Industry matches target" };
  }
  if (matchesAny(company.stage, prefs.companyStages)) {
    return { points: 10, reason: "Company stage matches preferred" };
  }
  return NONE;
}

// Location Scoring

export function scoreLocation(
  location: string | null,
  city: string | null,
  prefs: UserScoutPreferences,
): FactorScore {
  const locationNorm = normalizeForMatching(location ?? "");
  const cityNorm = normalizeForMatching(city ?? "");

  if (locationNorm.includes("remote") || cityNorm.includes("remote")) {
    return { points: 15, reason: "Remote role" };
  }

  const targets = prefs.targetLocations.map(normalizeForMatching).filter(Boolean);
  if (targets.some((t) => locationNorm.includes(t) || cityNorm.includes(t))) {
    return { points: 15, reason: "City matches target location" };
  }

  if (prefs.locationFlexibility === "strict" && targets.length > 0) {
    return { points: -20, reason: "Location mismatch (strict mode)" };
  }
  return NONE;
}

// Salary Scoring

export function scoreSalary(
  jobSalary: number | null,
  prefs: UserScoutPreferences,
): FactorScore {
  const minimum = prefs.minSalary;
  if (!minimum || jobSalary === null) return NONE;

  if (jobSalary >= minimum) return { points: 10, reason: "Meets minimum salary" };
  if (jobSalary >= Math.floor(minimum * 0.85)) {
    return { points: 5, reason: "Within 85% of minimum salary" };
  }
  if (prefs.salaryFlexibility === "strict") {
    return { points: -15, reason: "Below minimum (strict mode)" };
  }
  return NONE;
}

// Keyword Scoring

export function countKeywordOverlap(text: string | null, keywords: string[]): number {
  const textNorm = normalizeForMatching(text ?? "");
  if (!textNorm) return 0;

  return keywords.filter((keyword) => {
    const parts = normalizeForMatching(keyword).split(" ").filter(Boolean);
    return parts.length > 0 && parts.every((part) => textNorm.includes(part));
  }).length;
}

export function scoreKeywords(description: string | null, keywords: string[]): FactorScore {
  const points = Math.min(countKeywordOverlap(description, keywords), 5);
  return points > 0 ? { points, reason: `${points} role keywords in description` } : NONE;
}

// Recency Scoring

export function daysSince(postedDate: string | null, now: Date): number | null {
  if (!postedDate) return null;
  const posted = Date.parse(`${postedDate.substring(0, 10)}T00:00:00Z`);
  if (Number.isNaN(posted)) return null;
  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  return Math.floor((today - posted) / DAY_MS);
}

export function scoreRecency(postedDate: string | null, now: Date): FactorScore {
  const days = daysSince(postedDate, now);
  if (days === null) return NONE;
  if (days <= 1) return { points: 5, reason: "Posted ≤1 day ago" };
  if (days <= 3) return { points: 3, reason: "Posted ≤3 days ago" };
  if (days <= 7) return { points: 1, reason: "Posted ≤7 days ago" };
  return NONE;
}

// Learned Adjustments

export function adjustmentApplies(
  adjustment: LearnedAdjustment,
  job: Pick<ScorableJob, "title" | "company">,
  companyId: number | null,
): boolean {
  switch (adjustment.kind) {
    case "company":
      return companyId !== null && adjustment.key === String(companyId);
    case "company_name":
      return adjustment.key === normalizeCompany(job.company);
    case "title_word":
      return normalizeForMatching(job.title).includes(adjustment.key);
  }
}

function sumAdjustments(
  adjustments: LearnedAdjustment[],
  job: Pick<ScorableJob, "title" | "company">,
  companyId: number | null,
): number {
  return adjustments
    .filter((a) => adjustmentApplies(a, job, companyId))
    .reduce((total, a) => total + a.points, 0);
}

/** Penalties are stored as positive magnitudes and subtracted here. */
export function scoreLearned(
  job: Pick<ScorableJob, "title" | "company">,
  companyId: number | null,
  prefs: UserScoutPreferences,
): FactorScore {
  const points =
    sumAdjustments(prefs.learnedBoosts, job, companyId) -
    sumAdjustments(prefs.learnedPenalties, job, companyId);
  if (points === 0) return NONE;
  return { points, reason: `Learned adjustment: ${points > 0 ? "+" : ""}${points}` };
}
