/**
 * Rule-based relevance gate applied before any paid scoring call.
 * Blocks excluded companies and staffing-style names, keeps postings in an
 * allowed location (unknown location passes) with a senior title or a title
 * close to one of the user's target roles.
 */

import Fuse from "fuse.js";
import type { FiltersConfig } from "../config";
import type { FilteredCandidate, PostingCandidate } from "../types";

export interface PrefilterContext {
  /** Normalized company names */
  excludedCompanies: Set<string>;
  targetRoles: string[];
  targetLocations: string[];
}

export type PrefilterRejection =
  | "excluded_company"
  | "excluded_keyword"
  | "location"
  | "title";

export type PrefilterVerdict =
  | { pass: true; b2cHint: boolean }
  | { pass: false; reason: PrefilterRejection };

export interface PrefilterOutcome {
  passed: FilteredCandidate[];
  rejected: Record<PrefilterRejection, number>;
}

/** Best partial match of `pattern` inside `text`, 0–100. */
export function partialMatchScore(text: string, pattern: string): number {
  if (!text.trim() || !pattern.trim()) return 0;

  const fuse = new Fuse([text], {
    includeScore: true,
    ignoreLocation: true,
    ignoreFieldNorm: true,
    threshold: 0.3,
  });
  const [best] = fuse.search(pattern);
  if (!best || best.score === undefined) return 0;
  return (1 - best.score) * 100;
}

function containsAny(text: string, keywords: string[]): boolean {
  return keywords.some((kw) => kw && text.includes(kw.toLowerCase()));
}

export function evaluateCandidate(
  candidate: PostingCandidate,
  rules: FiltersConfig,
  context: PrefilterContext,
): PrefilterVerdict {
  const companyLower = candidate.company.toLowerCase();

  if (context.excludedCompanies.has(candidate.companyNormalized)) {
    return { pass: false, reason: "excluded_company" };
  }
  if (containsAny(companyLower, rules.excludedKeywords)) {
    return { pass: false, reason: "excluded_keyword" };
  }

  const location = (candidate.location ?? "").toLowerCase();
  if (
    location &&
    !containsAny(location, rules.locationKeywords) &&
    !containsAny(location, context.targetLocations)
  ) {
    return { pass: false, reason: "location" };
  }

  const titleLower = candidate.title.toLowerCase();
  const senior = containsAny(titleLower, rules.seniorityKeywords);
  if (
    !senior &&
    !context.targetRoles.some(
      (role) => partialMatchScore(candidate.title, role) > rules.targetRoleThreshold,
    )
  ) {
    return { pass: false, reason: "title" };
  }

  const haystack =
    `${candidate.title} ${candidate.company} ${candidate.description ?? ""}`.toLowerCase();
  return { pass: true, b2cHint: containsAny(haystack, rules.b2cKeywords) };
}

export function prefilter(
  candidates: PostingCandidate[],
  rules: FiltersConfig,
  context: PrefilterContext,
): PrefilterOutcome {
  const passed: FilteredCandidate[] = [];
  const rejected: Record<PrefilterRejection, number> = {
    excluded_company: 0,
    excluded_keyword: 0,
    location: 0,
    title: 0,
  };

  for (const candidate of candidates) {
    const verdict = evaluateCandidate(candidate, rules, context);
    if (verdict.pass) {
      passed.push({ ...candidate, b2cHint: verdict.b2cHint });
    } else {
      rejected[verdict.reason] += 1;
    }
  }

  return { passed, rejected };
}
