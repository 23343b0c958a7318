/**
 * Batch deduplication against a persisted store and against itself.
 * Checks run in order, first hit drops the candidate:
 * 1. External id — `${source}:${id}` for sources with stable ids
 * 2. URL — exact match
 * 3. Fingerprint — hash of normalized (company, title, city)
 * 4. Fuzzy — title and company similarity both above 85
 */

import { distance } from "fastest-levenshtein";
import { normalizeCompany, normalizeTitle } from "../normalizer";
import type { PostingCandidate } from "../types";

export const FUZZY_THRESHOLD = 85;

export interface TitleCompanyPair {
  title: string;
  company: string;
}

export interface DedupStore {
  externalIds: Set<string>;
  urls: Set<string>;
  fingerprints: Set<string>;
  /** Normalized pairs */
  pairs: TitleCompanyPair[];
}

export type DuplicateReason = "external_id" | "url" | "fingerprint" | "fuzzy";

export interface DedupOutcome<T extends PostingCandidate> {
  unique: T[];
  dropped: Array<{ candidate: T; reason: DuplicateReason }>;
}

export interface StoredPosting {
  source: string;
  externalId: string | null;
  url: string;
  fingerprint: string | null;
  title: string;
  company: string;
}

export function emptyDedupStore(): DedupStore {
  return {
    externalIds: new Set(),
    urls: new Set(),
    fingerprints: new Set(),
    pairs: [],
  };
}

export function externalKey(source: string, externalId: string): string {
  return `${source}:${externalId}`;
}

export function buildDedupStore(rows: StoredPosting[]): DedupStore {
  const store = emptyDedupStore();
  for (const row of rows) {
    if (row.externalId) store.externalIds.add(externalKey(row.source, row.externalId));
    store.urls.add(row.url);
    if (row.fingerprint) store.fingerprints.add(row.fingerprint);
    store.pairs.push({
      title: normalizeTitle(row.title),
      company: normalizeCompany(row.company),
    });
  }
  return store;
}

/** Levenshtein similarity on a 0–100 scale. */
export function similarityRatio(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 100;
  return (1 - distance(a, b) / longest) * 100;
}

function couldExceed(a: string, b: string): boolean {
  // Length gap alone bounds the ratio from above
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return true;
  return (1 - Math.abs(a.length - b.length) / longest) * 100 > FUZZY_THRESHOLD;
}

export function isFuzzyDuplicate(
  pair: TitleCompanyPair,
  known: TitleCompanyPair[],
): boolean {
  for (const other of known) {
    if (!couldExceed(pair.title, other.title)) continue;
    if (!couldExceed(pair.company, other.company)) continue;
    if (
      similarityRatio(pair.title, other.title) > FUZZY_THRESHOLD &&
      similarityRatio(pair.company, other.company) > FUZZY_THRESHOLD
    ) {
      return true;
    }
  }
  return false;
}

export function deduplicate<T extends PostingCandidate>(
  candidates: T[],
  store: DedupStore = emptyDedupStore(),
): DedupOutcome<T> {
  const seenIds = new Set<string>();
  const seenUrls = new Set<string>();
  const seenFingerprints = new Set<string>();
  const seenPairs: TitleCompanyPair[] = [];
  const unique: T[] = [];
  const dropped: DedupOutcome<T>["dropped"] = [];

  for (const candidate of candidates) {
    const idKey = candidate.externalId
      ? externalKey(candidate.source, candidate.externalId)
      : null;
    const pair = {
      title: normalizeTitle(candidate.title),
      company: normalizeCompany(candidate.company),
    };

    let reason: DuplicateReason | null = null;
    if (idKey && (store.externalIds.has(idKey) || seenIds.has(idKey))) {
      reason = "external_id";
    } else if (store.urls.has(candidate.sourceUrl) || seenUrls.has(candidate.sourceUrl)) {
      reason = "url";
    } else if (
      store.fingerprints.has(candidate.fingerprint) ||
      seenFingerprints.has(candidate.fingerprint)
    ) {
      reason = "fingerprint";
    } else if (
      isFuzzyDuplicate(pair, store.pairs) ||
      isFuzzyDuplicate(pair, seenPairs)
    ) {
      reason = "fuzzy";
    }

    if (reason) {
      dropped.push({ candidate, reason });
      continue;
    }

    if (idKey) seenIds.add(idKey);
    seenUrls.add(candidate.sourceUrl);
    seenFingerprints.add(candidate.fingerprint);
    seenPairs.push(pair);
    unique.push(candidate);
  }

  return { unique, dropped };
}

/** Adds accepted candidates to a store so a later batch sees them as persisted. */
export function rememberCandidates(
  store: DedupStore,
  candidates: PostingCandidate[],
): void {
  for (const candidate of candidates) {
    if (candidate.externalId) {
      store.externalIds.add(externalKey(candidate.source, candidate.externalId));
    }
    store.urls.add(candidate.sourceUrl);
    store.fingerprints.add(candidate.fingerprint);
    store.pairs.push({
      title: normalizeTitle(candidate.title),
      company: normalizeCompany(candidate.company),
    });
  }
}

/** First sighting of each fingerprint wins; the shared pool is keyed on it. */
export function collapseByFingerprint<T extends PostingCandidate>(
  candidates: T[],
): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];
  for (const candidate of candidates) {
    if (seen.has(candidate.fingerprint)) continue;
    seen.add(candidate.fingerprint);
    unique.push(candidate);
  }
  return unique;
}
