import { loadConfig, type AppConfig, type EnvConfig } from "../src/config";
import { openDatabase, type Database } from "../src/db";
import { insertUser, savePreferences, seedCompanies } from "../src/db/operations";
import { normalizePosting } from "../src/normalizer";
import { derivePreferencesFromProfile } from "../src/preferences";
import type { SourceTask, SourceTaskSet } from "../src/connectors";
import type {
  ConnectorResult,
  PostingCandidate,
  SourceName,
  UserScoutPreferences,
} from "../src/types";

export const FIXED_NOW = new Date("2026-03-10T06:00:00Z");

export function testConfig(env: Partial<EnvConfig> = {}): AppConfig {
  const config = loadConfig({ env: { NODE_ENV: "test" } });
  return { ...config, env: { ...config.env, ownerUserId: null, ...env } };
}

export function testDatabase(config: AppConfig): Database {
  const db = openDatabase(":memory:");
  seedCompanies(db, config.companies.directory);
  return db;
}

export function candidate(
  fields: Partial<{
    source: SourceName;
    externalId: string | null;
    title: string;
    company: string;
    location: string | null;
    description: string | null;
    salaryMin: number | null;
    salaryMax: number | null;
    sourceUrl: string;
    postedDate: string | null;
  }> = {},
): PostingCandidate {
  const title = fields.title ?? "VP Growth";
  return normalizePosting({
    source: fields.source ?? "adzuna",
    externalId: fields.externalId ?? null,
    title,
    company: fields.company ?? "Acme",
    location: fields.location === undefined ? "Bangalore" : fields.location,
    description: fields.description ?? null,
    salary: {
      min: fields.salaryMin ?? null,
      max: fields.salaryMax ?? null,
      estimated: false,
    },
    sourceUrl: fields.sourceUrl ?? `https://jobs.example.com/${encodeURIComponent(title)}`,
    applyUrl: null,
    postedDate: fields.postedDate ?? null,
    raw: {},
  });
}

export function preferences(
  userId: number,
  overrides: Partial<UserScoutPreferences> = {},
): UserScoutPreferences {
  return {
    ...derivePreferencesFromProfile(userId, null),
    excludedIndustries: [],
    ...overrides,
  };
}

export function addUser(
  db: Database,
  name: string,
  prefs?: Partial<UserScoutPreferences>,
  telegramChatId: string | null = null,
): number {
  const id = insertUser(db, { name, telegramChatId });
  if (prefs) savePreferences(db, preferences(id, prefs));
  return id;
}

/** A source that returns fixed postings without touching the network. */
export function staticSource(source: SourceName, jobs: PostingCandidate[], label = source): SourceTask {
  const result: ConnectorResult = {
    source,
    label,
    jobs,
    success: true,
    responseTimeMs: 1,
    rateLimited: false,
  };
  return { source, run: async () => [result] };
}

export function failingSource(source: SourceName, error: string): SourceTask {
  const result: ConnectorResult = {
    source,
    label: source,
    jobs: [],
    success: false,
    error,
    responseTimeMs: 1,
    rateLimited: false,
  };
  return { source, run: async () => [result] };
}

export function taskSet(...tasks: SourceTask[]): () => SourceTaskSet {
  return () => ({ tasks, notes: [] });
}

export function jsonResponse(body: unknown, status = 200, statusText = "OK"): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { "Content-Type": "application/json" },
  });
}
