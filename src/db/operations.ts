import type { Database } from "./index";
import { normalizeCompany } from "../normalizer";
import type { StoredPosting } from "../dedup";
import type {
  Company,
  LearnedAdjustment,
  PostingCandidate,
  ScoreBreakdown,
  ScoutedJob,
  ScoutResult,
  ScoutResultStatus,
  SourceName,
  User,
  UserProfile,
  UserScoutedJob,
  UserScoutedJobStatus,
  UserScoutPreferences,
} from "../types";

// JSON columns

function parseJson(text: string | null): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function parseStringArray(text: string | null): string[] {
  const value = parseJson(text);
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === "string");
}

function parseNumberArray(text: string | null): number[] {
  const value = parseJson(text);
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is number => typeof v === "number");
}

function isAdjustment(value: unknown): value is LearnedAdjustment {
  if (typeof value !== "object" || value === null) return false;
  const kind = "kind" in value ? value.kind : undefined;
  const key = "key" in value ? value.key : undefined;
  const points = "points" in value ? value.points : undefined;
  return (
    (kind === "company" || kind === "company_name" || kind === "title_word") &&
    typeof key === "string" &&
    typeof points === "number"
  );
}

function parseAdjustments(text: string | null): LearnedAdjustment[] {
  const value = parseJson(text);
  if (!Array.isArray(value)) return [];
  return value.filter(isAdjustment);
}

const EMPTY_BREAKDOWN: ScoreBreakdown = {
  title: 0,
  company: 0,
  location: 0,
  salary: 0,
  keywords: 0,
  recency: 0,
  learned: 0,
};

function parseBreakdown(text: string | null): ScoreBreakdown {
  const value = parseJson(text);
  const breakdown = { ...EMPTY_BREAKDOWN };
  if (typeof value !== "object" || value === null) return breakdown;
  for (const key of Object.keys(breakdown)) {
    if (key in value) {
      const points: unknown = Reflect.get(value, key);
      if (typeof points === "number") Reflect.set(breakdown, key, points);
    }
  }
  return breakdown;
}

const SOURCES: readonly SourceName[] = ["adzuna", "serpapi", "serper", "greenhouse", "lever"];

function toSource(value: string): SourceName {
  return SOURCES.find((s) => s === value) ?? "serper";
}

// Users & Profiles

interface UserRow {
  id: number;
  name: string;
  telegram_chat_id: string | null;
}

export function insertUser(
  db: Database,
  user: { name: string; telegramChatId?: string | null },
): number {
  const result = db
    .prepare("INSERT INTO users (name, telegram_chat_id) VALUES (?, ?)")
    .run(user.name, user.telegramChatId ?? null);
  return Number(result.lastInsertRowid);
}

export function getUser(db: Database, userId: number): User | null {
  const row = db
    .prepare<[number], UserRow>("SELECT * FROM users WHERE id = ?")
    .get(userId);
  if (!row) return null;
  return { id: row.id, name: row.name, telegramChatId: row.telegram_chat_id };
}

interface ProfileRow {
  user_id: number;
  target_roles: string;
  target_locations: string;
  core_skills: string;
  resume_keywords: string;
  industries: string;
  experience_level: string | null;
  target_salary_min: number | null;
}

export function upsertProfile(db: Database, profile: UserProfile): void {
  db.prepare(
    `INSERT INTO user_profiles (
      user_id, target_roles, target_locations, core_skills, resume_keywords,
      industries, experience_level, target_salary_min, updated_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, datetime('now'))
    ON CONFLICT(user_id) DO UPDATE SET
      target_roles = excluded.target_roles,
      target_locations = excluded.target_locations,
      core_skills = excluded.core_skills,
      resume_keywords = excluded.resume_keywords,
      industries = excluded.industries,
      experience_level = excluded.experience_level,
      target_salary_min = excluded.target_salary_min,
      updated_at = excluded.updated_at`,
  ).run(
    profile.userId,
    JSON.stringify(profile.targetRoles),
    JSON.stringify(profile.targetLocations),
    JSON.stringify(profile.coreSkills),
    JSON.stringify(profile.resumeKeywords),
    JSON.stringify(profile.industries),
    profile.experienceLevel,
    profile.targetSalaryMin,
  );
}

export function getProfile(db: Database, userId: number): UserProfile | null {
  const row = db
    .prepare<[number], ProfileRow>("SELECT * FROM user_profiles WHERE user_id = ?")
    .get(userId);
  if (!row) return null;
  return {
    userId: row.user_id,
    targetRoles: parseStringArray(row.target_roles),
    targetLocations: parseStringArray(row.target_locations),
    coreSkills: parseStringArray(row.core_skills),
    resumeKeywords: parseStringArray(row.resume_keywords),
    industries: parseStringArray(row.industries),
    experienceLevel: row.experience_level,
    targetSalaryMin: row.target_salary_min,
  };
}

// Companies

interface CompanyRow {
  id: number;
  name: string;
  name_normalized: string;
  sector: string | null;
  stage: string | null;
  is_excluded: number;
}

function toCompany(row: CompanyRow): Company {
  return {
    id: row.id,
    name: row.name,
    nameNormalized: row.name_normalized,
    sector: row.sector,
    stage: row.stage,
    isExcluded: row.is_excluded === 1,
  };
}

export function upsertCompany(
  db: Database,
  company: { name: string; sector: string | null; stage: string | null; excluded?: boolean },
): number {
  const normalized = normalizeCompany(company.name);
  db.prepare(
    `INSERT INTO companies (name, name_normalized, sector, stage, is_excluded)
     VALUES (?, ?, ?, ?, ?)
     ON CONFLICT(name_normalized) DO UPDATE SET
       name = excluded.name,
       sector = excluded.sector,
       stage = excluded.stage,
       is_excluded = excluded.is_excluded`,
  ).run(company.name, normalized, company.sector, company.stage, company.excluded ? 1 : 0);

  const row = db
    .prepare<[string], { id: number }>("SELECT id FROM companies WHERE name_normalized = ?")
    .get(normalized);
  if (!row) throw new Error(`Company upsert lost row for ${company.name}`);
  return row.id;
}

/** Idempotent: re-seeding updates sector, stage and exclusion in place. */
export function seedCompanies(
  db: Database,
  directory: Array<{ name: string; sector: string | null; stage: string | null; excluded?: boolean }>,
): number {
  const seed = db.transaction(() => {
    for (const company of directory) upsertCompany(db, company);
    return directory.length;
  });
  return seed();
}

export function resolveCompanyByNormalizedName(
  db: Database,
  name: string,
): number | null {
  const row = db
    .prepare<[string], { id: number }>("SELECT id FROM companies WHERE name_normalized = ?")
    .get(normalizeCompany(name));
  return row?.id ?? null;
}

export function getCompany(db: Database, id: number): Company | null {
  const row = db
    .prepare<[number], CompanyRow>("SELECT * FROM companies WHERE id = ?")
    .get(id);
  return row ? toCompany(row) : null;
}

export function getAllCompanies(db: Database): Map<number, Company> {
  const rows = db.prepare<[], CompanyRow>("SELECT * FROM companies").all();
  return new Map(rows.map((row) => [row.id, toCompany(row)]));
}

/** Normalized names of excluded directory companies plus the user's own exclusions. */
export function getExcludedCompanyNames(
  db: Database,
  extraCompanyIds: number[] = [],
): Set<string> {
  const names = new Set(
    db
      .prepare<[], { name_normalized: string }>(
        "SELECT name_normalized FROM companies WHERE is_excluded = 1",
      )
      .all()
      .map((r) => r.name_normalized),
  );
  for (const id of extraCompanyIds) {
    const company = getCompany(db, id);
    if (company) names.add(company.nameNormalized);
  }
  return names;
}

// Preferences

interface PreferencesRow {
  user_id: number;
  target_roles: string;
  role_keywords: string;
  target_locations: string;
  location_flexibility: string;
  target_company_ids: string;
  excluded_company_ids: string;
  target_industries: string;
  excluded_industries: string;
  company_stages: string;
  min_salary: number | null;
  salary_flexibility: string;
  min_score: number;
  learned_boosts: string;
  learned_penalties: string;
  last_synced_at: string | null;
}

export function getPreferences(
  db: Database,
  userId: number,
): UserScoutPreferences | null {
  const row = db
    .prepare<[number], PreferencesRow>(
      "SELECT * FROM user_scout_preferences WHERE user_id = ?",
    )
    .get(userId);
  if (!row) return null;

  return {
    userId: row.user_id,
    targetRoles: parseStringArray(row.target_roles),
    roleKeywords: parseStringArray(row.role_keywords),
    targetLocations: parseStringArray(row.target_locations),
    locationFlexibility: row.location_flexibility === "strict" ? "strict" : "preferred",
    targetCompanyIds: parseNumberArray(row.target_company_ids),
    excludedCompanyIds: parseNumberArray(row.excluded_company_ids),
    targetIndustries: parseStringArray(row.target_industries),
    excludedIndustries: parseStringArray(row.excluded_industries),
    companyStages: parseStringArray(row.company_stages),
    minSalary: row.min_salary,
    salaryFlexibility: row.salary_flexibility === "strict" ? "strict" : "flexible",
    minScore: row.min_score,
    learnedBoosts: parseAdjustments(row.learned_boosts),
    learnedPenalties: parseAdjustments(row.learned_penalties),
    lastSyncedAt: row.last_synced_at,
  };
}

export function savePreferences(db: Database, prefs: UserScoutPreferences): void {
  db.prepare(
    `INSERT INTO user_scout_preferences (
      user_id, target_roles, role_keywords, target_locations, location_flexibility,
      target_company_ids, excluded_company_ids, target_industries, excluded_industries,
      company_stages, min_salary, salary_flexibility, min_score,
      learned_boosts, learned_penalties, last_synced_at, updated_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, datetime('now'))
    ON CONFLICT(user_id) DO UPDATE SET
      target_roles = excluded.target_roles,
      role_keywords = excluded.role_keywords,
      target_locations = excluded.target_locations,
      location_flexibility = excluded.location_flexibility,
      target_company_ids = excluded.target_company_ids,
      excluded_company_ids = excluded.excluded_company_ids,
      target_industries = excluded.target_industries,
      excluded_industries = excluded.excluded_industries,
      company_stages = excluded.company_stages,
      min_salary = excluded.min_salary,
      salary_flexibility = excluded.salary_flexibility,
      min_score = excluded.min_score,
      learned_boosts = excluded.learned_boosts,
      learned_penalties = excluded.learned_penalties,
      last_synced_at = excluded.last_synced_at,
      updated_at = excluded.updated_at`,
  ).run(
    prefs.userId,
    JSON.stringify(prefs.targetRoles),
    JSON.stringify(prefs.roleKeywords),
    JSON.stringify(prefs.targetLocations),
    prefs.locationFlexibility,
    JSON.stringify(prefs.targetCompanyIds),
    JSON.stringify(prefs.excludedCompanyIds),
    JSON.stringify(prefs.targetIndustries),
    JSON.stringify(prefs.excludedIndustries),
    JSON.stringify(prefs.companyStages),
    prefs.minSalary,
    prefs.salaryFlexibility,
    prefs.minScore,
    JSON.stringify(prefs.learnedBoosts),
    JSON.stringify(prefs.learnedPenalties),
    prefs.lastSyncedAt,
  );
}

export function getUserIdsWithPreferences(db: Database): number[] {
  return db
    .prepare<[], { user_id: number }>(
      "SELECT user_id FROM user_scout_preferences ORDER BY user_id",
    )
    .all()
    .map((r) => r.user_id);
}

// Shared Pool

interface ScoutedJobRow {
  id: number;
  dedup_hash: string;
  external_id: string | null;
  title: string;
  company: string;
  company_normalized: string;
  location: string | null;
  city: string | null;
  description: string | null;
  salary_min: number | null;
  salary_max: number | null;
  salary_estimated: number;
  source: string;
  source_url: string;
  apply_url: string | null;
  posted_date: string | null;
  matched_company_id: number | null;
  is_active: number;
  inactive_reason: string | null;
  last_seen_at: string;
  scouted_at: string;
}

function toScoutedJob(row: ScoutedJobRow): ScoutedJob {
  return {
    id: row.id,
    fingerprint: row.dedup_hash,
    externalId: row.external_id,
    title: row.title,
    company: row.company,
    companyNormalized: row.company_normalized,
    location: row.location,
    city: row.city,
    description: row.description,
    salaryMin: row.salary_min,
    salaryMax: row.salary_max,
    salaryEstimated: row.salary_estimated === 1,
    source: toSource(row.source),
    sourceUrl: row.source_url,
    applyUrl: row.apply_url,
    postedDate: row.posted_date,
    matchedCompanyId: row.matched_company_id,
    isActive: row.is_active === 1,
    inactiveReason: row.inactive_reason,
    lastSeenAt: row.last_seen_at,
    scoutedAt: row.scouted_at,
  };
}

export type UpsertOutcome = "inserted" | "refreshed";

/**
 * Insert on first sighting; on a re-sighting refresh last_seen_at, reactivate,
 * and fill fields the first sighting lacked.
 */
export function upsertScoutedJob(
  db: Database,
  candidate: PostingCandidate,
  matchedCompanyId: number | null,
  seenAt: string,
): UpsertOutcome {
  const existing = db
    .prepare<[string], { id: number }>("SELECT id FROM scouted_jobs WHERE dedup_hash = ?")
    .get(candidate.fingerprint);

  if (existing) {
    db.prepare(
      `UPDATE scouted_jobs SET
        last_seen_at = ?,
        is_active = 1,
        inactive_reason = NULL,
        description = COALESCE(description, ?),
        salary_min = COALESCE(salary_min, ?),
        salary_max = COALESCE(salary_max, ?),
        apply_url = COALESCE(apply_url, ?),
        posted_date = COALESCE(posted_date, ?),
        matched_company_id = COALESCE(matched_company_id, ?)
      WHERE id = ?`,
    ).run(
      seenAt,
      candidate.description,
      candidate.salaryMin,
      candidate.salaryMax,
      candidate.applyUrl,
      candidate.postedDate,
      matchedCompanyId,
      existing.id,
    );
    return "refreshed";
  }

  db.prepare(
    `INSERT INTO scouted_jobs (
      dedup_hash, external_id, title, company, company_normalized, location, city,
      description, salary_min, salary_max, salary_estimated, source, source_url,
      apply_url, posted_date, raw_payload, matched_company_id, is_active,
      last_seen_at, scouted_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 1, ?, ?)`,
  ).run(
    candidate.fingerprint,
    candidate.externalId,
    candidate.title,
    candidate.company,
    candidate.companyNormalized,
    candidate.location,
    candidate.city,
    candidate.description,
    candidate.salaryMin,
    candidate.salaryMax,
    candidate.salaryEstimated ? 1 : 0,
    candidate.source,
    candidate.sourceUrl,
    candidate.applyUrl,
    candidate.postedDate,
    candidate.rawPayload,
    matchedCompanyId,
    seenAt,
    seenAt,
  );
  return "inserted";
}

export function markStaleScoutedJobs(db: Database, cutoff: string): number {
  const result = db
    .prepare(
      `UPDATE scouted_jobs SET is_active = 0, inactive_reason = 'not_seen_7d'
       WHERE is_active = 1 AND last_seen_at < ?`,
    )
    .run(cutoff);
  return result.changes;
}

export function getScoutedJob(db: Database, id: number): ScoutedJob | null {
  const row = db
    .prepare<[number], ScoutedJobRow>("SELECT * FROM scouted_jobs WHERE id = ?")
    .get(id);
  return row ? toScoutedJob(row) : null;
}

export function getScoutedJobs(db: Database, activeOnly = false): ScoutedJob[] {
  const sql = activeOnly
    ? "SELECT * FROM scouted_jobs WHERE is_active = 1 ORDER BY id"
    : "SELECT * FROM scouted_jobs ORDER BY id";
  return db.prepare<[], ScoutedJobRow>(sql).all().map(toScoutedJob);
}

/** Active pool jobs this user has no match row for yet. */
export function getUnmatchedActiveJobs(db: Database, userId: number): ScoutedJob[] {
  return db
    .prepare<[number], ScoutedJobRow>(
      `SELECT sj.* FROM scouted_jobs sj
       WHERE sj.is_active = 1
         AND NOT EXISTS (
           SELECT 1 FROM user_scouted_jobs usj
           WHERE usj.scouted_job_id = sj.id AND usj.user_id = ?
         )
       ORDER BY sj.id`,
    )
    .all(userId)
    .map(toScoutedJob);
}

// User Matches

interface UserScoutedJobRow {
  id: number;
  user_id: number;
  scouted_job_id: number;
  relevance_score: number;
  score_breakdown: string;
  match_reasons: string;
  status: string;
  dismiss_reason: string | null;
  pipeline_job_id: number | null;
  matched_at: string;
}

const MATCH_STATUSES: readonly UserScoutedJobStatus[] = ["new", "viewed", "saved", "dismissed"];

function toUserScoutedJob(row: UserScoutedJobRow): UserScoutedJob {
  return {
    id: row.id,
    userId: row.user_id,
    scoutedJobId: row.scouted_job_id,
    relevanceScore: row.relevance_score,
    scoreBreakdown: parseBreakdown(row.score_breakdown),
    matchReasons: parseStringArray(row.match_reasons),
    status: MATCH_STATUSES.find((s) => s === row.status) ?? "new",
    dismissReason: row.dismiss_reason,
    pipelineJobId: row.pipeline_job_id,
    matchedAt: row.matched_at,
  };
}

/** Returns false when the (user, job) pair already exists. */
export function insertUserScoutedJob(
  db: Database,
  match: {
    userId: number;
    scoutedJobId: number;
    relevanceScore: number;
    scoreBreakdown: ScoreBreakdown;
    matchReasons: string[];
    matchedAt: string;
  },
): boolean {
  const result = db
    .prepare(
      `INSERT INTO user_scouted_jobs (
        user_id, scouted_job_id, relevance_score, score_breakdown, match_reasons, matched_at
      ) VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(user_id, scouted_job_id) DO NOTHING`,
    )
    .run(
      match.userId,
      match.scoutedJobId,
      match.relevanceScore,
      JSON.stringify(match.scoreBreakdown),
      JSON.stringify(match.matchReasons),
      match.matchedAt,
    );
  return result.changes > 0;
}

export function getUserScoutedJob(db: Database, id: number): UserScoutedJob | null {
  const row = db
    .prepare<[number], UserScoutedJobRow>("SELECT * FROM user_scouted_jobs WHERE id = ?")
    .get(id);
  return row ? toUserScoutedJob(row) : null;
}

export interface UserMatch extends UserScoutedJob {
  job: ScoutedJob;
}

export function listUserMatches(
  db: Database,
  userId: number,
  options: { status?: UserScoutedJobStatus; minScore?: number; limit?: number; offset?: number } = {},
): UserMatch[] {
  const rows = db
    .prepare<[number, string | null, string | null, number, number, number], UserScoutedJobRow>(
      `SELECT * FROM user_scouted_jobs
       WHERE user_id = ? AND (? IS NULL OR status = ?) AND relevance_score >= ?
       ORDER BY relevance_score DESC, matched_at DESC
       LIMIT ? OFFSET ?`,
    )
    .all(
      userId,
      options.status ?? null,
      options.status ?? null,
      options.minScore ?? 0,
      options.limit ?? 50,
      options.offset ?? 0,
    );

  const matches: UserMatch[] = [];
  for (const row of rows) {
    const job = getScoutedJob(db, row.scouted_job_id);
    if (job) matches.push({ ...toUserScoutedJob(row), job });
  }
  return matches;
}

export function setUserScoutedJobStatus(
  db: Database,
  id: number,
  status: UserScoutedJobStatus,
  dismissReason: string | null = null,
): void {
  db.prepare(
    `UPDATE user_scouted_jobs
     SET status = ?, dismiss_reason = ?, updated_at = datetime('now')
     WHERE id = ?`,
  ).run(status, dismissReason, id);
}

export function linkUserScoutedJobToPipeline(
  db: Database,
  id: number,
  pipelineJobId: number,
): void {
  db.prepare(
    `UPDATE user_scouted_jobs SET pipeline_job_id = ?, status = 'saved', updated_at = datetime('now')
     WHERE id = ?`,
  ).run(pipelineJobId, id);
}

export function countDismissals(db: Database, userId: number, reason: string): number {
  const row = db
    .prepare<[number, string], { count: number }>(
      `SELECT COUNT(*) as count FROM user_scouted_jobs
       WHERE user_id = ? AND status = 'dismissed' AND dismiss_reason = ?`,
    )
    .get(userId, reason);
  return row?.count ?? 0;
}

// Scout Results

interface ScoutResultRow {
  id: number;
  user_id: number;
  external_id: string | null;
  title: string;
  company: string;
  location: string | null;
  description: string | null;
  salary_min: number | null;
  salary_max: number | null;
  source: string;
  source_url: string;
  apply_url: string | null;
  posted_date: string | null;
  fit_score: number;
  b2c_validated: number;
  ai_reasoning: string | null;
  status: string;
  pipeline_job_id: number | null;
  scout_run_id: string;
  created_at: string;
}

const RESULT_STATUSES: readonly ScoutResultStatus[] = ["new", "reviewed", "promoted", "dismissed"];

function toScoutResult(row: ScoutResultRow): ScoutResult {
  return {
    id: row.id,
    userId: row.user_id,
    externalId: row.external_id,
    title: row.title,
    company: row.company,
    location: row.location,
    description: row.description,
    salaryMin: row.salary_min,
    salaryMax: row.salary_max,
    source: toSource(row.source),
    sourceUrl: row.source_url,
    applyUrl: row.apply_url,
    postedDate: row.posted_date,
    fitScore: row.fit_score,
    b2cValidated: row.b2c_validated === 1,
    aiReasoning: row.ai_reasoning ?? "",
    status: RESULT_STATUSES.find((s) => s === row.status) ?? "new",
    pipelineJobId: row.pipeline_job_id,
    scoutRunId: row.scout_run_id,
    createdAt: row.created_at,
  };
}

export function insertScoutResult(
  db: Database,
  result: {
    userId: number;
    candidate: PostingCandidate;
    fitScore: number;
    b2cValidated: boolean;
    aiReasoning: string;
    status: ScoutResultStatus;
    pipelineJobId: number | null;
    scoutRunId: string;
  },
): number {
  const { candidate } = result;
  const inserted = db
    .prepare(
      `INSERT INTO scout_results (
        user_id, external_id, dedup_hash, title, company, location, description,
        salary_min, salary_max, source, source_url, apply_url, posted_date,
        fit_score, b2c_validated, ai_reasoning, status, pipeline_job_id, scout_run_id
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    )
    .run(
      result.userId,
      candidate.externalId,
      candidate.fingerprint,
      candidate.title,
      candidate.company,
      candidate.location,
      candidate.description,
      candidate.salaryMin,
      candidate.salaryMax,
      candidate.source,
      candidate.sourceUrl,
      candidate.applyUrl,
      candidate.postedDate,
      result.fitScore,
      result.b2cValidated ? 1 : 0,
      result.aiReasoning,
      result.status,
      result.pipelineJobId,
      result.scoutRunId,
    );
  return Number(inserted.lastInsertRowid);
}

export function getScoutResult(db: Database, id: number): ScoutResult | null {
  const row = db
    .prepare<[number], ScoutResultRow>("SELECT * FROM scout_results WHERE id = ?")
    .get(id);
  return row ? toScoutResult(row) : null;
}

export function listScoutResults(
  db: Database,
  userId: number,
  options: { status?: ScoutResultStatus; limit?: number } = {},
): ScoutResult[] {
  return db
    .prepare<[number, string | null, string | null, number], ScoutResultRow>(
      `SELECT * FROM scout_results
       WHERE user_id = ? AND (? IS NULL OR status = ?)
       ORDER BY fit_score DESC, id DESC
       LIMIT ?`,
    )
    .all(userId, options.status ?? null, options.status ?? null, options.limit ?? 50)
    .map(toScoutResult);
}

export function setScoutResultStatus(
  db: Database,
  id: number,
  status: ScoutResultStatus,
  pipelineJobId: number | null = null,
): void {
  db.prepare(
    `UPDATE scout_results SET status = ?, pipeline_job_id = COALESCE(?, pipeline_job_id)
     WHERE id = ?`,
  ).run(status, pipelineJobId, id);
}

/** Everything the user has already seen: prior results and pipeline jobs. */
export function getUserDedupRows(db: Database, userId: number): StoredPosting[] {
  const results = db
    .prepare<
      [number],
      { source: string; external_id: string | null; source_url: string; dedup_hash: string | null; title: string; company: string }
    >(
      `SELECT source, external_id, source_url, dedup_hash, title, company
       FROM scout_results WHERE user_id = ?`,
    )
    .all(userId)
    .map((r) => ({
      source: r.source,
      externalId: r.external_id,
      url: r.source_url,
      fingerprint: r.dedup_hash,
      title: r.title,
      company: r.company,
    }));

  const pipeline = db
    .prepare<[number], { source: string | null; url: string | null; title: string; company: string }>(
      "SELECT source, url, title, company FROM pipeline_jobs WHERE user_id = ?",
    )
    .all(userId)
    .map((r) => ({
      source: r.source ?? "pipeline",
      externalId: null,
      url: r.url ?? "",
      fingerprint: null,
      title: r.title,
      company: r.company,
    }));

  return [...results, ...pipeline];
}

// Pipeline Jobs

export function insertPipelineJob(
  db: Database,
  job: {
    userId: number;
    title: string;
    company: string;
    location: string | null;
    url: string | null;
    source: string;
    salaryMin: number | null;
    salaryMax: number | null;
    notes: string | null;
  },
): number {
  const result = db
    .prepare(
      `INSERT INTO pipeline_jobs (
        user_id, title, company, location, url, source, salary_min, salary_max, notes
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    )
    .run(
      job.userId,
      job.title,
      job.company,
      job.location,
      job.url,
      job.source,
      job.salaryMin,
      job.salaryMax,
      job.notes,
    );
  return Number(result.lastInsertRowid);
}

export function countPipelineJobs(db: Database, userId: number): number {
  const row = db
    .prepare<[number], { count: number }>(
      "SELECT COUNT(*) as count FROM pipeline_jobs WHERE user_id = ?",
    )
    .get(userId);
  return row?.count ?? 0;
}

// Run Log

export function createScoutRun(
  db: Database,
  runId: string,
  kind: "on_demand" | "shared_pool",
  userId: number | null,
): void {
  db.prepare("INSERT INTO scout_runs (run_id, kind, user_id) VALUES (?, ?, ?)").run(
    runId,
    kind,
    userId,
  );
}

export function finishScoutRun(
  db: Database,
  runId: string,
  status: "completed" | "failed",
  summary: { errors: string[] },
): void {
  db.prepare(
    `UPDATE scout_runs SET finished_at = datetime('now'), status = ?, summary = ?, error_count = ?
     WHERE run_id = ?`,
  ).run(status, JSON.stringify(summary), summary.errors.length, runId);
}

export function getLastScoutRun(
  db: Database,
  kind: "on_demand" | "shared_pool",
): { runId: string; status: string; startedAt: string; finishedAt: string | null } | null {
  const row = db
    .prepare<[string], { run_id: string; status: string; started_at: string; finished_at: string | null }>(
      "SELECT run_id, status, started_at, finished_at FROM scout_runs WHERE kind = ? ORDER BY started_at DESC, rowid DESC LIMIT 1",
    )
    .get(kind);
  if (!row) return null;
  return {
    runId: row.run_id,
    status: row.status,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
  };
}

// Notifications

export function logNotification(
  db: Database,
  recipient: string,
  text: string,
  status: "sent" | "failed" | "dry_run",
  error: string | null = null,
): void {
  db.prepare(
    "INSERT INTO notifications (recipient, message_preview, status, error) VALUES (?, ?, ?, ?)",
  ).run(recipient, text.substring(0, 200), status, error);
}

// Stats

export function getUserScoutStats(
  db: Database,
  userId: number,
): { matches: Record<UserScoutedJobStatus, number>; results: Record<ScoutResultStatus, number> } {
  const matches: Record<UserScoutedJobStatus, number> = { new: 0, viewed: 0, saved: 0, dismissed: 0 };
  const results: Record<ScoutResultStatus, number> = { new: 0, reviewed: 0, promoted: 0, dismissed: 0 };

  const matchRows = db
    .prepare<[number], { status: string; count: number }>(
      "SELECT status, COUNT(*) as count FROM user_scouted_jobs WHERE user_id = ? GROUP BY status",
    )
    .all(userId);
  for (const row of matchRows) {
    const status = MATCH_STATUSES.find((s) => s === row.status);
    if (status) matches[status] = row.count;
  }

  const resultRows = db
    .prepare<[number], { status: string; count: number }>(
      "SELECT status, COUNT(*) as count FROM scout_results WHERE user_id = ? GROUP BY status",
    )
    .all(userId);
  for (const row of resultRows) {
    const status = RESULT_STATUSES.find((s) => s === row.status);
    if (status) results[status] = row.count;
  }

  return { matches, results };
}
