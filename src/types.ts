// Source Identifiers

export type SourceName = "adzuna" | "serpapi" | "serper" | "greenhouse" | "lever";

// Postings

export interface SalaryRange {
  min: number | null;
  max: number | null;
  estimated: boolean;
}

/** A posting in flight, mapped from a source payload. No identity beyond its fingerprint. */
export interface PostingCandidate {
  externalId: string | null;
  fingerprint: string;
  title: string;
  company: string;
  companyNormalized: string;
  location: string | null;
  city: string | null;
  description: string | null;
  salaryMin: number | null;
  salaryMax: number | null;
  salaryEstimated: boolean;
  source: SourceName;
  sourceUrl: string;
  applyUrl: string | null;
  /** ISO date (YYYY-MM-DD) */
  postedDate: string | null;
  rawPayload: string;
}

export interface FilteredCandidate extends PostingCandidate {
  b2cHint: boolean;
}

export interface ScoutedJob {
  id: number;
  fingerprint: string;
  externalId: string | null;
  title: string;
  company: string;
  companyNormalized: string;
  location: string | null;
  city: string | null;
  description: string | null;
  salaryMin: number | null;
  salaryMax: number | null;
  salaryEstimated: boolean;
  source: SourceName;
  sourceUrl: string;
  applyUrl: string | null;
  postedDate: string | null;
  matchedCompanyId: number | null;
  isActive: boolean;
  inactiveReason: string | null;
  lastSeenAt: string;
  scoutedAt: string;
}

// Per-user views

export type ScoutResultStatus = "new" | "reviewed" | "promoted" | "dismissed";

export interface ScoutResult {
  id: number;
  userId: number;
  externalId: string | null;
  title: string;
  company: string;
  location: string | null;
  description: string | null;
  salaryMin: number | null;
  salaryMax: number | null;
  source: SourceName;
  sourceUrl: string;
  applyUrl: string | null;
  postedDate: string | null;
  fitScore: number;
  b2cValidated: boolean;
  aiReasoning: string;
  status: ScoutResultStatus;
  pipelineJobId: number | null;
  scoutRunId: string;
  createdAt: string;
}

export type UserScoutedJobStatus = "new" | "viewed" | "saved" | "dismissed";

export type DismissReason =
  | "wrong_company"
  | "salary_low"
  | "wrong_location"
  | "wrong_role"
  | "other";

export interface ScoreBreakdown {
  title: number;
  company: number;
  location: number;
  salary: number;
  keywords: number;
  recency: number;
  learned: number;
}

export interface UserScoutedJob {
  id: number;
  userId: number;
  scoutedJobId: number;
  relevanceScore: number;
  scoreBreakdown: ScoreBreakdown;
  matchReasons: string[];
  status: UserScoutedJobStatus;
  dismissReason: string | null;
  pipelineJobId: number | null;
  matchedAt: string;
}

// Preferences

export type LocationFlexibility = "preferred" | "strict";
export type SalaryFlexibility = "flexible" | "strict";

export type LearnedAdjustmentKind = "company" | "company_name" | "title_word";

export interface LearnedAdjustment {
  kind: LearnedAdjustmentKind;
  key: string;
  points: number;
}

export interface UserScoutPreferences {
  userId: number;
  targetRoles: string[];
  roleKeywords: string[];
  targetLocations: string[];
  locationFlexibility: LocationFlexibility;
  targetCompanyIds: number[];
  excludedCompanyIds: number[];
  targetIndustries: string[];
  excludedIndustries: string[];
  companyStages: string[];
  minSalary: number | null;
  salaryFlexibility: SalaryFlexibility;
  minScore: number;
  learnedBoosts: LearnedAdjustment[];
  learnedPenalties: LearnedAdjustment[];
  lastSyncedAt: string | null;
}

// Collaborators

export interface Company {
  id: number;
  name: string;
  nameNormalized: string;
  sector: string | null;
  stage: string | null;
  isExcluded: boolean;
}

export interface UserProfile {
  userId: number;
  targetRoles: string[];
  targetLocations: string[];
  coreSkills: string[];
  resumeKeywords: string[];
  industries: string[];
  experienceLevel: string | null;
  targetSalaryMin: number | null;
}

export interface User {
  id: number;
  name: string;
  telegramChatId: string | null;
}

// Run Summaries

export interface ScoutRunSummary {
  runId: string;
  sourcesQueried: number;
  totalFetched: number;
  afterDedup: number;
  afterPrefilter: number;
  aiScored: number;
  promotedToPipeline: number;
  savedForReview: number;
  dismissed: number;
  errors: string[];
}

export interface PoolRunSummary {
  runId: string;
  sourcesQueried: number;
  totalFetched: number;
  inserted: number;
  refreshed: number;
  markedInactive: number;
  usersScored: number;
  matchesCreated: number;
  errors: string[];
}

// Connectors

export interface ConnectorResult {
  source: SourceName;
  label: string;
  jobs: PostingCandidate[];
  success: boolean;
  error?: string;
  responseTimeMs: number;
  rateLimited: boolean;
}
