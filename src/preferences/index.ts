import { logger } from "../logger";
import type { Database } from "../db";
import { getPreferences, getProfile, savePreferences } from "../db/operations";
import type {
  LocationFlexibility,
  SalaryFlexibility,
  UserProfile,
  UserScoutPreferences,
} from "../types";

export { applyDismissFeedback, dismissMatch, extractTitleWords } from "./learning";

export const DEFAULT_EXCLUDED_INDUSTRIES = ["Food Delivery"];
export const DEFAULT_MIN_SCORE = 30;

function unique(values: string[]): string[] {
  return [...new Set(values.map((v) => v.trim()).filter(Boolean))];
}

/** Fields that follow the profile; everything else is owned by the user or learning. */
function profileFields(
  profile: UserProfile | null,
): Pick<
  UserScoutPreferences,
  "targetRoles" | "roleKeywords" | "targetLocations" | "targetIndustries" | "minSalary"
> {
  if (!profile) {
    return { targetRoles: [], roleKeywords: [], targetLocations: [], targetIndustries: [], minSalary: null };
  }
  return {
    targetRoles: unique(profile.targetRoles),
    roleKeywords: unique([...profile.coreSkills, ...profile.resumeKeywords]),
    targetLocations: unique(profile.targetLocations),
    targetIndustries: unique(profile.industries),
    minSalary: profile.targetSalaryMin,
  };
}

export function derivePreferencesFromProfile(
  userId: number,
  profile: UserProfile | null,
): UserScoutPreferences {
  return {
    userId,
    ...profileFields(profile),
    locationFlexibility: "preferred",
    targetCompanyIds: [],
    excludedCompanyIds: [],
    excludedIndustries: [...DEFAULT_EXCLUDED_INDUSTRIES],
    companyStages: [],
    salaryFlexibility: "flexible",
    minScore: DEFAULT_MIN_SCORE,
    learnedBoosts: [],
    learnedPenalties: [],
    lastSyncedAt: null,
  };
}

export function getOrCreatePreferences(db: Database, userId: number): UserScoutPreferences {
  const existing = getPreferences(db, userId);
  if (existing) return existing;

  const prefs = derivePreferencesFromProfile(userId, getProfile(db, userId));
  savePreferences(db, prefs);
  logger.info(`Preferences: derived defaults for user ${userId} from profile`);
  return prefs;
}

/** Re-derive profile-owned fields. Learned adjustments and user-set modes survive. */
export function syncPreferencesFromProfile(
  db: Database,
  userId: number,
  now: Date = new Date(),
): UserScoutPreferences | null {
  const prefs = getPreferences(db, userId);
  if (!prefs) return null;

  const synced: UserScoutPreferences = {
    ...prefs,
    ...profileFields(getProfile(db, userId)),
    lastSyncedAt: now.toISOString(),
  };
  savePreferences(db, synced);
  return synced;
}

// Manual edits

export type PreferencesPatch = Partial<
  Omit<UserScoutPreferences, "userId" | "learnedBoosts" | "learnedPenalties" | "lastSyncedAt">
>;

export type PatchResult = { ok: true; patch: PreferencesPatch } | { ok: false; error: string };

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isIdArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => Number.isInteger(v));
}

function isLocationFlexibility(value: unknown): value is LocationFlexibility {
  return value === "preferred" || value === "strict";
}

function isSalaryFlexibility(value: unknown): value is SalaryFlexibility {
  return value === "flexible" || value === "strict";
}

const STRING_LIST_FIELDS = [
  "targetRoles",
  "roleKeywords",
  "targetLocations",
  "targetIndustries",
  "excludedIndustries",
  "companyStages",
] as const;

const ID_LIST_FIELDS = ["targetCompanyIds", "excludedCompanyIds"] as const;

/** Validates an untrusted request body into a patch. Unknown keys are ignored. */
export function parsePreferencesPatch(body: unknown): PatchResult {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return { ok: false, error: "Body must be a JSON object" };
  }

  const patch: PreferencesPatch = {};
  const field = (key: string): unknown => (key in body ? Reflect.get(body, key) : undefined);

  for (const key of STRING_LIST_FIELDS) {
    const value = field(key);
    if (value === undefined) continue;
    if (!isStringArray(value)) return { ok: false, error: `${key} must be an array of strings` };
    patch[key] = unique(value);
  }

  for (const key of ID_LIST_FIELDS) {
    const value = field(key);
    if (value === undefined) continue;
    if (!isIdArray(value)) return { ok: false, error: `${key} must be an array of integers` };
    patch[key] = value;
  }

  const location = field("locationFlexibility");
  if (location !== undefined) {
    if (!isLocationFlexibility(location)) {
      return { ok: false, error: "locationFlexibility must be preferred or strict" };
    }
    patch.locationFlexibility = location;
  }

  const salary = field("salaryFlexibility");
  if (salary !== undefined) {
    if (!isSalaryFlexibility(salary)) {
      return { ok: false, error: "salaryFlexibility must be flexible or strict" };
    }
    patch.salaryFlexibility = salary;
  }

  const minSalary = field("minSalary");
  if (minSalary === null) {
    patch.minSalary = null;
  } else if (typeof minSalary === "number" && minSalary >= 0) {
    patch.minSalary = Math.round(minSalary);
  } else if (minSalary !== undefined) {
    return { ok: false, error: "minSalary must be a non-negative number or null" };
  }

  const minScore = field("minScore");
  if (minScore !== undefined) {
    if (typeof minScore !== "number" || minScore < 0 || minScore > 100) {
      return { ok: false, error: "minScore must be between 0 and 100" };
    }
    patch.minScore = Math.round(minScore);
  }

  return { ok: true, patch };
}

export function updatePreferences(
  db: Database,
  userId: number,
  patch: PreferencesPatch,
): UserScoutPreferences {
  const updated = { ...getOrCreatePreferences(db, userId), ...patch };
  savePreferences(db, updated);
  return updated;
}
