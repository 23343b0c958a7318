import { describe, expect, it } from "vitest";
import {
  DEFAULT_EXCLUDED_INDUSTRIES,
  derivePreferencesFromProfile,
  getOrCreatePreferences,
  parsePreferencesPatch,
  syncPreferencesFromProfile,
  updatePreferences,
} from "../src/preferences";
import { getPreferences, insertUser, savePreferences, upsertProfile } from "../src/db/operations";
import type { UserProfile } from "../src/types";
import { FIXED_NOW, testConfig, testDatabase } from "./helpers";

function profile(userId: number, overrides: Partial<UserProfile> = {}): UserProfile {
  return {
    userId,
    targetRoles: ["VP Growth", "Head of Growth"],
    targetLocations: ["Bangalore"],
    coreSkills: ["growth", "b2c"],
    resumeKeywords: ["b2c", "retention"],
    industries: ["Fintech"],
    experienceLevel: "executive",
    targetSalaryMin: 5_000_000,
    ...overrides,
  };
}

describe("derivePreferencesFromProfile", () => {
  it("copies targets and merges skills into role keywords", () => {
    const prefs = derivePreferencesFromProfile(7, profile(7));

    expect(prefs.targetRoles).toEqual(["VP Growth", "Head of Growth"]);
    expect(prefs.roleKeywords).toEqual(["growth", "b2c", "retention"]);
    expect(prefs.targetIndustries).toEqual(["Fintech"]);
    expect(prefs.minSalary).toBe(5_000_000);
    expect(prefs.excludedIndustries).toEqual(DEFAULT_EXCLUDED_INDUSTRIES);
    expect(prefs.minScore).toBe(30);
  });

  it("starts empty without a profile", () => {
    const prefs = derivePreferencesFromProfile(7, null);
    expect(prefs.targetRoles).toEqual([]);
    expect(prefs.minSalary).toBeNull();
  });
});

describe("stored preferences", () => {
  it("creates defaults once and syncs without losing learned data", () => {
    const db = testDatabase(testConfig());
    const userId = insertUser(db, { name: "Test User" });
    upsertProfile(db, profile(userId));

    const created = getOrCreatePreferences(db, userId);
    savePreferences(db, {
      ...created,
      locationFlexibility: "strict",
      learnedPenalties: [{ kind: "title_word", key: "intern", points: 5 }],
    });

    upsertProfile(db, profile(userId, { targetRoles: ["Chief Growth Officer"] }));
    const synced = syncPreferencesFromProfile(db, userId, FIXED_NOW);

    expect(synced?.targetRoles).toEqual(["Chief Growth Officer"]);
    expect(synced?.locationFlexibility).toBe("strict");
    expect(synced?.learnedPenalties).toEqual([{ kind: "title_word", key: "intern", points: 5 }]);
    expect(getPreferences(db, userId)?.lastSyncedAt).toBe(FIXED_NOW.toISOString());
  });

  it("has nothing to sync before preferences exist", () => {
    const db = testDatabase(testConfig());
    const userId = insertUser(db, { name: "Test User" });
    expect(syncPreferencesFromProfile(db, userId)).toBeNull();
  });

  it("applies a patch over the stored preferences", () => {
    const db = testDatabase(testConfig());
    const userId = insertUser(db, { name: "Test User" });

    const updated = updatePreferences(db, userId, { minScore: 45, targetLocations: ["Pune"] });

    expect(updated.minScore).toBe(45);
    expect(getPreferences(db, userId)?.targetLocations).toEqual(["Pune"]);
  });
});

describe("parsePreferencesPatch", () => {
  it("accepts known fields and ignores the rest", () => {
    expect(
      parsePreferencesPatch({
        targetRoles: [" VP Growth ", "VP Growth"],
        excludedCompanyIds: [3, 4],
        locationFlexibility: "strict",
        minSalary: 2_500_000.4,
        minScore: 42,
        learnedPenalties: [],
      }),
    ).toEqual({
      ok: true,
      patch: {
        targetRoles: ["VP Growth"],
        excludedCompanyIds: [3, 4],
        locationFlexibility: "strict",
        minSalary: 2_500_000,
        minScore: 42,
      },
    });
  });

  it("allows clearing the minimum salary", () => {
    expect(parsePreferencesPatch({ minSalary: null })).toEqual({ ok: true, patch: { minSalary: null } });
  });

  it("rejects malformed values", () => {
    expect(parsePreferencesPatch([])).toEqual({ ok: false, error: "Body must be a JSON object" });
    expect(parsePreferencesPatch({ targetRoles: "VP" })).toEqual({
      ok: false,
      error: "targetRoles must be an array of strings",
    });
    expect(parsePreferencesPatch({ targetCompanyIds: [1.5] })).toEqual({
      ok: false,
      error: "targetCompanyIds must be an array of integers",
    });
    expect(parsePreferencesPatch({ salaryFlexibility: "loose" })).toEqual({
      ok: false,
      error: "salaryFlexibility must be flexible or strict",
    });
    expect(parsePreferencesPatch({ minSalary: -1 })).toEqual({
      ok: false,
      error: "minSalary must be a non-negative number or null",
    });
    expect(parsePreferencesPatch({ minScore: 101 })).toEqual({
      ok: false,
      error: "minScore must be between 0 and 100",
    });
  });
});
