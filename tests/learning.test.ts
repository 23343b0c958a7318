import { beforeEach, describe, expect, it } from "vitest";
import { applyDismissFeedback, dismissMatch, extractTitleWords } from "../src/preferences";
import {
  getPreferences,
  getScoutedJobs,
  getUserScoutedJob,
  insertUserScoutedJob,
  listUserMatches,
  upsertScoutedJob,
} from "../src/db/operations";
import type { Database } from "../src/db";
import { FIXED_NOW, addUser, candidate, preferences, testConfig, testDatabase } from "./helpers";

const acmeJob = { title: "VP Growth", company: "Acme Pvt Ltd", matchedCompanyId: null };

describe("applyDismissFeedback", () => {
  it("penalizes a directory company by id and compounds", () => {
    const job = { ...acmeJob, matchedCompanyId: 3 };
    const once = applyDismissFeedback(preferences(1), "wrong_company", job, 1);
    const twice = applyDismissFeedback(once, "wrong_company", job, 2);

    expect(once.learnedPenalties).toEqual([{ kind: "company", key: "3", points: 15 }]);
    expect(twice.learnedPenalties).toEqual([{ kind: "company", key: "3", points: 30 }]);
  });

  it("penalizes an unknown company by normalized name", () => {
    const updated = applyDismissFeedback(preferences(1), "wrong_company", acmeJob, 1);
    expect(updated.learnedPenalties).toEqual([{ kind: "company_name", key: "acme", points: 15 }]);
  });

  it("penalizes distinct title words", () => {
    const updated = applyDismissFeedback(
      preferences(1),
      "wrong_role",
      { ...acmeJob, title: "Senior Growth Manager - Growth" },
      1,
    );
    expect(updated.learnedPenalties).toEqual([
      { kind: "title_word", key: "senior", points: 5 },
      { kind: "title_word", key: "growth", points: 5 },
      { kind: "title_word", key: "manager", points: 5 },
    ]);
  });

  it("waits for the third location dismissal before going strict", () => {
    const prefs = preferences(1);
    expect(applyDismissFeedback(prefs, "wrong_location", acmeJob, 2)).toBe(prefs);
    expect(applyDismissFeedback(prefs, "wrong_location", acmeJob, 3).locationFlexibility).toBe("strict");
  });

  it("leaves preferences alone when there is nothing to learn", () => {
    const prefs = preferences(1, { minSalary: null });
    expect(applyDismissFeedback(prefs, "salary_low", acmeJob, 5)).toBe(prefs);
    expect(applyDismissFeedback(prefs, "other", acmeJob, 1)).toBe(prefs);
  });
});

describe("extractTitleWords", () => {
  it("keeps the first five words of three letters or more", () => {
    expect(extractTitleWords("Alpha Beta Gamma Delta Epsilon Zeta Eta")).toEqual([
      "alpha",
      "beta",
      "gamma",
      "delta",
      "epsilon",
    ]);
    expect(extractTitleWords("VP of HR")).toEqual([]);
  });
});

describe("dismissMatch", () => {
  let db: Database;
  let userId: number;
  let matchIds: number[];

  beforeEach(() => {
    db = testDatabase(testConfig());
    userId = addUser(db, "Test User", { minSalary: 2_000_000 });

    const seenAt = FIXED_NOW.toISOString();
    for (const title of ["VP Growth", "Head of Brand", "Director Marketing"]) {
      upsertScoutedJob(db, candidate({ title }), null, seenAt);
    }
    for (const job of getScoutedJobs(db)) {
      insertUserScoutedJob(db, {
        userId,
        scoutedJobId: job.id,
        relevanceScore: 50,
        scoreBreakdown: { title: 40, company: 0, location: 10, salary: 0, keywords: 0, recency: 0, learned: 0 },
        matchReasons: [],
        matchedAt: seenAt,
      });
    }
    matchIds = listUserMatches(db, userId).map((m) => m.id).sort((a, b) => a - b);
  });

  it("raises the minimum salary on the third salary dismissal only", () => {
    dismissMatch(db, userId, matchIds[0], "salary_low");
    expect(getPreferences(db, userId)?.minSalary).toBe(2_000_000);

    dismissMatch(db, userId, matchIds[1], "salary_low");
    expect(getPreferences(db, userId)?.minSalary).toBe(2_000_000);

    const outcome = dismissMatch(db, userId, matchIds[2], "salary_low");
    expect(outcome?.preferences?.minSalary).toBe(2_200_000);
    expect(getPreferences(db, userId)?.minSalary).toBe(2_200_000);
  });

  it("records the status and reason on the match", () => {
    const outcome = dismissMatch(db, userId, matchIds[0], "Wrong_Role");

    expect(outcome?.match.status).toBe("dismissed");
    expect(getUserScoutedJob(db, matchIds[0])?.dismissReason).toBe("wrong_role");
    expect(getPreferences(db, userId)?.learnedPenalties.map((p) => p.key)).toEqual(["growth"]);
  });

  it("keeps a free-text reason without learning from it", () => {
    const outcome = dismissMatch(db, userId, matchIds[0], "too far");

    expect(getUserScoutedJob(db, matchIds[0])?.dismissReason).toBe("too far");
    expect(outcome?.preferences?.learnedPenalties).toEqual([]);
  });

  it("refuses another user's match", () => {
    const otherId = addUser(db, "Other User");
    expect(dismissMatch(db, otherId, matchIds[0], "other")).toBeNull();
    expect(getUserScoutedJob(db, matchIds[0])?.status).toBe("new");
  });
});
