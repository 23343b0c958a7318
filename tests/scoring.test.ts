import { describe, expect, it } from "vitest";
import {
  countKeywordOverlap,
  daysSince,
  scoreCompany,
  scoreJob,
  scoreSalary,
  scoreTitle,
  titleKeywords,
  type ScorableJob,
} from "../src/scoring";
import type { Company } from "../src/types";
import { FIXED_NOW, preferences } from "./helpers";

const acme: Company = {
  id: 1,
  name: "Acme",
  nameNormalized: "acme",
  sector: "Fintech",
  stage: "Growth",
  isExcluded: false,
};

function job(overrides: Partial<ScorableJob> = {}): ScorableJob {
  return {
    title: "VP Growth",
    company: "Acme",
    location: "Bangalore, Karnataka",
    city: "Bangalore",
    description: "Own B2C growth",
    salaryMin: 5_000_000,
    salaryMax: null,
    postedDate: "2026-03-09",
    matchedCompanyId: 1,
    ...overrides,
  };
}

const strongPrefs = preferences(1, {
  targetRoles: ["VP Growth"],
  targetLocations: ["Bangalore"],
  roleKeywords: ["growth", "b2c"],
  minSalary: 4_000_000,
  targetCompanyIds: [1],
});

describe("scoreJob", () => {
  it("sums every factor for a strong match", () => {
    const score = scoreJob(job(), strongPrefs, acme, FIXED_NOW);

    expect(score.total).toBe(97);
    expect(score.breakdown).toEqual({
      title: 40,
      company: 25,
      location: 15,
      salary: 10,
      keywords: 2,
      recency: 5,
      learned: 0,
    });
    expect(score.reasons).toEqual([
      "Exact match with target role",
      "Company in target list",
      "City matches target location",
      "Meets minimum salary",
      "2 role keywords in description",
      "Posted ≤1 day ago",
    ]);
    expect(score.hardFiltered).toBe(false);
  });

  it("clamps the total at 100", () => {
    const prefs = { ...strongPrefs, learnedBoosts: [{ kind: "company" as const, key: "1", points: 20 }] };
    const score = scoreJob(job(), prefs, acme, FIXED_NOW);

    expect(score.total).toBe(100);
    expect(score.breakdown.learned).toBe(20);
  });

  it("clamps at zero after strict-mode penalties", () => {
    const prefs = preferences(1, {
      targetRoles: ["Chief Financial Officer"],
      targetLocations: ["Mumbai"],
      locationFlexibility: "strict",
      minSalary: 4_000_000,
      salaryFlexibility: "strict",
    });
    const score = scoreJob(
      job({ salaryMin: 1_000_000, postedDate: null, description: null }),
      prefs,
      null,
      FIXED_NOW,
    );

    expect(score.total).toBe(0);
    expect(score.breakdown.location).toBe(-20);
    expect(score.breakdown.salary).toBe(-15);
    expect(score.reasons).toEqual(["Location mismatch (strict mode)", "Below minimum (strict mode)"]);
  });

  it("lets an excluded company override everything else", () => {
    const score = scoreJob(job(), { ...strongPrefs, excludedCompanyIds: [1] }, acme, FIXED_NOW);

    expect(score).toEqual({
      total: 0,
      breakdown: { title: 0, company: 0, location: 0, salary: 0, keywords: 0, recency: 0, learned: 0 },
      reasons: ["Company is excluded"],
      hardFiltered: true,
    });
  });

  it("hard-filters an excluded industry", () => {
    const score = scoreJob(
      job(),
      { ...strongPrefs, excludedIndustries: ["fintech"] },
      acme,
      FIXED_NOW,
    );

    expect(score.hardFiltered).toBe(true);
    expect(score.reasons).toEqual(["Industry is excluded"]);
  });

  it("never drops when a matching target location is added", () => {
    const without = scoreJob(job(), { ...strongPrefs, targetLocations: [] }, acme, FIXED_NOW);
    const withCity = scoreJob(job(), strongPrefs, acme, FIXED_NOW);

    expect(withCity.total).toBeGreaterThanOrEqual(without.total);
    expect(withCity.total - without.total).toBe(15);
  });

  it("applies learned penalties by title word and company name", () => {
    const prefs = preferences(1, {
      learnedPenalties: [
        { kind: "title_word", key: "intern", points: 5 },
        { kind: "company_name", key: "acme", points: 15 },
      ],
    });
    const score = scoreJob(
      job({ title: "Growth Intern", company: "Acme Pvt Ltd", matchedCompanyId: null, salaryMin: null }),
      prefs,
      null,
      FIXED_NOW,
    );

    expect(score.breakdown.learned).toBe(-20);
    expect(score.reasons).toContain("Learned adjustment: -20");
  });
});

describe("scoreTitle", () => {
  const prefs = preferences(1, { targetRoles: ["Head of Growth Marketing"] });

  it("falls back to target-role words without stop words", () => {
    expect(titleKeywords(prefs)).toEqual(["head", "growth", "marketing"]);
  });

  it("counts keyword hits", () => {
    expect(scoreTitle("Growth Marketing Lead", prefs)).toEqual({
      points: 25,
      reason: "2+ keyword matches in title",
    });
    expect(scoreTitle("Growth Lead", prefs)).toEqual({ points: 15, reason: "1 keyword match in title" });
    expect(scoreTitle("Accountant", prefs).points).toBe(0);
  });
});

describe("scoreCompany", () => {
  it("falls through target list, industry, then stage", () => {
    expect(scoreCompany(1, acme, preferences(1, { targetIndustries: ["fintech"] })).points).toBe(15);
    expect(scoreCompany(1, acme, preferences(1, { companyStages: ["growth stage"] })).points).toBe(10);
    expect(scoreCompany(1, null, preferences(1, { targetIndustries: ["fintech"] })).points).toBe(0);
  });
});

describe("scoreSalary", () => {
  const flexible = preferences(1, { minSalary: 1_000_000 });
  const strict = preferences(1, { minSalary: 1_000_000, salaryFlexibility: "strict" });

  it("rewards salaries near the minimum", () => {
    expect(scoreSalary(1_000_000, flexible).points).toBe(10);
    expect(scoreSalary(900_000, flexible).points).toBe(5);
    expect(scoreSalary(800_000, flexible).points).toBe(0);
    expect(scoreSalary(800_000, strict).points).toBe(-15);
  });

  it("ignores unknown salaries and unset minimums", () => {
    expect(scoreSalary(null, strict).points).toBe(0);
    expect(scoreSalary(100, preferences(1)).points).toBe(0);
  });

  it("falls back to the maximum when no minimum is posted", () => {
    const score = scoreJob(job({ salaryMin: null, salaryMax: 900_000 }), flexible, null, FIXED_NOW);
    expect(score.breakdown.salary).toBe(5);
  });
});

describe("keywords and recency", () => {
  it("counts multi-word keywords whose parts all appear", () => {
    expect(countKeywordOverlap("Own B2C growth; consumer", ["b2c", "consumer growth", "fintech"])).toBe(2);
    expect(countKeywordOverlap(null, ["b2c"])).toBe(0);
  });

  it("counts whole UTC days", () => {
    expect(daysSince("2026-03-07", FIXED_NOW)).toBe(3);
    expect(daysSince("2026-03-10T23:00:00Z", FIXED_NOW)).toBe(0);
    expect(daysSince(null, FIXED_NOW)).toBeNull();
  });

  it("scores recency in steps", () => {
    const recency = (postedDate: string | null) =>
      scoreJob(job({ postedDate }), strongPrefs, acme, FIXED_NOW).breakdown.recency;

    expect(recency("2026-03-07")).toBe(3);
    expect(recency("2026-03-03")).toBe(1);
    expect(recency("2026-03-02")).toBe(0);
    expect(recency(null)).toBe(0);
  });
});
