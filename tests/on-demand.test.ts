import { beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import {
  NO_SOURCES_ERROR,
  buildOnDemandSearches,
  resolveTargets,
  runScout,
  type PipelineDeps,
} from "../src/pipeline";
import { PersistenceError } from "../src/errors";
import { countPipelineJobs, getLastScoutRun, listScoutResults } from "../src/db/operations";
import type { TextCompletion } from "../src/ai";
import type { Notifier } from "../src/alerts";
import type { Database } from "../src/db";
import type { AppConfig } from "../src/config";
import {
  FIXED_NOW,
  addUser,
  candidate,
  preferences,
  staticSource,
  taskSet,
  testConfig,
  testDatabase,
} from "./helpers";

const fetched = [
  candidate({ title: "VP Growth", company: "Acme", sourceUrl: "https://a.example/1" }),
  candidate({ title: "Head of Growth", company: "Zeta", sourceUrl: "https://a.example/2" }),
  candidate({ title: "Accountant", company: "Acme", sourceUrl: "https://a.example/3" }),
  candidate({ title: "VP Growth", company: "Acme", sourceUrl: "https://a.example/1" }),
];

const twoScores = JSON.stringify([
  { index: 1, fit_score: 8, b2c_validated: true, reasoning: "Target role" },
  { index: 2, fit_score: 5, b2c_validated: true, reasoning: "Worth a look" },
]);

describe("runScout", () => {
  let config: AppConfig;
  let db: Database;
  let userId: number;
  let complete: Mock<TextCompletion>;
  let notify: Mock<Notifier>;
  let deps: PipelineDeps;

  beforeEach(() => {
    config = testConfig();
    db = testDatabase(config);
    userId = addUser(db, "Test User", { targetRoles: ["VP Growth"], targetLocations: ["Bangalore"] }, "chat-9");
    complete = vi.fn<TextCompletion>().mockResolvedValue({ ok: true, value: twoScores });
    notify = vi.fn<Notifier>().mockResolvedValue(true);
    deps = {
      db,
      config,
      sources: taskSet(staticSource("adzuna", fetched)),
      complete,
      notify,
      now: () => FIXED_NOW,
    };
  });

  it("fetches, filters, scores, persists and notifies", async () => {
    const summary = await runScout(userId, deps);

    expect(summary).toMatchObject({
      sourcesQueried: 1,
      totalFetched: 4,
      afterDedup: 3,
      afterPrefilter: 2,
      aiScored: 2,
      promotedToPipeline: 1,
      savedForReview: 1,
      dismissed: 0,
      errors: [],
    });

    const results = listScoutResults(db, userId);
    expect(results.map((r) => [r.title, r.status, r.fitScore])).toEqual([
      ["VP Growth", "promoted", 8],
      ["Head of Growth", "new", 5],
    ]);
    expect(results[0].pipelineJobId).not.toBeNull();
    expect(countPipelineJobs(db, userId)).toBe(1);

    expect(notify).toHaveBeenCalledTimes(1);
    expect(notify.mock.calls[0][0]).toBe("chat-9");
    expect(String(notify.mock.calls[0][1])).toContain("<b>Promoted to pipeline: 1</b>");
    expect(String(notify.mock.calls[0][1])).toContain("VP Growth @ Acme — Score: 8/10");

    expect(getLastScoutRun(db, "on_demand")?.status).toBe("completed");
  });

  it("skips postings the user has already seen", async () => {
    await runScout(userId, deps);
    const second = await runScout(userId, deps);

    expect(second.afterDedup).toBe(1);
    expect(second.afterPrefilter).toBe(0);
    expect(second.aiScored).toBe(0);
    expect(complete).toHaveBeenCalledTimes(1);
    expect(notify).toHaveBeenCalledTimes(1);
  });

  it("dismisses everything when scoring is unavailable", async () => {
    const summary = await runScout(userId, {
      ...deps,
      complete: async () => ({ ok: false, error: { kind: "unconfigured", message: "AI_API_KEY not set" } }),
    });

    expect(summary.dismissed).toBe(2);
    expect(summary.promotedToPipeline).toBe(0);
    expect(summary.errors).toEqual(["AI batch 1: AI_API_KEY not set"]);
    expect(notify).not.toHaveBeenCalled();
  });

  it("degrades the batch when the scoring function throws", async () => {
    const summary = await runScout(userId, {
      ...deps,
      complete: vi.fn<TextCompletion>().mockRejectedValue(new Error("socket hang up")),
    });

    expect(summary).toMatchObject({
      aiScored: 2,
      promotedToPipeline: 0,
      savedForReview: 0,
      dismissed: 2,
      errors: ["AI batch 1: socket hang up"],
    });
    expect(listScoutResults(db, userId).map((r) => r.aiReasoning)).toEqual([
      "AI scoring failed",
      "AI scoring failed",
    ]);
    expect(getLastScoutRun(db, "on_demand")?.status).toBe("completed");
  });

  it("records a notifier that throws as an undelivered message", async () => {
    notify.mockRejectedValue(new Error("ETIMEDOUT"));

    const summary = await runScout(userId, deps);

    expect(summary.promotedToPipeline).toBe(1);
    expect(summary.errors).toEqual(["Telegram notification failed"]);
    expect(getLastScoutRun(db, "on_demand")?.status).toBe("completed");
  });

  it("returns an empty summary for an unknown user", async () => {
    const summary = await runScout(999, deps);

    expect(summary.errors).toEqual(["User not found"]);
    expect(summary.totalFetched).toBe(0);
    expect(getLastScoutRun(db, "on_demand")).toBeNull();
  });

  it("runs for the configured owner when no user is given", async () => {
    const summary = await runScout(null, {
      ...deps,
      config: { ...config, env: { ...config.env, ownerUserId: userId } },
    });
    expect(summary.promotedToPipeline).toBe(1);
  });

  it("reports when no sources are configured", async () => {
    const summary = await runScout(userId, { ...deps, sources: taskSet() });

    expect(summary.errors).toEqual([NO_SOURCES_ERROR]);
    expect(summary.sourcesQueried).toBe(0);
    expect(complete).not.toHaveBeenCalled();
  });

  it("reports when sources return nothing", async () => {
    const summary = await runScout(userId, { ...deps, sources: taskSet(staticSource("adzuna", [])) });
    expect(summary.errors).toEqual(["No results fetched from any source"]);
  });

  it("rolls back and marks the run failed when saving fails", async () => {
    const breaking = vi.fn<TextCompletion>().mockImplementation(async () => {
      db.exec("DROP TABLE scout_results");
      return { ok: true, value: twoScores };
    });

    await expect(runScout(userId, { ...deps, complete: breaking })).rejects.toBeInstanceOf(PersistenceError);
    expect(countPipelineJobs(db, userId)).toBe(0);
    expect(getLastScoutRun(db, "on_demand")?.status).toBe("failed");
  });
});

describe("on-demand search plan", () => {
  const search = testConfig().search;

  it("falls back to default roles and locations", () => {
    expect(resolveTargets(preferences(1), search)).toEqual({
      roles: search.onDemand.defaultRoles,
      locations: search.onDemand.defaultLocations,
    });
  });

  it("fills the query template for the first roles", () => {
    const searches = buildOnDemandSearches(["A", "B", "C", "D", "E", "F"], search);
    expect(searches).toHaveLength(5);
    expect(searches[0]).toEqual({ query: "A B2C Bangalore", location: "Bangalore" });
  });
});
