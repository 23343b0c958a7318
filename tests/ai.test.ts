import { afterEach, describe, expect, it, vi } from "vitest";
import {
  SCORING_FAILED_REASON,
  categorize,
  createChatCompletion,
  createScoringModel,
  scoreCandidates,
  type TextCompletion,
} from "../src/ai";
import { buildBatchPrompt, formatSalary, parseBatchScores } from "../src/ai/prompt";
import type { FilteredCandidate } from "../src/types";
import { candidate, jsonResponse, testConfig } from "./helpers";

function filtered(count: number): FilteredCandidate[] {
  return Array.from({ length: count }, (_, i) => ({
    ...candidate({ title: `VP Growth ${i + 1}`, sourceUrl: `https://a.example/${i + 1}` }),
    b2cHint: false,
  }));
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("scoreCandidates", () => {
  it("degrades a whole batch when the response cannot be parsed", async () => {
    const complete: TextCompletion = async () => ({ ok: true, value: "Sorry, I cannot rate these." });

    const run = await scoreCandidates(filtered(5), "profile", complete);

    expect(run.scored).toHaveLength(5);
    for (const scored of run.scored) {
      expect(scored.fitScore).toBe(0);
      expect(scored.b2cValidated).toBe(false);
      expect(scored.aiReasoning).toBe(SCORING_FAILED_REASON);
    }
    expect(run.failedBatches).toBe(1);
    expect(run.failures).toEqual(["AI batch 1: Response is not a JSON array"]);
  });

  it("scores batches independently", async () => {
    const complete = vi
      .fn<TextCompletion>()
      .mockResolvedValueOnce({
        ok: true,
        value: JSON.stringify([
          { index: 1, fit_score: 8, b2c_validated: true, reasoning: "Strong fit" },
          { index: 3, fit_score: 5, b2c_validated: false, reasoning: "Maybe" },
        ]),
      })
      .mockResolvedValueOnce({ ok: false, error: { kind: "transport", message: "timeout" } });

    const run = await scoreCandidates(filtered(7), "profile", complete);

    expect(complete).toHaveBeenCalledTimes(2);
    expect(run.scored.map((s) => s.fitScore)).toEqual([8, 0, 5, 0, 0, 0, 0]);
    expect(run.scored[0].aiReasoning).toBe("Strong fit");
    expect(run.scored[1].aiReasoning).toBe("");
    expect(run.scored[5].aiReasoning).toBe(SCORING_FAILED_REASON);
    expect(run.failures).toEqual(["AI batch 2: timeout"]);
  });

  it("treats a thrown scoring call as a transport failure", async () => {
    const complete = vi.fn<TextCompletion>().mockRejectedValue(new Error("socket hang up"));

    const run = await scoreCandidates(filtered(2), "profile", complete);

    expect(run.scored.map((s) => [s.fitScore, s.aiReasoning])).toEqual([
      [0, SCORING_FAILED_REASON],
      [0, SCORING_FAILED_REASON],
    ]);
    expect(run.failedBatches).toBe(1);
    expect(run.failures).toEqual(["AI batch 1: socket hang up"]);
  });

  it("makes no call for an empty batch", async () => {
    const complete = vi.fn<TextCompletion>();
    const run = await scoreCandidates([], "profile", complete);

    expect(complete).not.toHaveBeenCalled();
    expect(run).toEqual({ scored: [], failedBatches: 0, failures: [] });
  });
});

describe("parseBatchScores", () => {
  it("reads fenced output after a reasoning block", () => {
    const raw = '<think>hmm</think>\n```json\n[{"index": "2", "fit_score": "7", "b2c_validated": "true"}]\n```';
    expect(parseBatchScores(raw)).toEqual({
      ok: true,
      value: [{ index: 2, fitScore: 7, b2cValidated: true, reasoning: "" }],
    });
  });

  it("clamps scores and skips malformed items", () => {
    const raw = 'Here you go: [{"index": 1, "fit_score": 12}, {"fit_score": 3}, "junk"]';
    expect(parseBatchScores(raw)).toEqual({
      ok: true,
      value: [{ index: 1, fitScore: 10, b2cValidated: false, reasoning: "" }],
    });
  });
});

describe("categorize", () => {
  it("buckets fit scores", () => {
    expect(categorize(7)).toBe("promoted");
    expect(categorize(6.9)).toBe("new");
    expect(categorize(5)).toBe("new");
    expect(categorize(4.9)).toBe("dismissed");
  });
});

describe("prompt", () => {
  it("formats salaries in lakhs", () => {
    expect(formatSalary(4_000_000, 6_000_000)).toBe("₹40L–₹60L");
    expect(formatSalary(null, 5_000_000)).toBe("up to ₹50L");
    expect(formatSalary(null, null)).toBe("Not disclosed");
  });

  it("numbers jobs from one", () => {
    const prompt = buildBatchPrompt("Target roles: VP Growth", filtered(2));
    expect(prompt).toContain("Job 1:\nTitle: VP Growth 1\nCompany: Acme\nLocation: Bangalore");
    expect(prompt).toContain("Job 2:\nTitle: VP Growth 2");
  });
});

describe("createScoringModel", () => {
  it("fails every call when no key is configured", async () => {
    const complete = createScoringModel(testConfig({ aiApiKey: "" }));
    expect(await complete({ system: "s", user: "u" })).toEqual({
      ok: false,
      error: { kind: "unconfigured", message: "AI_API_KEY not set" },
    });
  });
});

describe("createChatCompletion", () => {
  const provider = {
    name: "test-provider",
    endpoint: "https://llm.example/v1/chat/completions",
    model: "test-model",
    apiKey: "test-secret",
  };

  it("retries server errors and returns the message content", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response("overloaded", { status: 503 }))
      .mockResolvedValueOnce(jsonResponse({ choices: [{ message: { content: "[]" } }] }));
    vi.stubGlobal("fetch", fetchMock);

    const complete = createChatCompletion(provider, { maxAttempts: 2, backoffStartMs: 0 });

    expect(await complete({ system: "s", user: "u" })).toEqual({ ok: true, value: "[]" });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("does not retry client errors", async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response("bad key", { status: 401 }));
    vi.stubGlobal("fetch", fetchMock);

    const complete = createChatCompletion(provider, { maxAttempts: 3, backoffStartMs: 0 });

    expect(await complete({ system: "s", user: "u" })).toEqual({
      ok: false,
      error: { kind: "transport", message: "test-provider returned 401: bad key" },
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
