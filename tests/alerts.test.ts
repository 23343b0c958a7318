import { afterEach, describe, expect, it, vi } from "vitest";
import {
  createTelegramNotifier,
  escapeHtml,
  formatPoolSummary,
  formatScoutSummary,
  splitMessage,
} from "../src/alerts";
import { getDatabaseStats } from "../src/db";
import type { ScoutRunSummary } from "../src/types";
import { jsonResponse, testConfig, testDatabase } from "./helpers";

function scoutSummary(overrides: Partial<ScoutRunSummary> = {}): ScoutRunSummary {
  return {
    runId: "scout_20260310_060000_abcdef",
    sourcesQueried: 2,
    totalFetched: 10,
    afterDedup: 8,
    afterPrefilter: 4,
    aiScored: 4,
    promotedToPipeline: 0,
    savedForReview: 0,
    dismissed: 0,
    errors: [],
    ...overrides,
  };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("formatScoutSummary", () => {
  it("lists promoted jobs with escaped text", () => {
    const message = formatScoutSummary(scoutSummary({ promotedToPipeline: 1, savedForReview: 2, dismissed: 1 }), [
      { title: "Head of R&D", company: "<Acme>", fitScore: 9 },
    ]);

    expect(message?.split("\n")).toEqual([
      "<b>Job Scout Run Complete</b> (scout_20260310_060000_abcdef)",
      "",
      "Fetched: 10 | Deduped: 8 | Filtered: 4 | Scored: 4",
      "<b>Promoted to pipeline: 1</b>",
      "For review: 2 | Dismissed: 1",
      "",
      "  Head of R&amp;D @ &lt;Acme&gt; — Score: 9/10",
    ]);
  });

  it("sends a short note when only review items came back", () => {
    expect(formatScoutSummary(scoutSummary({ savedForReview: 2, dismissed: 1 }), [])).toBe(
      "<b>Job Scout</b> (scout_20260310_060000_abcdef): No strong matches this run. 2 jobs saved for review, 1 dismissed.",
    );
  });

  it("stays quiet when nothing is worth reporting", () => {
    expect(formatScoutSummary(scoutSummary({ dismissed: 4 }), [])).toBeNull();
  });
});

describe("formatPoolSummary", () => {
  it("includes the first errors", () => {
    const message = formatPoolSummary({
      runId: "scout_x",
      sourcesQueried: 3,
      totalFetched: 40,
      inserted: 12,
      refreshed: 20,
      markedInactive: 2,
      usersScored: 5,
      matchesCreated: 9,
      errors: ["adzuna/VP Growth @ Bangalore: HTTP 500"],
    });

    expect(message).toContain("New: 12 | Refreshed: 20 | Marked inactive: 2");
    expect(message).toContain("Users scored: 5 | <b>New matches: 9</b>");
    expect(message).toContain("  • adzuna/VP Growth @ Bangalore: HTTP 500");
  });
});

describe("splitMessage", () => {
  it("splits on line boundaries", () => {
    expect(splitMessage("a\nb\nc", 3)).toEqual(["a\nb", "c"]);
  });

  it("hard-splits lines longer than the limit", () => {
    expect(splitMessage("abcdefg", 3)).toEqual(["abc", "def", "g"]);
  });
});

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml('<a href="x">R&D</a>')).toBe("&lt;a href=&quot;x&quot;&gt;R&amp;D&lt;/a&gt;");
  });
});

describe("createTelegramNotifier", () => {
  it("logs instead of sending in dry-run mode", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
    const db = testDatabase(testConfig());

    const notify = createTelegramNotifier({ botToken: "test-secret", dryRun: true, db });

    expect(await notify("chat-1", "hello")).toBe(true);
    expect(fetchMock).not.toHaveBeenCalled();
    expect(getDatabaseStats(db).notifications).toBe(1);
  });

  it("reports failure without a bot token", async () => {
    const notify = createTelegramNotifier({ botToken: "", dryRun: false });
    expect(await notify("chat-1", "hello")).toBe(false);
  });

  it("posts HTML messages to the bot API", async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ ok: true, result: { message_id: 1 } }));
    vi.stubGlobal("fetch", fetchMock);

    const notify = createTelegramNotifier({ botToken: "test-secret", dryRun: false });

    expect(await notify("chat-1", "<b>hi</b>")).toBe(true);
    expect(fetchMock.mock.calls[0][0]).toBe("https://api.telegram.org/bottest-secret/sendMessage");
    expect(JSON.parse(String(fetchMock.mock.calls[0][1].body))).toEqual({
      chat_id: "chat-1",
      text: "<b>hi</b>",
      parse_mode: "HTML",
      disable_web_page_preview: true,
    });
  });

  it("returns false when the API rejects the message", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(jsonResponse({ ok: false, description: "chat not found" }, 400, "Bad Request")),
    );
    const db = testDatabase(testConfig());

    const notify = createTelegramNotifier({ botToken: "test-secret", dryRun: false, db });

    expect(await notify("chat-1", "hello")).toBe(false);
    const row = db
      .prepare<[], { status: string; error: string | null }>("SELECT status, error FROM notifications")
      .get();
    expect(row).toEqual({ status: "failed", error: "chat not found" });
  });
});
