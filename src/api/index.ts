import { Hono, type Context } from "hono";
import { logger } from "../logger";
import { PersistenceError, errorMessage } from "../errors";
import { getDatabaseStats, quickHealthCheck } from "../db";
import {
  getLastScoutRun,
  getScoutResult,
  getScoutedJob,
  getUser,
  getUserScoutedJob,
  getUserScoutStats,
  insertPipelineJob,
  linkUserScoutedJobToPipeline,
  listScoutResults,
  listUserMatches,
  setScoutResultStatus,
  setUserScoutedJobStatus,
} from "../db/operations";
import {
  dismissMatch,
  getOrCreatePreferences,
  parsePreferencesPatch,
  syncPreferencesFromProfile,
  updatePreferences,
} from "../preferences";
import { runScout, runSharedPool, type PipelineDeps } from "../pipeline";
import type { ScoutResultStatus, UserScoutedJobStatus } from "../types";

const MATCH_STATUSES: readonly UserScoutedJobStatus[] = ["new", "viewed", "saved", "dismissed"];
const RESULT_STATUSES: readonly ScoutResultStatus[] = ["new", "reviewed", "promoted", "dismissed"];

function parseId(value: string | undefined): number | null {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : null;
}

function parseIntOr(value: string | undefined, fallback: number, max?: number): number {
  const parsed = Number.parseInt(value ?? "", 10);
  if (Number.isNaN(parsed) || parsed < 0) return fallback;
  return max !== undefined ? Math.min(parsed, max) : parsed;
}

async function readBody(c: Context): Promise<unknown> {
  try {
    const body: unknown = await c.req.json();
    return body;
  } catch {
    return {};
  }
}

function failure(c: Context, error: unknown) {
  logger.error(`API: ${c.req.method} ${c.req.path} failed:`, error);
  const kind = error instanceof PersistenceError ? "persistence" : "internal";
  return c.json({ error: errorMessage(error), kind }, 500);
}

export function createApp(deps: PipelineDeps): Hono {
  const { db, config } = deps;
  const app = new Hono();

  app.get("/health", (c) => {
    const dbOk = quickHealthCheck(db);
    return c.json({
      status: dbOk ? "healthy" : "degraded",
      timestamp: new Date().toISOString(),
      dryRun: config.env.dryRun,
      database: { ok: dbOk },
    });
  });

  app.get("/status", (c) =>
    c.json({
      timestamp: new Date().toISOString(),
      environment: config.env.nodeEnv,
      enabledSources: Object.entries(config.sources.sources)
        .filter(([, s]) => s.enabled)
        .map(([name]) => name),
      lastRuns: {
        onDemand: getLastScoutRun(db, "on_demand"),
        sharedPool: getLastScoutRun(db, "shared_pool"),
      },
      database: getDatabaseStats(db),
    }),
  );

  // Triggers

  app.post("/api/scout/run", async (c) => {
    const body = await readBody(c);
    const requested = typeof body === "object" && body !== null && "userId" in body ? body.userId : undefined;
    const userId = typeof requested === "number" ? requested : null;
    try {
      return c.json(await runScout(userId, deps));
    } catch (error) {
      return failure(c, error);
    }
  });

  app.post("/api/pool/run", async (c) => {
    try {
      return c.json(await runSharedPool(deps));
    } catch (error) {
      return failure(c, error);
    }
  });

  // Everything below is scoped to one user
  const USER = "/api/users/:userId";

  app.use(`${USER}/*`, async (c, next) => {
    const userId = parseId(c.req.param("userId"));
    if (userId === null || !getUser(db, userId)) {
      return c.json({ error: "User not found" }, 404);
    }
    await next();
  });

  const userIdOf = (c: Context): number => parseId(c.req.param("userId")) ?? 0;

  // Preferences

  app.get(`${USER}/preferences`, (c) => c.json(getOrCreatePreferences(db, userIdOf(c))));

  app.put(`${USER}/preferences`, async (c) => {
    const parsed = parsePreferencesPatch(await readBody(c));
    if (!parsed.ok) return c.json({ error: parsed.error }, 400);
    return c.json(updatePreferences(db, userIdOf(c), parsed.patch));
  });

  app.post(`${USER}/preferences/sync`, (c) => {
    const userId = userIdOf(c);
    getOrCreatePreferences(db, userId);
    return c.json(syncPreferencesFromProfile(db, userId));
  });

  // Pool matches

  app.get(`${USER}/matches`, (c) => {
    const status = MATCH_STATUSES.find((s) => s === c.req.query("status"));
    const limit = parseIntOr(c.req.query("limit"), 50, 200);
    const offset = parseIntOr(c.req.query("offset"), 0);
    const matches = listUserMatches(db, userIdOf(c), {
      status,
      minScore: parseIntOr(c.req.query("minScore"), 0, 100),
      limit,
      offset,
    });
    return c.json({ count: matches.length, offset, limit, matches });
  });

  const findMatch = (c: Context) => {
    const id = parseId(c.req.param("id"));
    const match = id !== null ? getUserScoutedJob(db, id) : null;
    return match && match.userId === userIdOf(c) ? match : null;
  };

  app.post(`${USER}/matches/:id/view`, (c) => {
    const match = findMatch(c);
    if (!match) return c.json({ error: "Match not found" }, 404);
    if (match.status === "new") setUserScoutedJobStatus(db, match.id, "viewed");
    return c.json({ success: true, action: "viewed", matchId: match.id });
  });

  app.post(`${USER}/matches/:id/save`, (c) => {
    const match = findMatch(c);
    if (!match) return c.json({ error: "Match not found" }, 404);
    setUserScoutedJobStatus(db, match.id, "saved");
    return c.json({ success: true, action: "saved", matchId: match.id });
  });

  app.post(`${USER}/matches/:id/dismiss`, async (c) => {
    const match = findMatch(c);
    if (!match) return c.json({ error: "Match not found" }, 404);

    const body = await readBody(c);
    const reason = typeof body === "object" && body !== null && "reason" in body ? body.reason : null;
    try {
      const outcome = dismissMatch(db, userIdOf(c), match.id, typeof reason === "string" ? reason : null);
      return c.json({ success: true, action: "dismissed", matchId: match.id, preferences: outcome?.preferences ?? null });
    } catch (error) {
      return failure(c, error);
    }
  });

  app.post(`${USER}/matches/:id/pipeline`, (c) => {
    const match = findMatch(c);
    if (!match) return c.json({ error: "Match not found" }, 404);
    if (match.pipelineJobId !== null) {
      return c.json({ success: true, action: "pipeline", pipelineJobId: match.pipelineJobId });
    }
    const job = getScoutedJob(db, match.scoutedJobId);
    if (!job) return c.json({ error: "Job not found" }, 404);

    const pipelineJobId = db.transaction(() => {
      const id = insertPipelineJob(db, {
        userId: match.userId,
        title: job.title,
        company: job.company,
        location: job.location,
        url: job.applyUrl ?? job.sourceUrl,
        source: job.source,
        salaryMin: job.salaryMin,
        salaryMax: job.salaryMax,
        notes: `Added from Job Scout match (relevance ${match.relevanceScore}/100).`,
      });
      linkUserScoutedJobToPipeline(db, match.id, id);
      return id;
    })();
    return c.json({ success: true, action: "pipeline", pipelineJobId });
  });

  // On-demand results

  app.get(`${USER}/results`, (c) => {
    const status = RESULT_STATUSES.find((s) => s === c.req.query("status"));
    const results = listScoutResults(db, userIdOf(c), {
      status,
      limit: parseIntOr(c.req.query("limit"), 50, 200),
    });
    return c.json({ count: results.length, results });
  });

  const findResult = (c: Context) => {
    const id = parseId(c.req.param("id"));
    const result = id !== null ? getScoutResult(db, id) : null;
    return result && result.userId === userIdOf(c) ? result : null;
  };

  app.post(`${USER}/results/:id/promote`, (c) => {
    const result = findResult(c);
    if (!result) return c.json({ error: "Result not found" }, 404);
    if (result.pipelineJobId !== null) {
      return c.json({ success: true, action: "promoted", pipelineJobId: result.pipelineJobId });
    }

    const pipelineJobId = db.transaction(() => {
      const id = insertPipelineJob(db, {
        userId: result.userId,
        title: result.title,
        company: result.company,
        location: result.location,
        url: result.sourceUrl,
        source: result.source,
        salaryMin: result.salaryMin,
        salaryMax: result.salaryMax,
        notes: `Promoted from Job Scout run ${result.scoutRunId}. Fit score: ${result.fitScore}/10.`,
      });
      setScoutResultStatus(db, result.id, "promoted", id);
      return id;
    })();
    return c.json({ success: true, action: "promoted", pipelineJobId });
  });

  app.post(`${USER}/results/:id/dismiss`, (c) => {
    const result = findResult(c);
    if (!result) return c.json({ error: "Result not found" }, 404);
    setScoutResultStatus(db, result.id, "dismissed");
    return c.json({ success: true, action: "dismissed", resultId: result.id });
  });

  app.get(`${USER}/stats`, (c) => c.json(getUserScoutStats(db, userIdOf(c))));

  return app;
}
