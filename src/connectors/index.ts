/**
 * Source registry — turns the configured sources into independent fetch tasks
 * and runs them with bounded fan-out and a per-source deadline.
 */

import { logger } from "../logger";
import { batchFetch, DEFAULT_RATE_LIMITING } from "./base";
import { fetchAdzunaJobs } from "./adzuna";
import { fetchSerpApiJobs } from "./serpapi-jobs";
import { fetchSerperJobs } from "./serper";
import { fetchGreenhouseJobs } from "./greenhouse";
import { fetchLeverJobs } from "./lever";
import type { ConnectorResult, SourceName } from "../types";
import type { AppConfig, SourceDefinition } from "../config";

export { fetchAdzunaJobs } from "./adzuna";
export { fetchSerpApiJobs } from "./serpapi-jobs";
export { fetchSerperJobs, splitRoleAndCompany } from "./serper";
export { fetchGreenhouseJobs } from "./greenhouse";
export { fetchLeverJobs } from "./lever";

export interface SearchRequest {
  query: string;
  location: string;
}

export interface SourcePlan {
  searches: SearchRequest[];
  includeAts: boolean;
}

export interface SourceTask {
  source: SourceName;
  run: (signal: AbortSignal) => Promise<ConnectorResult[]>;
}

export interface SourceTaskSet {
  tasks: SourceTask[];
  /** Sources skipped for missing credentials */
  notes: string[];
}

export interface RunSourceOptions {
  concurrency: number;
  timeoutMs: number;
}

// Grace period before a task that ignores its abort signal is abandoned
const HARD_STOP_GRACE_MS = 5000;

function searchLabel(search: SearchRequest): string {
  return `${search.query} @ ${search.location}`;
}

function searchTask(
  source: SourceName,
  definition: SourceDefinition,
  searches: SearchRequest[],
  fetchOne: (search: SearchRequest, signal: AbortSignal) => Promise<ConnectorResult>,
): SourceTask {
  return {
    source,
    run: (signal) =>
      batchFetch<SearchRequest, ConnectorResult>({
        items: searches,
        fetchFn: (search) => fetchOne(search, signal),
        describe: searchLabel,
        rateLimiting: definition.rateLimiting ?? DEFAULT_RATE_LIMITING,
        signal,
      }),
  };
}

function boardTask(
  source: SourceName,
  definition: SourceDefinition,
  boards: string[],
  fetchOne: (board: string, signal: AbortSignal) => Promise<ConnectorResult>,
): SourceTask {
  return {
    source,
    run: (signal) =>
      batchFetch<string, ConnectorResult>({
        items: boards,
        fetchFn: (board) => fetchOne(board, signal),
        rateLimiting: definition.rateLimiting ?? DEFAULT_RATE_LIMITING,
        signal,
        onProgress: (completed, total) => {
          if (completed === total) {
            logger.info(`  ${source}: ${total} boards processed`);
          }
        },
      }),
  };
}

export function buildSourceTasks(
  config: AppConfig,
  plan: SourcePlan,
): SourceTaskSet {
  const { env } = config;
  const sources = config.sources.sources;
  const tasks: SourceTask[] = [];
  const notes: string[] = [];

  if (plan.searches.length > 0) {
    if (sources.adzuna?.enabled) {
      if (env.adzunaAppId && env.adzunaAppKey) {
        const credentials = { appId: env.adzunaAppId, appKey: env.adzunaAppKey };
        tasks.push(
          searchTask("adzuna", sources.adzuna, plan.searches, (search, signal) =>
            fetchAdzunaJobs(search, credentials, sources.adzuna, signal),
          ),
        );
      } else {
        notes.push("adzuna: ADZUNA_APP_ID/ADZUNA_APP_KEY not set — skipped");
      }
    }

    const serpApiReady = sources.serpapi?.enabled && env.serpApiKey.length > 0;
    if (serpApiReady) {
      tasks.push(
        searchTask("serpapi", sources.serpapi, plan.searches, (search, signal) =>
          fetchSerpApiJobs(search, env.serpApiKey, sources.serpapi, signal),
        ),
      );
    } else if (sources.serpapi?.enabled) {
      notes.push("serpapi: SERPAPI_KEY not set — skipped");
    }

    // Web search only stands in when Google Jobs is unavailable
    if (!serpApiReady && sources.serper?.enabled) {
      if (env.serperApiKey) {
        tasks.push(
          searchTask("serper", sources.serper, plan.searches, (search, signal) =>
            fetchSerperJobs(search, env.serperApiKey, sources.serper, signal),
          ),
        );
      } else {
        notes.push("serper: SERPER_API_KEY not set — skipped");
      }
    }
  }

  if (plan.includeAts) {
    const { greenhouse, lever, displayNames } = config.companies;

    if (sources.greenhouse?.enabled && greenhouse.length > 0) {
      tasks.push(
        boardTask("greenhouse", sources.greenhouse, greenhouse, (board, signal) =>
          fetchGreenhouseJobs(board, displayNames, sources.greenhouse, signal),
        ),
      );
    }
    if (sources.lever?.enabled && lever.length > 0) {
      tasks.push(
        boardTask("lever", sources.lever, lever, (company, signal) =>
          fetchLeverJobs(company, displayNames, sources.lever, signal),
        ),
      );
    }
  }

  return { tasks, notes };
}

export async function runWithConcurrency<T, R>(
  items: T[],
  concurrency: number,
  processor: (item: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  const executing: Promise<void>[] = [];

  for (const [index, item] of items.entries()) {
    if (executing.length >= concurrency) {
      await Promise.race(executing);
    }

    const promise: Promise<void> = processor(item)
      .then((result) => {
        results[index] = result;
      })
      .finally(() => {
        const position = executing.indexOf(promise);
        if (position > -1) executing.splice(position, 1);
      });

    executing.push(promise);
  }

  await Promise.all(executing);
  return results;
}

function failedResult(source: SourceName, error: string): ConnectorResult {
  return {
    source,
    label: source,
    jobs: [],
    success: false,
    error,
    responseTimeMs: 0,
    rateLimited: false,
  };
}

async function runTaskWithDeadline(
  task: SourceTask,
  timeoutMs: number,
): Promise<ConnectorResult[]> {
  const controller = new AbortController();
  const softStop = setTimeout(() => {
    logger.warn(`${task.source}: exceeded ${timeoutMs}ms — aborting`);
    controller.abort();
  }, timeoutMs);

  let hardStop: ReturnType<typeof setTimeout> | undefined;
  let abandoned = false;
  const deadline = new Promise<ConnectorResult[]>((resolve) => {
    hardStop = setTimeout(() => {
      abandoned = true;
      resolve([failedResult(task.source, `Timed out after ${timeoutMs}ms`)]);
    }, timeoutMs + HARD_STOP_GRACE_MS);
  });

  try {
    const results = await Promise.race([task.run(controller.signal), deadline]);
    if (controller.signal.aborted && !abandoned) {
      results.push(failedResult(task.source, `Timed out after ${timeoutMs}ms (partial results kept)`));
    }
    return results;
  } catch (error) {
    logger.error(`${task.source}: source failed: ${error}`);
    return [failedResult(task.source, String(error))];
  } finally {
    clearTimeout(softStop);
    clearTimeout(hardStop);
  }
}

/** Results come back grouped in task order, whatever order the tasks finish in. */
export async function runSourceTasks(
  tasks: SourceTask[],
  options: RunSourceOptions,
): Promise<ConnectorResult[]> {
  const grouped = await runWithConcurrency(
    tasks,
    Math.max(1, options.concurrency),
    (task) => runTaskWithDeadline(task, options.timeoutMs),
  );

  const results = grouped.flat();
  const totalJobs = results.reduce((sum, r) => sum + r.jobs.length, 0);
  const failed = results.filter((r) => !r.success).length;
  logger.info(
    `Sources complete: ${tasks.length} sources, ${results.length} requests (${failed} failed), ${totalJobs} postings`,
  );
  return results;
}
