import { randomBytes } from "crypto";
import { logger } from "../logger";
import { errorMessage } from "../errors";
import { buildSourceTasks, runSourceTasks, type SourcePlan, type SourceTaskSet } from "../connectors";
import type { AppConfig } from "../config";
import type { Database } from "../db";
import type { TextCompletion } from "../ai";
import type { Notifier } from "../alerts";
import type { ConnectorResult, PostingCandidate } from "../types";

export interface PipelineDeps {
  db: Database;
  config: AppConfig;
  /** Defaults to the configured connectors */
  sources?: (plan: SourcePlan) => SourceTaskSet;
  /** Defaults to the configured chat-completion model */
  complete?: TextCompletion;
  notify?: Notifier;
  now?: () => Date;
}

export const NO_SOURCES_ERROR = "No sources configured — nothing fetched";
export const NOTIFY_FAILED_ERROR = "Telegram notification failed";

/** Sends a notification; a rejected or thrown send counts as undelivered. */
export async function deliver(
  notify: Notifier,
  recipientId: string,
  text: string,
): Promise<boolean> {
  try {
    return await notify(recipientId, text);
  } catch (error) {
    logger.warn(`Notification to ${recipientId} failed: ${errorMessage(error)}`);
    return false;
  }
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `scout_YYYYMMDD_HHMMSS_<6 hex>` in UTC */
export function generateRunId(now: Date): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `scout_${date}_${time}_${randomBytes(3).toString("hex")}`;
}

export interface FetchedPostings {
  sourcesQueried: number;
  candidates: PostingCandidate[];
  errors: string[];
}

export function collectPostings(results: ConnectorResult[]): {
  candidates: PostingCandidate[];
  errors: string[];
} {
  const candidates: PostingCandidate[] = [];
  const errors: string[] = [];

  for (const result of results) {
    candidates.push(...result.jobs);
    if (!result.success) {
      errors.push(`${result.source}/${result.label}: ${result.error ?? "unknown error"}`);
    }
  }
  return { candidates, errors };
}

/** Build, run and flatten the source tasks for a plan. Never throws. */
export async function fetchPostings(
  deps: PipelineDeps,
  plan: SourcePlan,
  tag: string,
): Promise<FetchedPostings> {
  const { config } = deps;
  const taskSet = deps.sources ? deps.sources(plan) : buildSourceTasks(config, plan);
  const errors = [...taskSet.notes];

  if (taskSet.tasks.length === 0) {
    logger.warn(`${tag} ${NO_SOURCES_ERROR}`);
    return { sourcesQueried: 0, candidates: [], errors: [...errors, NO_SOURCES_ERROR] };
  }

  const results = await runSourceTasks(taskSet.tasks, {
    concurrency: config.sources.concurrency,
    timeoutMs: config.env.adapterTimeoutMs,
  });
  const collected = collectPostings(results);

  return {
    sourcesQueried: taskSet.tasks.length,
    candidates: collected.candidates,
    errors: [...errors, ...collected.errors],
  };
}
