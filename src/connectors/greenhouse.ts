import { logger } from "../logger";
import { fetchWithRetry, parseRecords, type FetchResult } from "./base";
import {
  asText,
  normalizePosting,
  normalizePostedDate,
  stripHtml,
  titleCaseSlug,
} from "../normalizer";
import type { ConnectorResult, PostingCandidate } from "../types";
import type { SourceDefinition } from "../config";

interface GreenhouseLocation {
  name?: string;
}

interface GreenhouseJob {
  id?: number;
  title?: string;
  updated_at?: string;
  first_published?: string;
  absolute_url?: string;
  location?: GreenhouseLocation;
  content?: string;
}

interface GreenhouseResponse {
  jobs?: GreenhouseJob[];
}

export async function fetchGreenhouseJobs(
  board: string,
  displayNames: Record<string, string>,
  sourceConfig: SourceDefinition,
  signal?: AbortSignal,
): Promise<ConnectorResult> {
  const url =
    sourceConfig.endpointTemplate.replace("{company}", board) + "?content=true";

  const result: FetchResult<GreenhouseResponse> = await fetchWithRetry({
    url,
    timeoutMs: sourceConfig.timeoutMs,
    maxRetries: sourceConfig.rateLimiting?.maxRetries ?? 2,
    backoffStartMs: sourceConfig.rateLimiting?.backoffStartMs ?? 2000,
    signal,
  });

  if (!result.success || !result.data) {
    return {
      source: "greenhouse",
      label: board,
      jobs: [],
      success: false,
      error: result.error,
      responseTimeMs: result.responseTimeMs,
      rateLimited: result.rateLimited,
    };
  }

  const company = displayNames[board] ?? titleCaseSlug(board);
  const jobs = parseRecords(
    result.data.jobs,
    (job: GreenhouseJob) => parseGreenhouseJob(job, company),
    `Greenhouse/${board}`,
  );

  logger.debug(
    `Greenhouse/${board}: found ${jobs.length} jobs (${result.responseTimeMs}ms)`,
  );

  return {
    source: "greenhouse",
    label: board,
    jobs,
    success: true,
    responseTimeMs: result.responseTimeMs,
    rateLimited: result.rateLimited,
  };
}

export function parseGreenhouseJob(
  job: GreenhouseJob,
  company: string,
): PostingCandidate | null {
  const title = asText(job.title);
  const url = asText(job.absolute_url);
  if (!title || !url) return null;

  return normalizePosting({
    source: "greenhouse",
    externalId: job.id !== undefined ? String(job.id) : null,
    title,
    company,
    location: asText(job.location?.name),
    description: stripHtml(asText(job.content)),
    salary: { min: null, max: null, estimated: false },
    sourceUrl: url,
    applyUrl: url,
    postedDate: normalizePostedDate(
      asText(job.first_published) ?? asText(job.updated_at),
    ),
    raw: job,
  });
}
