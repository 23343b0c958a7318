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

interface LeverCategories {
  commitment?: string;
  department?: string;
  location?: string;
  team?: string;
  allLocations?: string[];
}

interface LeverJob {
  id?: string;
  text?: string;
  hostedUrl?: string;
  applyUrl?: string;
  createdAt?: number; // Unix timestamp in ms
  categories?: LeverCategories;
  descriptionPlain?: string;
  description?: string;
  workplaceType?: string;
}

export async function fetchLeverJobs(
  company: string,
  displayNames: Record<string, string>,
  sourceConfig: SourceDefinition,
  signal?: AbortSignal,
): Promise<ConnectorResult> {
  const url =
    sourceConfig.endpointTemplate.replace("{company}", company) + "?mode=json";

  const result: FetchResult<unknown> = await fetchWithRetry({
    url,
    timeoutMs: sourceConfig.timeoutMs,
    maxRetries: sourceConfig.rateLimiting?.maxRetries ?? 2,
    backoffStartMs: sourceConfig.rateLimiting?.backoffStartMs ?? 2000,
    signal,
  });

  // Unknown sites answer 200 with {ok: false} instead of an array
  if (!result.success || !Array.isArray(result.data)) {
    return {
      source: "lever",
      label: company,
      jobs: [],
      success: false,
      error: result.error ?? "Unexpected Lever payload",
      responseTimeMs: result.responseTimeMs,
      rateLimited: result.rateLimited,
    };
  }

  const postings: LeverJob[] = result.data;
  const displayName = displayNames[company] ?? titleCaseSlug(company);
  const jobs = parseRecords(
    postings,
    (job: LeverJob) => parseLeverJob(job, displayName),
    `Lever/${company}`,
  );

  logger.debug(
    `Lever/${company}: found ${jobs.length} jobs (${result.responseTimeMs}ms)`,
  );

  return {
    source: "lever",
    label: company,
    jobs,
    success: true,
    responseTimeMs: result.responseTimeMs,
    rateLimited: result.rateLimited,
  };
}

export function parseLeverJob(
  job: LeverJob,
  company: string,
): PostingCandidate | null {
  const title = asText(job.text);
  const hostedUrl = asText(job.hostedUrl);
  if (!title || !hostedUrl) return null;

  let location = asText(job.categories?.location);
  if (!location && job.workplaceType === "remote") {
    location = "Remote";
  }

  return normalizePosting({
    source: "lever",
    externalId: asText(job.id),
    title,
    company,
    location,
    description:
      asText(job.descriptionPlain)?.trim() || stripHtml(asText(job.description)),
    salary: { min: null, max: null, estimated: false },
    sourceUrl: hostedUrl,
    applyUrl: asText(job.applyUrl) ?? hostedUrl,
    postedDate: normalizePostedDate(
      typeof job.createdAt === "number" ? job.createdAt : null,
    ),
    raw: job,
  });
}
