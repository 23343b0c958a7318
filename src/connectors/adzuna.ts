import { logger } from "../logger";
import { fetchWithRetry, parseRecords, type FetchResult } from "./base";
import { asText, normalizePosting, normalizePostedDate, stripHtml } from "../normalizer";
import type { ConnectorResult, PostingCandidate } from "../types";
import type { SourceDefinition } from "../config";
import type { SearchRequest } from "./index";

interface AdzunaJob {
  id?: string | number;
  title?: string;
  redirect_url?: string;
  company?: { display_name?: string };
  location?: { display_name?: string };
  description?: string;
  salary_min?: number;
  salary_max?: number;
  salary_is_predicted?: string | number;
  created?: string;
  category?: { label?: string };
}

interface AdzunaResponse {
  results?: AdzunaJob[];
  count?: number;
}

export interface AdzunaCredentials {
  appId: string;
  appKey: string;
}

export async function fetchAdzunaJobs(
  search: SearchRequest,
  credentials: AdzunaCredentials,
  sourceConfig: SourceDefinition,
  signal?: AbortSignal,
): Promise<ConnectorResult> {
  const params = new URLSearchParams({
    app_id: credentials.appId,
    app_key: credentials.appKey,
    results_per_page: String(sourceConfig.resultsPerPage ?? 10),
    what: search.query,
  });
  if (search.location) {
    params.set("where", search.location);
  }

  const url = `${sourceConfig.endpointTemplate.replace("{page}", "1")}?${params.toString()}`;
  const label = `${search.query} @ ${search.location}`;

  const result: FetchResult<AdzunaResponse> = await fetchWithRetry({
    url,
    timeoutMs: sourceConfig.timeoutMs,
    maxRetries: sourceConfig.rateLimiting?.maxRetries ?? 2,
    backoffStartMs: sourceConfig.rateLimiting?.backoffStartMs ?? 2000,
    signal,
  });

  if (!result.success || !result.data) {
    return {
      source: "adzuna",
      label,
      jobs: [],
      success: false,
      error: result.error,
      responseTimeMs: result.responseTimeMs,
      rateLimited: result.rateLimited,
    };
  }

  const jobs = parseRecords(result.data.results, parseAdzunaJob, `Adzuna/${label}`);

  logger.debug(
    `Adzuna/${label}: found ${jobs.length} jobs (${result.responseTimeMs}ms)`,
  );

  return {
    source: "adzuna",
    label,
    jobs,
    success: true,
    responseTimeMs: result.responseTimeMs,
    rateLimited: result.rateLimited,
  };
}

export function parseAdzunaJob(job: AdzunaJob): PostingCandidate | null {
  const title = asText(job.title);
  const url = asText(job.redirect_url);
  if (!title || !url) return null;

  const predicted =
    job.salary_is_predicted === 1 || job.salary_is_predicted === "1";

  return normalizePosting({
    source: "adzuna",
    externalId: job.id !== undefined ? String(job.id) : null,
    title,
    company: asText(job.company?.display_name) ?? "Unknown",
    location: asText(job.location?.display_name),
    description: stripHtml(asText(job.description)),
    salary: {
      min: typeof job.salary_min === "number" ? Math.round(job.salary_min) : null,
      max: typeof job.salary_max === "number" ? Math.round(job.salary_max) : null,
      estimated: predicted,
    },
    sourceUrl: url,
    applyUrl: url,
    postedDate: normalizePostedDate(asText(job.created)),
    raw: job,
  });
}
