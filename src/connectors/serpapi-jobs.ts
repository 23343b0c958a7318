import { logger } from "../logger";
import { fetchWithRetry, parseRecords, sleep } from "./base";
import {
  asText,
  normalizePosting,
  normalizePostedDate,
  parseSalary,
} from "../normalizer";
import type { ConnectorResult, PostingCandidate } from "../types";
import type { SourceDefinition } from "../config";
import type { SearchRequest } from "./index";

interface GoogleJobsResult {
  job_id?: string;
  title?: string;
  company_name?: string;
  location?: string;
  description?: string;
  via?: string;
  share_link?: string;
  detected_extensions?: {
    posted_at?: string;
    salary?: string;
    schedule_type?: string;
  };
  apply_options?: Array<{ title?: string; link?: string }>;
}

interface GoogleJobsResponse {
  jobs_results?: GoogleJobsResult[];
  serpapi_pagination?: { next_page_token?: string };
  error?: string;
}

/**
 * Google Jobs through SerpAPI. Pages are chained by `next_page_token` until
 * `maxResults` postings are collected or a page comes back empty.
 */
export async function fetchSerpApiJobs(
  search: SearchRequest,
  apiKey: string,
  sourceConfig: SourceDefinition,
  signal?: AbortSignal,
): Promise<ConnectorResult> {
  const label = `${search.query} @ ${search.location}`;
  const maxResults = sourceConfig.maxResults ?? 20;
  const startTime = Date.now();
  const jobs: PostingCandidate[] = [];
  let nextPageToken: string | undefined;
  let error: string | undefined;
  let rateLimited = false;
  let pages = 0;

  while (jobs.length < maxResults) {
    const params = new URLSearchParams({
      engine: "google_jobs",
      q: search.query,
      gl: "in",
      hl: "en",
      api_key: apiKey,
    });
    if (search.location) params.set("location", search.location);
    if (nextPageToken) params.set("next_page_token", nextPageToken);

    const result = await fetchWithRetry<GoogleJobsResponse>({
      url: `${sourceConfig.endpointTemplate}?${params.toString()}`,
      timeoutMs: sourceConfig.timeoutMs,
      maxRetries: sourceConfig.rateLimiting?.maxRetries ?? 2,
      backoffStartMs: sourceConfig.rateLimiting?.backoffStartMs ?? 3000,
      signal,
    });
    rateLimited = rateLimited || result.rateLimited;

    if (!result.success || !result.data) {
      error = result.error;
      break;
    }
    if (result.data.error) {
      // SerpAPI answers "no results" with an error string and HTTP 200
      if (pages === 0) error = result.data.error;
      break;
    }

    const page = result.data.jobs_results ?? [];
    pages += 1;
    if (page.length === 0) break;

    for (const parsed of parseRecords(page, parseGoogleJob, `SerpAPI/${label}`)) {
      jobs.push(parsed);
      if (jobs.length >= maxResults) break;
    }

    nextPageToken = result.data.serpapi_pagination?.next_page_token;
    if (!nextPageToken) break;

    const delay = sourceConfig.rateLimiting?.delayBetweenRequestsMs ?? 0;
    if (delay > 0) await sleep(delay);
  }

  logger.debug(
    `SerpAPI/${label}: ${jobs.length} jobs over ${pages} page(s) (${Date.now() - startTime}ms)`,
  );

  return {
    source: "serpapi",
    label,
    jobs,
    success: error === undefined || jobs.length > 0,
    error,
    responseTimeMs: Date.now() - startTime,
    rateLimited,
  };
}

export function parseGoogleJob(item: GoogleJobsResult): PostingCandidate | null {
  const applyLink = asText(item.apply_options?.find((o) => asText(o.link))?.link);
  const url = applyLink ?? asText(item.share_link);
  const title = asText(item.title);
  if (!title || !url) return null;

  return normalizePosting({
    source: "serpapi",
    externalId: asText(item.job_id),
    title,
    company: asText(item.company_name) ?? "Unknown",
    location: asText(item.location),
    description: asText(item.description),
    salary: parseSalary(asText(item.detected_extensions?.salary)),
    sourceUrl: url,
    applyUrl: applyLink,
    postedDate: normalizePostedDate(asText(item.detected_extensions?.posted_at)),
    raw: item,
  });
}
