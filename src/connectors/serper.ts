import { logger } from "../logger";
import { fetchWithRetry, parseRecords } from "./base";
import {
  asText,
  normalizePosting,
  normalizePostedDate,
  parseSalary,
} from "../normalizer";
import type { ConnectorResult, PostingCandidate } from "../types";
import type { SourceDefinition } from "../config";
import type { SearchRequest } from "./index";

interface OrganicResult {
  title?: string;
  link?: string;
  snippet?: string;
  date?: string;
}

interface SerperResponse {
  organic?: OrganicResult[];
}

// Snippets are free text; only read a salary when one is announced.
const SALARY_HINT = /lakh|lpa|₹/i;

const TITLE_SEPARATORS = [" at ", " - ", " | ", " — "];

/** "VP Growth at Acme - LinkedIn" -> { role: "VP Growth", company: "Acme" } */
export function splitRoleAndCompany(text: string): {
  role: string;
  company: string;
} {
  const trimmed = text.trim();
  for (const separator of TITLE_SEPARATORS) {
    const idx = trimmed.indexOf(separator);
    if (idx <= 0) continue;

    const role = trimmed.slice(0, idx).trim();
    const company = trimmed
      .slice(idx + separator.length)
      .split(/ [-|—] /)[0]
      .trim();
    if (role && company) return { role, company };
  }
  return { role: trimmed, company: "Unknown" };
}

/** General web search, used when the Google Jobs source is unavailable. */
export async function fetchSerperJobs(
  search: SearchRequest,
  apiKey: string,
  sourceConfig: SourceDefinition,
  signal?: AbortSignal,
): Promise<ConnectorResult> {
  const label = `${search.query} @ ${search.location}`;

  const result = await fetchWithRetry<SerperResponse>({
    url: sourceConfig.endpointTemplate,
    method: "POST",
    headers: { "X-API-KEY": apiKey },
    body: {
      q: `${search.query} jobs`,
      gl: "in",
      location: search.location,
      num: sourceConfig.resultsPerPage ?? 10,
    },
    timeoutMs: sourceConfig.timeoutMs,
    maxRetries: sourceConfig.rateLimiting?.maxRetries ?? 2,
    backoffStartMs: sourceConfig.rateLimiting?.backoffStartMs ?? 2000,
    signal,
  });

  if (!result.success || !result.data) {
    return {
      source: "serper",
      label,
      jobs: [],
      success: false,
      error: result.error,
      responseTimeMs: result.responseTimeMs,
      rateLimited: result.rateLimited,
    };
  }

  const jobs = parseRecords(
    result.data.organic,
    (item: OrganicResult) => parseOrganicResult(item, search.location),
    `Serper/${label}`,
  );

  logger.debug(
    `Serper/${label}: found ${jobs.length} results (${result.responseTimeMs}ms)`,
  );

  return {
    source: "serper",
    label,
    jobs,
    success: true,
    responseTimeMs: result.responseTimeMs,
    rateLimited: result.rateLimited,
  };
}

export function parseOrganicResult(
  item: OrganicResult,
  location: string,
): PostingCandidate | null {
  const text = asText(item.title);
  const link = asText(item.link);
  if (!text || !link) return null;

  const { role, company } = splitRoleAndCompany(text);
  const snippet = asText(item.snippet);

  return normalizePosting({
    source: "serper",
    externalId: null,
    title: role,
    company,
    location: location || null,
    description: snippet,
    salary: SALARY_HINT.test(snippet ?? "")
      ? parseSalary(snippet)
      : { min: null, max: null, estimated: false },
    sourceUrl: link,
    applyUrl: link,
    postedDate: normalizePostedDate(asText(item.date)),
    raw: item,
  });
}
