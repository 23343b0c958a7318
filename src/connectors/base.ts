import { logger } from "../logger";
import { errorMessage } from "../errors";
import type { RateLimiting } from "../config";
import type { PostingCandidate } from "../types";

export interface FetchWithRetryOptions {
  url: string;
  timeoutMs: number;
  maxRetries: number;
  backoffStartMs: number;
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: unknown;
  signal?: AbortSignal;
}

export interface FetchResult<T> {
  data: T | null;
  success: boolean;
  error?: string;
  rateLimited: boolean;
  responseTimeMs: number;
  statusCode?: number;
}

export const DEFAULT_RATE_LIMITING: RateLimiting = {
  delayBetweenRequestsMs: 500,
  batchSize: 5,
  batchPauseMs: 2000,
  maxRetries: 2,
  backoffStartMs: 2000,
};

/** Strip credentials from query strings before a URL reaches the logs. */
function redact(url: string): string {
  return url.replace(/(app_key|api_key|app_id)=[^&]+/g, "$1=***");
}

export async function fetchWithRetry<T>(
  options: FetchWithRetryOptions,
): Promise<FetchResult<T>> {
  const { url, timeoutMs, maxRetries, backoffStartMs, signal } = options;
  const safeUrl = redact(url);
  let lastError = "";
  let rateLimited = false;
  const startTime = Date.now();

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (signal?.aborted) {
      lastError = "Aborted";
      break;
    }

    let timeout: ReturnType<typeof setTimeout> | undefined;
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      timeout = setTimeout(() => controller.abort(), timeoutMs);

      const headers: Record<string, string> = {
        Accept: "application/json",
        "User-Agent": "JobScout/1.0",
        ...options.headers,
      };
      if (options.body !== undefined) {
        headers["Content-Type"] = "application/json";
      }

      const response = await fetch(url, {
        method: options.method ?? "GET",
        signal: controller.signal,
        headers,
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
      });

      if (response.status === 429) {
        rateLimited = true;
        const retryAfter = response.headers.get("Retry-After");
        const waitMs = retryAfter
          ? parseInt(retryAfter, 10) * 1000
          : backoffStartMs * Math.pow(2, attempt);

        logger.warn(
          `Rate limited (429) on ${safeUrl} — waiting ${waitMs}ms (attempt ${attempt + 1}/${maxRetries + 1})`,
        );

        if (attempt < maxRetries) {
          await sleep(waitMs);
          continue;
        }

        return {
          data: null,
          success: false,
          error: `Rate limited after ${maxRetries + 1} attempts`,
          rateLimited: true,
          responseTimeMs: Date.now() - startTime,
          statusCode: 429,
        };
      }

      if (response.status >= 500) {
        lastError = `Server error: ${response.status} ${response.statusText}`;
        logger.warn(
          `${lastError} on ${safeUrl} (attempt ${attempt + 1}/${maxRetries + 1})`,
        );

        if (attempt < maxRetries) {
          await sleep(backoffStartMs * Math.pow(2, attempt));
          continue;
        }

        return {
          data: null,
          success: false,
          error: lastError,
          rateLimited: false,
          responseTimeMs: Date.now() - startTime,
          statusCode: response.status,
        };
      }

      if (!response.ok) {
        return {
          data: null,
          success: false,
          error: `HTTP ${response.status}: ${response.statusText}`,
          rateLimited: false,
          responseTimeMs: Date.now() - startTime,
          statusCode: response.status,
        };
      }

      // The timeout stays armed until the body is read.
      const data = (await response.json()) as T;

      return {
        data,
        success: true,
        rateLimited: false,
        responseTimeMs: Date.now() - startTime,
        statusCode: response.status,
      };
    } catch (error) {
      const isAbort = error instanceof Error && error.name === "AbortError";
      lastError = isAbort
        ? signal?.aborted
          ? "Aborted"
          : `Timeout after ${timeoutMs}ms`
        : String(error);

      logger.warn(
        `Fetch error on ${safeUrl}: ${lastError} (attempt ${attempt + 1}/${maxRetries + 1})`,
      );

      if (attempt < maxRetries && !signal?.aborted) {
        await sleep(backoffStartMs * Math.pow(2, attempt));
        continue;
      }
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  return {
    data: null,
    success: false,
    error: lastError,
    rateLimited,
    responseTimeMs: Date.now() - startTime,
  };
}

export interface BatchFetchOptions<I, T> {
  items: I[];
  fetchFn: (item: I) => Promise<T>;
  describe?: (item: I) => string;
  rateLimiting: RateLimiting;
  signal?: AbortSignal;
  onProgress?: (completed: number, total: number) => void;
}

export async function batchFetch<I, T>(
  options: BatchFetchOptions<I, T>,
): Promise<T[]> {
  const { items, fetchFn, rateLimiting, signal, onProgress } = options;
  const describe = options.describe ?? ((item: I) => String(item));
  const results: T[] = [];
  let completed = 0;

  for (let i = 0; i < items.length; i += rateLimiting.batchSize) {
    const batch = items.slice(i, i + rateLimiting.batchSize);

    for (let j = 0; j < batch.length; j++) {
      if (signal?.aborted) {
        logger.warn(`Batch aborted after ${completed}/${items.length} items`);
        return results;
      }

      const item = batch[j];
      try {
        const result = await fetchFn(item);
        results.push(result);
      } catch (e) {
        logger.error(`Batch item failed: ${describe(item)} - ${e}`);
      }

      completed += 1;
      onProgress?.(completed, items.length);

      const isLastInBatch = j === batch.length - 1;
      if (!isLastInBatch && rateLimiting.delayBetweenRequestsMs > 0) {
        await sleep(rateLimiting.delayBetweenRequestsMs);
      }
    }

    const nextBatchStart = i + rateLimiting.batchSize;
    if (nextBatchStart < items.length) {
      logger.debug(
        `Batch pause: ${rateLimiting.batchPauseMs}ms before next batch (${nextBatchStart}/${items.length})`,
      );
      await sleep(rateLimiting.batchPauseMs);
    }
  }

  return results;
}

/** Parses records one at a time; a malformed record is dropped on its own. */
export function parseRecords<R>(
  records: R[] | undefined,
  parse: (record: R) => PostingCandidate | null,
  label: string,
): PostingCandidate[] {
  const jobs: PostingCandidate[] = [];
  if (!Array.isArray(records)) return jobs;

  let dropped = 0;
  for (const record of records) {
    try {
      const parsed = parse(record);
      if (parsed) {
        jobs.push(parsed);
      } else {
        dropped += 1;
      }
    } catch (error) {
      dropped += 1;
      logger.debug(`${label}: malformed record - ${errorMessage(error)}`);
    }
  }

  if (dropped > 0) {
    logger.debug(`${label}: dropped ${dropped}/${records.length} records`);
  }
  return jobs;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
