import { logger } from "../logger";
import { errorMessage } from "../errors";
import { sleep } from "../connectors/base";
import type { AppConfig } from "../config";
import type { FilteredCandidate, ScoutResultStatus } from "../types";
import type {
  AIProviderConfig,
  BatchScore,
  ChatCompletionResponse,
  Result,
  ScoredCandidate,
  ScoringFailure,
  TextCompletion,
} from "./types";
import { SYSTEM_PROMPT, buildBatchPrompt, parseBatchScores } from "./prompt";

export * from "./types";
export { buildProfileSummary } from "./prompt";

export const BATCH_SIZE = 5;
export const SCORING_FAILED_REASON = "AI scoring failed";

const MAX_ATTEMPTS = 3;
const REQUEST_TIMEOUT_MS = 60_000;

export interface ChatCompletionOptions {
  maxAttempts?: number;
  backoffStartMs?: number;
  timeoutMs?: number;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * OpenAI-compatible chat completion. Rate limits, server errors and network
 * failures are retried with exponential backoff; anything else fails fast.
 */
export function createChatCompletion(
  provider: AIProviderConfig,
  options: ChatCompletionOptions = {},
): TextCompletion {
  const maxAttempts = options.maxAttempts ?? MAX_ATTEMPTS;
  const backoffStartMs = options.backoffStartMs ?? 2000;
  const timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;

  return async (prompt) => {
    let lastError = "";

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
      let retryable = false;

      try {
        logger.debug(
          `AI: calling ${provider.name} (${provider.model})${attempt > 1 ? ` attempt ${attempt}` : ""}...`,
        );
        const response = await fetch(provider.endpoint, {
          method: "POST",
          headers: {
            Authorization: `Bearer ${provider.apiKey}`,
            "Content-Type": "application/json",
          },
          body: JSON.stringify({
            model: provider.model,
            messages: [
              { role: "system", content: prompt.system },
              { role: "user", content: prompt.user },
            ],
            max_tokens: 1500,
            temperature: 0.2,
          }),
          signal: controller.signal,
        });

        if (!response.ok) {
          const errorText = await response.text();
          lastError = `${provider.name} returned ${response.status}: ${errorText.substring(0, 200)}`;
          retryable = isRetryableStatus(response.status);
        } else {
          const body = (await response.json()) as ChatCompletionResponse;
          const content = body.choices?.[0]?.message?.content;
          if (!content) {
            return {
              ok: false,
              error: { kind: "transport", message: `${provider.name} returned no content` },
            };
          }
          if (body.usage) {
            logger.debug(
              `AI: ${body.usage.prompt_tokens} prompt / ${body.usage.completion_tokens} completion tokens`,
            );
          }
          return { ok: true, value: content };
        }
      } catch (error) {
        const isAbort = error instanceof Error && error.name === "AbortError";
        lastError = isAbort ? `Timeout after ${timeoutMs}ms` : String(error);
        retryable = true;
      } finally {
        clearTimeout(timeoutId);
      }

      if (!retryable || attempt === maxAttempts) break;

      const backoffMs = backoffStartMs * Math.pow(2, attempt - 1);
      logger.warn(`AI: ${lastError} — retrying in ${backoffMs}ms`);
      await sleep(backoffMs);
    }

    logger.error(`AI: ${lastError}`);
    return { ok: false, error: { kind: "transport", message: lastError } };
  };
}

export function createScoringModel(config: AppConfig): TextCompletion {
  if (!config.env.aiApiKey) {
    return async () => ({
      ok: false,
      error: { kind: "unconfigured", message: "AI_API_KEY not set" },
    });
  }

  return createChatCompletion({
    name: new URL(config.env.aiEndpoint).hostname,
    endpoint: config.env.aiEndpoint,
    model: config.env.aiModel,
    apiKey: config.env.aiApiKey,
  });
}

export async function scoreBatch(
  profileSummary: string,
  batch: FilteredCandidate[],
  complete: TextCompletion,
): Promise<Result<BatchScore[], ScoringFailure>> {
  let completion: Result<string, ScoringFailure>;
  try {
    completion = await complete({
      system: SYSTEM_PROMPT,
      user: buildBatchPrompt(profileSummary, batch),
    });
  } catch (error) {
    return { ok: false, error: { kind: "transport", message: errorMessage(error) } };
  }
  if (!completion.ok) return completion;
  return parseBatchScores(completion.value);
}

export interface ScoringRun {
  scored: ScoredCandidate[];
  failedBatches: number;
  failures: string[];
}

export async function scoreCandidates(
  candidates: FilteredCandidate[],
  profileSummary: string,
  complete: TextCompletion,
  options: { batchSize?: number; delayMs?: number } = {},
): Promise<ScoringRun> {
  const batchSize = options.batchSize ?? BATCH_SIZE;
  const scored: ScoredCandidate[] = [];
  const failures: string[] = [];
  let failedBatches = 0;

  for (let start = 0; start < candidates.length; start += batchSize) {
    const batch = candidates.slice(start, start + batchSize);
    const batchNumber = start / batchSize + 1;
    const result = await scoreBatch(profileSummary, batch, complete);

    if (!result.ok) {
      failedBatches += 1;
      failures.push(`AI batch ${batchNumber}: ${result.error.message}`);
      logger.warn(
        `AI: batch ${batchNumber} failed (${result.error.kind}): ${result.error.message}`,
      );
      for (const candidate of batch) {
        scored.push({
          ...candidate,
          fitScore: 0,
          b2cValidated: false,
          aiReasoning: SCORING_FAILED_REASON,
        });
      }
    } else {
      const byIndex = new Map(result.value.map((s) => [s.index, s]));
      batch.forEach((candidate, i) => {
        const score = byIndex.get(i + 1);
        scored.push({
          ...candidate,
          fitScore: score?.fitScore ?? 0,
          b2cValidated: score?.b2cValidated ?? false,
          aiReasoning: score?.reasoning ?? "",
        });
      });
    }

    const hasMore = start + batchSize < candidates.length;
    if (hasMore && options.delayMs) await sleep(options.delayMs);
  }

  return { scored, failedBatches, failures };
}

export function categorize(fitScore: number): ScoutResultStatus {
  if (fitScore >= 7) return "promoted";
  if (fitScore >= 5) return "new";
  return "dismissed";
}
