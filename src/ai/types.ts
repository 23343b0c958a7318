import type { FilteredCandidate } from "../types";

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface ScoringFailure {
  kind: "unconfigured" | "transport" | "parse";
  message: string;
}

export interface BatchScore {
  /** 1-based position in the batch */
  index: number;
  fitScore: number;
  b2cValidated: boolean;
  reasoning: string;
}

export interface ScoredCandidate extends FilteredCandidate {
  fitScore: number;
  b2cValidated: boolean;
  aiReasoning: string;
}

export interface CompletionPrompt {
  system: string;
  user: string;
}

/** External text generation. Must not throw; failures come back as values. */
export type TextCompletion = (
  prompt: CompletionPrompt,
) => Promise<Result<string, ScoringFailure>>;

export interface AIProviderConfig {
  name: string;
  endpoint: string;
  model: string;
  apiKey: string;
}

export interface ChatCompletionResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}
