import type { LLMErrorType } from "../../llm/callLLM.js";

export type RetryDecision = { shouldRetry: boolean; backoffMs: number };

export type RetrySettings = {
  /** Retries after the first attempt. */
  max_retries: number;
  retry_delay_ms: number;
};

const RETRYABLE: ReadonlySet<LLMErrorType> = new Set(["timeout", "rate_limited", "provider_error"]);

export function isRetryable(errorType: LLMErrorType): boolean {
  return RETRYABLE.has(errorType);
}

/** `attempt` is 1-based and counts the attempt that just failed. Backoff grows linearly. */
export function decideRetry(params: { attempt: number; errorType: LLMErrorType; settings: RetrySettings }): RetryDecision {
  if (params.attempt > params.settings.max_retries) return { shouldRetry: false, backoffMs: 0 };
  if (!isRetryable(params.errorType)) return { shouldRetry: false, backoffMs: 0 };
  return { shouldRetry: true, backoffMs: params.settings.retry_delay_ms * params.attempt };
}

export async function sleep(ms: number) {
  await new Promise((r) => setTimeout(r, ms));
}
