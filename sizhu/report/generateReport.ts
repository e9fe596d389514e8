/**
 * Narrative report over a finished analysis.
 *
 * Runs after the analysis and never feeds back into it: a failed report is a
 * tagged error next to a still-valid ChartAnalysis.
 */

import { callLLM, type LLMCallConfig, type LLMErrorType } from "../../llm/callLLM.js";
import { analysisLog } from "../../logging/analysisLog.js";
import type { ChartAnalysis } from "../analyzeBirthChart.js";
import type { AppConfig, ReportLevel } from "../config/loadConfig.js";
import { buildReportPrompt } from "./buildReportPrompt.js";
import { decideRetry, sleep, type RetrySettings } from "./retryPolicy.js";

export type ReportResult =
  | {
      status: "ok";
      level: ReportLevel;
      text: string;
      model: string;
      attempts: number;
    }
  | {
      status: "error";
      level: ReportLevel;
      error_type: LLMErrorType;
      message: string;
      attempts: number;
    };

export interface GenerateReportOptions {
  /** Replaced in tests so backoff does not wait on real timers. */
  sleepFn?: (ms: number) => Promise<void>;
}

export async function generateReport(
  analysis: ChartAnalysis,
  level: ReportLevel,
  llm: AppConfig["llm"],
  options: GenerateReportOptions = {}
): Promise<ReportResult> {
  const wait = options.sleepFn ?? sleep;
  const prompt = buildReportPrompt({ analysis, level, systemPrompt: llm.system_prompt });
  const callConfig: LLMCallConfig = {
    model: llm.model,
    base_url: llm.base_url,
    api_key: llm.api_key,
    temperature: llm.temperature,
    max_tokens: llm.max_tokens,
    timeout_ms: llm.timeout_ms,
  };
  const settings: RetrySettings = { max_retries: llm.max_retries, retry_delay_ms: llm.retry_delay_ms };
  const subject = analysis.subject.name ?? undefined;

  analysisLog({ event: "report.started", subject, level_requested: level, model: llm.model });

  let attempt = 0;
  for (;;) {
    attempt += 1;
    const result = await callLLM({ systemPrompt: prompt.system_prompt, userPrompt: prompt.user_prompt }, callConfig);

    if (result.status === "ok") {
      analysisLog({ event: "report.succeeded", subject, attempt, model: result.model, chars: result.text.length });
      return { status: "ok", level, text: result.text, model: result.model, attempts: attempt };
    }

    const decision = decideRetry({ attempt, errorType: result.error_type, settings });
    if (!decision.shouldRetry) {
      analysisLog({
        event: "report.failed",
        level: "error",
        subject,
        attempt,
        error_code: result.error_type,
        error_message: result.message,
      });
      return { status: "error", level, error_type: result.error_type, message: result.message, attempts: attempt };
    }

    analysisLog({
      event: "report.retry",
      level: "warn",
      subject,
      attempt,
      error_code: result.error_type,
      error_message: result.message,
      backoff_ms: decision.backoffMs,
    });
    await wait(decision.backoffMs);
  }
}
