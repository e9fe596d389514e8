import { beforeEach, describe, expect, it, vi } from "vitest";
import type { AppConfig } from "../../config/loadConfig.js";
import { analyzeBirthChart } from "../../analyzeBirthChart.js";
import { RuleRepository } from "../../rules/ruleRepository.js";
import { buildReportPrompt } from "../buildReportPrompt.js";
import { generateReport } from "../generateReport.js";
import { decideRetry } from "../retryPolicy.js";

const { callLLMMock } = vi.hoisted(() => ({ callLLMMock: vi.fn() }));

vi.mock("../../../llm/callLLM.js", () => ({ callLLM: callLLMMock }));

const llm: AppConfig["llm"] = {
  provider: "openai",
  api_key: "test-secret",
  model: "test-model",
  base_url: "https://llm.example.test/v1",
  temperature: 0.7,
  max_tokens: 4000,
  timeout_ms: 1000,
  max_retries: 2,
  retry_delay_ms: 100,
};

const analysis = analyzeBirthChart(
  { name: "test-subject", gender: "male", year: 1990, month: 1, day: 1, hour: 0, minute: 0 },
  { rules: new RuleRepository() }
);

beforeEach(() => {
  callLLMMock.mockReset();
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

describe("decideRetry", () => {
  const settings = { max_retries: 3, retry_delay_ms: 2000 };

  it("backs off linearly for transient errors", () => {
    expect(decideRetry({ attempt: 1, errorType: "timeout", settings })).toEqual({ shouldRetry: true, backoffMs: 2000 });
    expect(decideRetry({ attempt: 3, errorType: "rate_limited", settings })).toEqual({ shouldRetry: true, backoffMs: 6000 });
  });

  it("stops after max_retries or on a permanent error", () => {
    expect(decideRetry({ attempt: 4, errorType: "timeout", settings }).shouldRetry).toBe(false);
    expect(decideRetry({ attempt: 1, errorType: "invalid_response", settings }).shouldRetry).toBe(false);
    expect(decideRetry({ attempt: 1, errorType: "missing_api_key", settings }).shouldRetry).toBe(false);
  });
});

describe("buildReportPrompt", () => {
  it("carries the pillars and the level instruction", () => {
    const prompt = buildReportPrompt({ analysis, level: "simple" });

    expect(prompt.user_prompt).toContain("- year: 庚午\n- month: 庚寅\n- day: 丙辰\n- hour: 戊子");
    expect(prompt.user_prompt).toContain("Day master: 丙 (yang fire)");
    expect(prompt.user_prompt).toContain("Detail level: simple. Write a short overview of three or four paragraphs.");
    expect(prompt.user_prompt).not.toContain("Major cycles:");
  });

  it("adds the decade cycles at the comprehensive level", () => {
    const prompt = buildReportPrompt({ analysis, level: "comprehensive", systemPrompt: "custom system" });

    expect(prompt.system_prompt).toBe("custom system");
    expect(prompt.user_prompt).toContain("Major cycles:\n- 辛卯 (age 1-10, 1991-2000): unfavorable");
  });
});

describe("generateReport", () => {
  it("returns the text on the first success", async () => {
    callLLMMock.mockResolvedValueOnce({ status: "ok", text: "report body", model: "test-model" });

    const result = await generateReport(analysis, "normal", llm);

    expect(result).toEqual({ status: "ok", level: "normal", text: "report body", model: "test-model", attempts: 1 });
  });

  it("retries transient failures with linear backoff", async () => {
    const sleepFn = vi.fn(async (_ms: number) => undefined);
    callLLMMock
      .mockResolvedValueOnce({ status: "error", error_type: "timeout", message: "timed out" })
      .mockResolvedValueOnce({ status: "error", error_type: "rate_limited", message: "429" })
      .mockResolvedValueOnce({ status: "ok", text: "third time", model: "test-model" });

    const result = await generateReport(analysis, "detailed", llm, { sleepFn });

    expect(result).toMatchObject({ status: "ok", text: "third time", attempts: 3 });
    expect(sleepFn.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it("gives up after max_retries and reports the last error", async () => {
    const sleepFn = vi.fn(async (_ms: number) => undefined);
    callLLMMock.mockResolvedValue({ status: "error", error_type: "provider_error", message: "503" });

    const result = await generateReport(analysis, "normal", llm, { sleepFn });

    expect(result).toEqual({ status: "error", level: "normal", error_type: "provider_error", message: "503", attempts: 3 });
    expect(callLLMMock).toHaveBeenCalledTimes(3);
  });

  it("does not retry permanent errors", async () => {
    callLLMMock.mockResolvedValue({ status: "error", error_type: "missing_api_key", message: "no key" });

    const result = await generateReport(analysis, "normal", llm);

    expect(result).toMatchObject({ status: "error", error_type: "missing_api_key", attempts: 1 });
    expect(callLLMMock).toHaveBeenCalledTimes(1);
  });
});
