import { z } from "zod";

export type LLMCallConfig = {
  model: string;
  base_url: string;
  api_key?: string;

  temperature: number;
  max_tokens: number;
  timeout_ms: number;
};

export type CallArgs = {
  systemPrompt: string;
  userPrompt: string;
};

export type LLMErrorType = "timeout" | "rate_limited" | "provider_error" | "invalid_response" | "missing_api_key";

export type LLMCallResult =
  | {
      status: "ok";
      text: string;
      model: string;
      usage?: {
        prompt_tokens?: number;
        completion_tokens?: number;
        total_tokens?: number;
      };
    }
  | {
      status: "error";
      error_type: LLMErrorType;
      message: string;
    };

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

/**
 * Chat-completions transport. No prompt logic here, and no retries: the
 * caller decides what to do with a tagged error.
 */
export async function callLLM(args: CallArgs, config: LLMCallConfig): Promise<LLMCallResult> {
  if (!config.api_key) {
    return {
      status: "error",
      error_type: "missing_api_key",
      message: "LLM api_key is not set (config llm.api_key or OPENAI_API_KEY)",
    };
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), config.timeout_ms);
  const url = `${config.base_url.replace(/\/+$/, "")}/chat/completions`;

  try {
    const response = await fetch(url, {
      method: "POST",
      signal: controller.signal,
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${config.api_key}`,
      },
      body: JSON.stringify({
        model: config.model,
        messages: [
          { role: "system", content: args.systemPrompt },
          { role: "user", content: args.userPrompt },
        ],
        temperature: config.temperature,
        max_tokens: config.max_tokens,
        stream: false,
      }),
    });

    if (!response.ok) {
      const errorText = await safeReadError(response);
      return {
        status: "error",
        error_type: response.status === 429 ? "rate_limited" : "provider_error",
        message: `LLM provider error ${response.status}: ${errorText}`,
      };
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    const content = parsed.success ? parsed.data.choices[0]?.message.content : null;

    if (!parsed.success || typeof content !== "string" || content.trim() === "") {
      return {
        status: "error",
        error_type: "invalid_response",
        message: "LLM provider returned empty content",
      };
    }

    return {
      status: "ok",
      text: content,
      model: parsed.data.model ?? config.model,
      usage: parsed.data.usage,
    };
  } catch (err) {
    if (controller.signal.aborted) {
      return {
        status: "error",
        error_type: "timeout",
        message: `LLM call timed out after ${config.timeout_ms}ms`,
      };
    }

    return {
      status: "error",
      error_type: "provider_error",
      message: err instanceof Error ? err.message : "LLM call failed",
    };
  } finally {
    clearTimeout(timeout);
  }
}

async function safeReadError(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text || response.statusText || "Unknown provider error";
  } catch {
    return response.statusText || "Unknown provider error";
  }
}
