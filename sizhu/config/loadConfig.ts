import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigNotFoundError, InvalidConfigError } from "../errors.js";
import type { BirthInput } from "../analyzeBirthChart.js";

/**
 * Run configuration.
 *
 * `config.json` holds everything; an optional `user_config.json` beside it
 * replaces the `user` section so personal data can stay out of version
 * control. Secrets come from the environment when the file leaves them out.
 */

export const REPORT_LEVELS = ["simple", "normal", "detailed", "comprehensive"] as const;
export type ReportLevel = (typeof REPORT_LEVELS)[number];

/**
 * Configured births are limited to 1900..2100. The calendar layer itself takes
 * 1..9999; callers outside this range use analyzeBirthChart directly.
 */
export const CONFIG_BIRTH_YEAR_RANGE = { min: 1900, max: 2100 } as const;

const UserSchema = z.object({
  name: z.string().min(1),
  gender: z.enum(["male", "female"]),
  birth: z.object({
    year: z.number().int().min(CONFIG_BIRTH_YEAR_RANGE.min).max(CONFIG_BIRTH_YEAR_RANGE.max),
    month: z.number().int().min(1).max(12),
    day: z.number().int().min(1).max(31),
    hour: z.number().int().min(0).max(23),
    minute: z.number().int().min(0).max(59).default(0),
  }),
  location: z
    .object({
      province: z.string().nullable().optional(),
      city: z.string().nullable().optional(),
      longitude: z.number().min(-180).max(180).nullable().optional(),
      latitude: z.number().min(-90).max(90).nullable().optional(),
      use_true_solar_time: z.boolean().default(false),
    })
    .default({}),
});

const LlmSchema = z.object({
  provider: z.enum(["openai", "custom"]).default("openai"),
  api_key: z.string().min(1).optional(),
  model: z.string().min(1).default("gpt-4.1-mini"),
  base_url: z.string().url().default("https://api.openai.com/v1"),
  temperature: z.number().min(0).max(2).default(0.7),
  max_tokens: z.number().int().min(1).max(100_000).default(4000),
  timeout_ms: z.number().int().min(1).default(60_000),
  max_retries: z.number().int().min(0).default(3),
  retry_delay_ms: z.number().int().min(0).default(2_000),
  system_prompt: z.string().optional(),
});

const AnalysisSchema = z.object({
  include_report: z.boolean().default(false),
  report_level: z.enum(REPORT_LEVELS).default("normal"),
  rules_dir: z.string().optional(),
  annual_span_years: z.number().int().min(1).max(120).default(10),
});

const OutputSchema = z.object({
  dir: z.string().default("output"),
  json: z
    .object({
      enabled: z.boolean().default(true),
      pretty: z.boolean().default(true),
    })
    .default({}),
  supabase: z
    .object({
      enabled: z.boolean().default(false),
      table: z.string().min(1).default("chart_analyses"),
    })
    .default({}),
  log_level: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export const AppConfigSchema = z
  .object({
    user: UserSchema,
    llm: LlmSchema.default({}),
    analysis: AnalysisSchema.default({}),
    output: OutputSchema.default({}),
  })
  .strict();

export type AppConfig = z.infer<typeof AppConfigSchema>;

export interface LoadConfigOptions {
  configPath?: string;
  /** Defaults to user_config.json beside the config file. */
  userConfigPath?: string;
  env?: NodeJS.ProcessEnv;
}

export const DEFAULT_CONFIG_PATH = "config.json";

function readJsonFile(filePath: string): unknown {
  const raw = fs.readFileSync(filePath, "utf-8");
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new InvalidConfigError(filePath, [`invalid JSON: ${err instanceof Error ? err.message : String(err)}`]);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const configPath = path.resolve(options.configPath ?? env.SIZHU_CONFIG_PATH ?? DEFAULT_CONFIG_PATH);

  if (!fs.existsSync(configPath)) {
    throw new ConfigNotFoundError(configPath);
  }

  const parsed = readJsonFile(configPath);
  if (!isRecord(parsed)) {
    throw new InvalidConfigError(configPath, ["top level must be an object"]);
  }

  const userConfigPath = options.userConfigPath ?? path.join(path.dirname(configPath), "user_config.json");
  const merged: Record<string, unknown> = { ...parsed };
  if (fs.existsSync(userConfigPath)) {
    const userOverride = readJsonFile(userConfigPath);
    if (!isRecord(userOverride)) {
      throw new InvalidConfigError(userConfigPath, ["top level must be an object"]);
    }
    merged.user = isRecord(userOverride.user) ? userOverride.user : userOverride;
  }

  const result = AppConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new InvalidConfigError(
      configPath,
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }

  const config = result.data;
  if (!config.llm.api_key && env.OPENAI_API_KEY) {
    config.llm.api_key = env.OPENAI_API_KEY;
  }
  return config;
}

/** Map the configured user onto the analysis entry's input shape. */
export function toBirthInput(config: AppConfig): BirthInput {
  const { user, analysis } = config;
  return {
    name: user.name,
    gender: user.gender,
    year: user.birth.year,
    month: user.birth.month,
    day: user.birth.day,
    hour: user.birth.hour,
    minute: user.birth.minute,
    longitude: user.location.longitude,
    latitude: user.location.latitude,
    province: user.location.province,
    city: user.location.city,
    use_true_solar_time: user.location.use_true_solar_time,
    annual_range: { start_year: user.birth.year, count: analysis.annual_span_years },
  };
}
