/**
 * Structured logging for chart analysis runs.
 *
 * Emits one JSON object per line with a consistent shape so runs can be
 * grepped and aggregated.
 */

export type AnalysisLogEvent =
  | "config.loaded"
  | "analysis.started"
  | "analysis.succeeded"
  | "analysis.failed"
  | "rules.loaded"
  | "rules.empty"
  | "rules.failed"
  | "report.started"
  | "report.retry"
  | "report.succeeded"
  | "report.failed"
  | "persistence.succeeded"
  | "persistence.failed";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type AnalysisLogData = {
  event: AnalysisLogEvent;
  level?: LogLevel;
  subject?: string;
  category?: string;
  writer?: string;
  attempt?: number;
  error_code?: string;
  error_message?: string;
  [key: string]: unknown;
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase();
let minLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

/**
 * Emit a structured log entry. warn/error go to stderr, the rest to stdout.
 */
export function analysisLog(data: AnalysisLogData): void {
  const level = data.level ?? "info";
  if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;

  const logEntry = {
    timestamp: new Date().toISOString(),
    ...data,
    level,
  };

  const line = JSON.stringify(logEntry);
  if (level === "warn" || level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}
