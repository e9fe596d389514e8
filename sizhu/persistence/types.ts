import type { ChartAnalysis } from "../analyzeBirthChart.js";
import type { ReportResult } from "../report/generateReport.js";

/**
 * Persistence adapter interface.
 *
 * Implementations store a finished analysis somewhere durable (local JSON,
 * a Supabase table). They throw PersistenceError on failure; persistResult
 * turns that into a tagged outcome.
 */
export type AnalysisRecord = {
  analysis: ChartAnalysis;
  report: ReportResult | null;
  /** ISO timestamp of the run; kept outside the analysis so it stays deterministic. */
  generated_at: string;
};

export type PersistOutcome =
  | { status: "ok"; writer: string; location: string }
  | { status: "error"; writer: string; message: string };

export interface PersistenceWriter {
  name: string;

  /** @returns where the record ended up (file path, row id) */
  write(record: AnalysisRecord): Promise<string>;
}
