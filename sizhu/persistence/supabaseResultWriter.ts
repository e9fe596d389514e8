import type { SupabaseClient } from "@supabase/supabase-js";
import { pillarLabel } from "../../calendar/computeFourPillars.js";
import { PersistenceError } from "../errors.js";
import { getSupabaseClient } from "../lib/supabaseClient.js";
import type { AnalysisRecord, PersistenceWriter } from "./types.js";

export const DEFAULT_RESULTS_TABLE = "chart_analyses";

/**
 * Inserts one row per run. The full analysis goes into a jsonb column; the
 * pillars and policy version are copied out so rows can be filtered without
 * unpacking it.
 */
export class SupabaseResultWriter implements PersistenceWriter {
  name = "supabase";

  constructor(
    private readonly table: string = DEFAULT_RESULTS_TABLE,
    private readonly clientFactory: () => SupabaseClient = () => getSupabaseClient()
  ) {}

  async write(record: AnalysisRecord): Promise<string> {
    const { analysis } = record;
    const { chart } = analysis;

    let client: SupabaseClient;
    try {
      client = this.clientFactory();
    } catch (err) {
      throw new PersistenceError(this.name, err instanceof Error ? err.message : String(err));
    }

    const { data, error } = await client
      .from(this.table)
      .insert({
        subject_name: analysis.subject.name,
        gender: analysis.subject.gender,
        birth_clock: analysis.birth_moment.clock,
        year_pillar: pillarLabel(chart.year),
        month_pillar: pillarLabel(chart.month),
        day_pillar: pillarLabel(chart.day),
        hour_pillar: pillarLabel(chart.hour),
        analysis_policy_version: analysis.analysis_policy_version,
        analysis,
        report_text: record.report?.status === "ok" ? record.report.text : null,
        generated_at: record.generated_at,
      })
      .select("id")
      .single();

    if (error) throw new PersistenceError(this.name, error.message);

    const id: unknown = data?.id;
    return `${this.table}/${typeof id === "string" || typeof id === "number" ? String(id) : "unknown"}`;
  }
}
