import "dotenv/config";

import { setLogLevel, analysisLog } from "./logging/analysisLog.js";
import { analyzeBirthChart, type ChartAnalysis } from "./sizhu/analyzeBirthChart.js";
import { loadConfig, toBirthInput, type AppConfig } from "./sizhu/config/loadConfig.js";
import { LocalJsonWriter } from "./sizhu/persistence/localJsonWriter.js";
import { persistResult } from "./sizhu/persistence/persistResult.js";
import { SupabaseResultWriter } from "./sizhu/persistence/supabaseResultWriter.js";
import type { PersistenceWriter, PersistOutcome } from "./sizhu/persistence/types.js";
import { generateReport, type ReportResult } from "./sizhu/report/generateReport.js";
import { RuleRepository } from "./sizhu/rules/ruleRepository.js";

type CliArgs = {
  configPath?: string;
  /** Overrides analysis.include_report when set. */
  report?: boolean;
  save: boolean;
};

function parseArgs(argv: string[] = process.argv.slice(2)): CliArgs {
  const args: CliArgs = { save: true };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--config") {
      const value = argv[i + 1];
      if (!value) throw new Error("Usage: tsx run-analysis.ts [--config <path>] [--report|--no-report] [--no-save]");
      args.configPath = value;
      i += 1;
    } else if (arg === "--report") {
      args.report = true;
    } else if (arg === "--no-report") {
      args.report = false;
    } else if (arg === "--no-save") {
      args.save = false;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }
  return args;
}

export function buildWriters(config: AppConfig): PersistenceWriter[] {
  const writers: PersistenceWriter[] = [];
  if (config.output.json.enabled) {
    writers.push(new LocalJsonWriter({ dir: config.output.dir, pretty: config.output.json.pretty }));
  }
  if (config.output.supabase.enabled) {
    writers.push(new SupabaseResultWriter(config.output.supabase.table));
  }
  return writers;
}

export async function runAnalysis(params: {
  config: AppConfig;
  includeReport?: boolean;
  save?: boolean;
  writers?: PersistenceWriter[];
}): Promise<{ analysis: ChartAnalysis; report: ReportResult | null; persisted: PersistOutcome[] }> {
  const { config } = params;
  const subject = config.user.name;

  analysisLog({ event: "analysis.started", subject });
  let analysis: ChartAnalysis;
  try {
    const rules = new RuleRepository({ rulesDir: config.analysis.rules_dir });
    analysis = analyzeBirthChart(toBirthInput(config), { rules });
  } catch (err) {
    analysisLog({
      event: "analysis.failed",
      level: "error",
      subject,
      error_code: err instanceof Error ? err.name : "unknown",
      error_message: err instanceof Error ? err.message : String(err),
    });
    throw err;
  }
  analysisLog({
    event: "analysis.succeeded",
    subject,
    day_master: analysis.chart.day_master.stem,
    pattern: analysis.pattern.type,
  });

  const wantReport = params.includeReport ?? config.analysis.include_report;
  const report = wantReport ? await generateReport(analysis, config.analysis.report_level, config.llm) : null;

  const persisted =
    params.save === false
      ? []
      : await persistResult(params.writers ?? buildWriters(config), {
          analysis,
          report,
          generated_at: new Date().toISOString(),
        });

  return { analysis, report, persisted };
}

async function main() {
  const args = parseArgs();
  const config = loadConfig({ configPath: args.configPath });
  setLogLevel(config.output.log_level);
  analysisLog({ event: "config.loaded", level: "debug", subject: config.user.name });

  const { analysis, report, persisted } = await runAnalysis({
    config,
    includeReport: args.report,
    save: args.save,
  });

  const { chart } = analysis;
  console.log(
    `[sizhu] ${analysis.subject.name ?? "anonymous"}: ${chart.year.stem}${chart.year.branch} ${chart.month.stem}${chart.month.branch} ${chart.day.stem}${chart.day.branch} ${chart.hour.stem}${chart.hour.branch} | ${analysis.strength.level} | ${analysis.pattern.type}`
  );
  if (report?.status === "ok") {
    console.log(report.text);
  }
  for (const outcome of persisted) {
    console.log(
      outcome.status === "ok"
        ? `[sizhu] saved (${outcome.writer}): ${outcome.location}`
        : `[sizhu] save failed (${outcome.writer}): ${outcome.message}`
    );
  }

  if (persisted.some((o) => o.status === "error")) {
    process.exit(1);
  }
}

if (process.argv[1]) {
  const invokedPath = (() => {
    try {
      return new URL(`file://${process.argv[1]}`).href;
    } catch {
      return undefined;
    }
  })();
  if (invokedPath && invokedPath === import.meta.url) {
    main().catch((err) => {
      console.error(err);
      process.exit(1);
    });
  }
}
