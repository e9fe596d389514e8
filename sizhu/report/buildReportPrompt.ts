import { pillarLabel } from "../../calendar/computeFourPillars.js";
import type { ReportLevel } from "../config/loadConfig.js";
import type { ChartAnalysis } from "../analyzeBirthChart.js";

export type AssembledPrompt = {
  system_prompt: string;
  user_prompt: string;
};

const DEFAULT_SYSTEM_PROMPT = `
You are an experienced Four Pillars reader writing for a general audience.
Ground every statement in the chart data you are given. Do not invent pillars, elements or cycles.
Avoid fatalistic or absolute language; frame readings as tendencies and offer practical suggestions.
`.trim();

const LEVEL_INSTRUCTIONS: Record<ReportLevel, string> = {
  simple: "Write a short overview of three or four paragraphs.",
  normal: "Write an overview followed by brief notes on career, wealth, relationships and health.",
  detailed: "Write an overview, a section per life area, and a list of concrete suggestions.",
  comprehensive:
    "Write an overview, a section per life area, a walk through the major cycles and the coming years, and a list of concrete suggestions.",
};

function list(values: readonly string[]): string {
  return values.length > 0 ? values.join(", ") : "none";
}

export function buildReportPrompt(input: {
  analysis: ChartAnalysis;
  level: ReportLevel;
  systemPrompt?: string;
}): AssembledPrompt {
  const { analysis, level } = input;
  const { chart, elements, strength, favorable, pattern } = analysis;
  const moment = analysis.birth_moment.effective;

  const cycleLines =
    level === "comprehensive"
      ? analysis.major_cycles.cycles
          .map((c) => `- ${c.label} (age ${c.start_age}-${c.end_age}, ${c.start_year}-${c.end_year}): ${c.evaluation}`)
          .join("\n")
      : "";

  const user_prompt = `
Subject: ${analysis.subject.name ?? "anonymous"} (${analysis.subject.gender})
Birth (effective): ${moment.year}-${moment.month}-${moment.day} ${moment.hour}:${String(moment.minute).padStart(2, "0")}

Pillars:
- year: ${pillarLabel(chart.year)}
- month: ${pillarLabel(chart.month)}
- day: ${pillarLabel(chart.day)}
- hour: ${pillarLabel(chart.hour)}
Day master: ${chart.day_master.stem} (${chart.day_master.polarity} ${chart.day_master.element})

Elements:
- strongest: ${elements.most}
- missing: ${list(elements.missing)}
- day master strength: ${strength.level} (score ${strength.score})
- useful: ${list(favorable.useful)}
- unfavorable: ${list(favorable.unfavorable)}

Pattern: ${pattern.type} (${pattern.category}, level ${pattern.level})
Spirit markers: auspicious ${list(analysis.spirit_markers.auspicious)}; inauspicious ${list(analysis.spirit_markers.inauspicious)}
${cycleLines ? `\nMajor cycles:\n${cycleLines}\n` : ""}
Detail level: ${level}. ${LEVEL_INSTRUCTIONS[level]}
`.trim();

  return {
    system_prompt: input.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
    user_prompt,
  };
}
