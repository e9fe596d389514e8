/**
 * Chart analysis entry point.
 *
 * Validates the birth input, casts the chart, then runs every analyzer in
 * dependency order. Synchronous and deterministic: the same input and the
 * same rule snapshot always produce a deep-equal result, with no timestamps
 * inside it.
 */

import { z } from "zod";
import { computeFourPillars } from "../calendar/computeFourPillars.js";
import { InvalidBirthInputError } from "../calendar/errors.js";
import { describeLunarDate, type LunarDateInfo, type SolarTermSource } from "../calendar/lunarCalendar.js";
import type { EffectiveBirthMoment, FourPillarChart } from "../calendar/schemas/fourPillarChart.schema.js";
import { resolveBirthMoment } from "../calendar/trueSolarTime.js";
import {
  assessStrength,
  deriveFavorableElements,
  tallyElements,
  type ElementProfile,
  type FavorableElementSet,
  type StrengthAssessment,
} from "./analysis/elements/analyzeElements.js";
import { evaluateAnnualCycles, type AnnualCycle } from "./analysis/cycles/evaluateAnnualCycle.js";
import { scheduleMajorCycles, type MajorCycleSchedule } from "./analysis/cycles/scheduleMajorCycles.js";
import { classifyPattern, type PatternResult } from "./analysis/pattern/classifyPattern.js";
import { ANALYSIS_POLICY_V1, type AnalysisPolicyV1 } from "./analysis/policy/analysisPolicy.v1.js";
import { analyzeInterpersonal, type InterpersonalProfile } from "./analysis/profile/analyzeInterpersonal.js";
import {
  analyzeCareer,
  analyzeHealth,
  analyzeMarriage,
  analyzeWealth,
  type CareerOutlook,
  type HealthOutlook,
  type MarriageOutlook,
  type WealthOutlook,
} from "./analysis/profile/analyzeLifeAreas.js";
import { analyzePersonality, type PersonalityProfile } from "./analysis/profile/analyzePersonality.js";
import { evaluateSpiritMarkers, type SpiritMarkerReport } from "./analysis/spirits/evaluateSpiritMarkers.js";
import { assignTenGods, type TenGodAnalysis } from "./analysis/tenGods/classifyTenGod.js";
import type { RuleRepository, RuleLoadStatus } from "./rules/ruleRepository.js";
import type { RuleCategory } from "./rules/rules.schemas.js";

export const BirthInputSchema = z.object({
  name: z.string().optional(),
  year: z.number().int(),
  month: z.number().int(),
  day: z.number().int(),
  hour: z.number().int(),
  minute: z.number().int(),
  gender: z.enum(["male", "female"]),
  longitude: z.number().min(-180).max(180).nullable().optional(),
  latitude: z.number().min(-90).max(90).nullable().optional(),
  province: z.string().nullable().optional(),
  city: z.string().nullable().optional(),
  use_true_solar_time: z.boolean().optional(),
  annual_range: z
    .object({
      start_year: z.number().int(),
      count: z.number().int().min(1).max(120),
    })
    .optional(),
});

export type BirthInput = z.infer<typeof BirthInputSchema>;

export interface ChartAnalysis {
  analysis_policy_version: string;
  subject: { name: string | null; gender: BirthInput["gender"] };
  birth_moment: EffectiveBirthMoment;
  chart: FourPillarChart;
  lunar: LunarDateInfo;
  elements: ElementProfile;
  strength: StrengthAssessment;
  favorable: FavorableElementSet;
  ten_gods: TenGodAnalysis;
  pattern: PatternResult;
  spirit_markers: SpiritMarkerReport;
  major_cycles: MajorCycleSchedule;
  annual_cycles: AnnualCycle[];
  personality: PersonalityProfile;
  career: CareerOutlook;
  wealth: WealthOutlook;
  marriage: MarriageOutlook;
  health: HealthOutlook;
  interpersonal: InterpersonalProfile;
  rule_tables: Record<RuleCategory, RuleLoadStatus>;
}

export interface AnalyzeDependencies {
  rules: RuleRepository;
  termSource?: SolarTermSource;
  policy?: AnalysisPolicyV1;
}

/** Parse unknown input into a BirthInput, or throw InvalidBirthInputError. */
export function parseBirthInput(input: unknown): BirthInput {
  const result = BirthInputSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join(".") : "input";
    throw new InvalidBirthInputError(field, issue ? issue.message : result.error.message);
  }
  return result.data;
}

export function analyzeBirthChart(input: unknown, deps: AnalyzeDependencies): ChartAnalysis {
  const policy = deps.policy ?? ANALYSIS_POLICY_V1;
  const birth = parseBirthInput(input);

  // Layer 0
  const moment = resolveBirthMoment(birth);
  const chart = computeFourPillars(moment.effective);
  const lunar = describeLunarDate(moment.effective, chart.month.branch);

  // Rule snapshot: read once per repository, shared by every analysis.
  const { tables, status } = deps.rules.snapshot();

  // Layer 1
  const elements = tallyElements(chart, policy);
  const strength = assessStrength(chart, policy);
  const favorable = deriveFavorableElements(strength.status, chart.day_master.element);
  const tenGods = assignTenGods(chart, policy);
  const pattern = classifyPattern(chart, strength, elements, policy);
  const spiritMarkers = evaluateSpiritMarkers(chart, tables.spirit_markers);

  const majorCycles = scheduleMajorCycles({
    chart,
    gender: birth.gender,
    birth: moment.effective,
    favorable,
    termSource: deps.termSource,
    policy,
  });
  const annualCycles = evaluateAnnualCycles(
    birth.annual_range ?? { start_year: birth.year, count: policy.annual_cycles.default_span_years },
    chart,
    favorable,
    policy
  );

  // Profile readings
  const personality = analyzePersonality(
    tenGods,
    tables.ten_god_traits,
    tables.personality_scoring,
    {
      distribution: tenGods.distribution,
      useful: favorable.useful,
      status: strength.status,
      day_master: chart.day_master.element,
    },
    policy
  );

  return {
    analysis_policy_version: policy.analysis_policy_version,
    subject: { name: birth.name ?? null, gender: birth.gender },
    birth_moment: moment,
    chart,
    lunar,
    elements,
    strength,
    favorable,
    ten_gods: tenGods,
    pattern,
    spirit_markers: spiritMarkers,
    major_cycles: majorCycles,
    annual_cycles: annualCycles,
    personality,
    career: analyzeCareer(pattern, tenGods.distribution, tables.pattern_careers),
    wealth: analyzeWealth(tenGods.distribution),
    marriage: analyzeMarriage(tenGods.distribution),
    health: analyzeHealth(elements),
    interpersonal: analyzeInterpersonal(chart.year.branch, tables.zodiac_relations, spiritMarkers),
    rule_tables: status,
  };
}
