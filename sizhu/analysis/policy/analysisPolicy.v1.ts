/**
 * Analysis Policy v1
 *
 * Pinned weights, thresholds and fixed tables for the chart analyzers.
 * Any change here changes results, so it gets a new policy version.
 */

import type { Branch, Element, Stem } from "../../../calendar/stemsBranches.js";

export type StrengthLevel = "very_strong" | "strong" | "balanced" | "weak" | "very_weak";

export interface StrengthBand {
  min_score: number;
  level: StrengthLevel;
}

export interface AnalysisPolicyV1 {
  analysis_policy_version: string;

  element_weights: {
    stem: number;
    branch: number;
    hidden_stem: number;
  };

  /** Share (%) below which an element counts as missing. */
  missing_share_pct: number;

  strength: {
    base: number;
    seasonal_support: number;
    rooted: number;
    per_peer: number;
    /** Checked top-down; the first band whose min_score is met wins. */
    bands: StrengthBand[];
  };

  ten_god_weights: {
    stem: number;
    main_hidden_stem: number;
  };

  dominant_pattern: {
    max_score_exclusive: number;
    min_share_pct_exclusive: number;
  };

  major_cycles: {
    steps: number;
    years_per_step: number;
    days_per_year_of_age: number;
    months_per_remaining_day: number;
    round_up_remainder_hours: number;
    fallback_start_age: number;
    fallback_start_days: number;
  };

  annual_cycles: {
    useful_weight: number;
    unfavorable_weight: number;
    favorable_min: number;
    neutral_min: number;
    default_span_years: number;
  };

  personality: {
    default_score: number;
    strong_group_min: number;
  };
}

export const ANALYSIS_POLICY_V1: AnalysisPolicyV1 = {
  analysis_policy_version: "analysis_v1",

  element_weights: {
    stem: 1.0,
    branch: 1.0,
    hidden_stem: 0.3,
  },

  missing_share_pct: 5,

  strength: {
    base: 50,
    seasonal_support: 20,
    rooted: 15,
    per_peer: 5,
    bands: [
      { min_score: 80, level: "very_strong" },
      { min_score: 65, level: "strong" },
      { min_score: 50, level: "balanced" },
      { min_score: 35, level: "weak" },
    ],
  },

  ten_god_weights: {
    stem: 1.0,
    main_hidden_stem: 0.5,
  },

  dominant_pattern: {
    max_score_exclusive: 30,
    min_share_pct_exclusive: 70,
  },

  major_cycles: {
    steps: 10,
    years_per_step: 10,
    days_per_year_of_age: 3,
    months_per_remaining_day: 4,
    round_up_remainder_hours: 12,
    fallback_start_age: 1,
    fallback_start_days: 365,
  },

  annual_cycles: {
    useful_weight: 0.6,
    unfavorable_weight: 0.4,
    favorable_min: 4,
    neutral_min: 3,
    default_span_years: 10,
  },

  personality: {
    default_score: 5.0,
    strong_group_min: 2,
  },
};

/**
 * Dominant-element pattern per element. Every element has one, so a chart
 * that meets the dominance condition never falls through to the ordinary
 * path.
 */
export const DOMINANT_PATTERNS: Record<
  Element,
  { type: string; level: "high" | "medium_high"; description: string }
> = {
  wood: { type: "qu_zhi", level: "high", description: "Wood dominates the chart; growth-oriented, benevolent temperament." },
  fire: { type: "yan_shang", level: "high", description: "Fire dominates the chart; expressive, energetic temperament." },
  earth: { type: "jia_se", level: "high", description: "Earth dominates the chart; steady, accumulative temperament." },
  metal: { type: "cong_ge", level: "medium_high", description: "Metal dominates the chart; decisive, reforming temperament." },
  water: { type: "run_xia", level: "high", description: "Water dominates the chart; adaptive, perceptive temperament." },
};

export type StemKeyedTable = Partial<Record<Stem, Branch>>;
export type BranchKeyedTable = Partial<Record<Branch, Branch>>;

function byTrine(groups: ReadonlyArray<readonly [readonly Branch[], Branch]>): BranchKeyedTable {
  const table: BranchKeyedTable = {};
  for (const [members, target] of groups) {
    for (const member of members) table[member] = target;
  }
  return table;
}

/** Inauspicious marker tables. Fixed lore, not user-editable rule data. */
export const INAUSPICIOUS_MARKER_TABLES = {
  goat_blade: {
    甲: "卯",
    乙: "寅",
    丙: "午",
    丁: "巳",
    戊: "午",
    己: "巳",
    庚: "酉",
    辛: "申",
    壬: "子",
    癸: "亥",
  } satisfies StemKeyedTable,
  robbery_sha: byTrine([
    [["寅", "午", "戌"], "亥"],
    [["巳", "酉", "丑"], "寅"],
    [["申", "子", "辰"], "巳"],
    [["亥", "卯", "未"], "申"],
  ]),
  calamity_sha: byTrine([
    [["寅", "午", "戌"], "子"],
    [["巳", "酉", "丑"], "卯"],
    [["申", "子", "辰"], "午"],
    [["亥", "卯", "未"], "酉"],
  ]),
  lonely_star: byTrine([
    [["寅", "卯", "辰"], "巳"],
    [["巳", "午", "未"], "申"],
    [["申", "酉", "戌"], "亥"],
    [["亥", "子", "丑"], "寅"],
  ]),
  widow_star: byTrine([
    [["寅", "卯", "辰"], "丑"],
    [["巳", "午", "未"], "辰"],
    [["申", "酉", "戌"], "未"],
    [["亥", "子", "丑"], "戌"],
  ]),
};
