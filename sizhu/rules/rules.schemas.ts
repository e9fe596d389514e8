import { z } from "zod";
import { BranchSchema, StemSchema } from "../../calendar/schemas/fourPillarChart.schema.js";
import { ZODIAC_ANIMALS } from "../../calendar/stemsBranches.js";
import { TEN_GODS } from "../analysis/tenGods/classifyTenGod.js";

/**
 * Zod schemas for the rule tables.
 *
 * Rule files are plain JSON in a fixed shape; these schemas are the only
 * gate between disk and the analyzers.
 */

export const TenGodSchema = z.enum(TEN_GODS);

export const TenGodTraitsSchema = z.record(
  TenGodSchema,
  z.object({
    positive: z.array(z.string().min(1)),
    negative: z.array(z.string().min(1)),
  })
);
export type TenGodTraits = z.infer<typeof TenGodTraitsSchema>;

export const PatternCareersSchema = z.record(
  z.string().min(1),
  z.object({
    suitable: z.array(z.string().min(1)),
    avoid: z.array(z.string().min(1)).optional(),
  })
);
export type PatternCareers = z.infer<typeof PatternCareersSchema>;

export const SpiritMarkerTablesSchema = z.object({
  tianyi_noble: z.record(StemSchema, z.array(BranchSchema).min(1)).optional(),
  wenchang_noble: z.record(StemSchema, BranchSchema).optional(),
  red_luan: z.record(BranchSchema, BranchSchema).optional(),
  heavenly_joy: z.record(BranchSchema, BranchSchema).optional(),
  peach_blossom: z.record(BranchSchema, BranchSchema).optional(),
});
export type SpiritMarkerTables = z.infer<typeof SpiritMarkerTablesSchema>;

export const PERSONALITY_DIMENSIONS = [
  "extraversion",
  "responsibility",
  "emotional_stability",
  "openness",
  "agreeableness",
  "execution",
  "leadership",
  "creativity",
  "sociability",
  "learning",
] as const;
export type PersonalityDimension = (typeof PERSONALITY_DIMENSIONS)[number];

/** Closed set of scoring predicates; see analysis/profile/personalityPredicates.ts. */
export const PERSONALITY_PREDICATES = [
  "officer_strong_and_useful",
  "companion_strong_and_useful",
  "output_strong_and_useful",
  "resource_strong_and_useful",
  "wealth_strong_and_useful",
  "day_master_weak",
  "day_master_strong",
] as const;
export type PersonalityPredicate = (typeof PERSONALITY_PREDICATES)[number];

export const PersonalityRuleSchema = z.object({
  predicate: z.enum(PERSONALITY_PREDICATES),
  score_range: z
    .tuple([z.number().min(0).max(10), z.number().min(0).max(10)])
    .refine(([low, high]) => low <= high, { message: "score_range must be [low, high]" }),
});
export type PersonalityRule = z.infer<typeof PersonalityRuleSchema>;

export const PersonalityScoringSchema = z.record(
  z.enum(PERSONALITY_DIMENSIONS),
  z.array(PersonalityRuleSchema)
);
export type PersonalityScoring = z.infer<typeof PersonalityScoringSchema>;

const ZodiacAnimalSchema = z.enum(ZODIAC_ANIMALS);

export const ZodiacRelationsSchema = z.object({
  three_harmony: z.record(ZodiacAnimalSchema, z.array(ZodiacAnimalSchema)).optional(),
  six_harmony: z.record(ZodiacAnimalSchema, ZodiacAnimalSchema).optional(),
  clash: z.record(ZodiacAnimalSchema, ZodiacAnimalSchema).optional(),
  harm: z.record(ZodiacAnimalSchema, ZodiacAnimalSchema).optional(),
});
export type ZodiacRelations = z.infer<typeof ZodiacRelationsSchema>;

export const RULE_CATEGORIES = [
  "ten_god_traits",
  "pattern_careers",
  "spirit_markers",
  "personality_scoring",
  "zodiac_relations",
] as const;
export type RuleCategory = (typeof RULE_CATEGORIES)[number];

export interface RuleTables {
  ten_god_traits: TenGodTraits;
  pattern_careers: PatternCareers;
  spirit_markers: SpiritMarkerTables;
  personality_scoring: PersonalityScoring;
  zodiac_relations: ZodiacRelations;
}

export const RULE_SCHEMAS: { [K in RuleCategory]: z.ZodType<RuleTables[K], z.ZodTypeDef, unknown> } = {
  ten_god_traits: TenGodTraitsSchema,
  pattern_careers: PatternCareersSchema,
  spirit_markers: SpiritMarkerTablesSchema,
  personality_scoring: PersonalityScoringSchema,
  zodiac_relations: ZodiacRelationsSchema,
};

export function emptyRuleTables(): RuleTables {
  return {
    ten_god_traits: {},
    pattern_careers: {},
    spirit_markers: {},
    personality_scoring: {},
    zodiac_relations: {},
  };
}
