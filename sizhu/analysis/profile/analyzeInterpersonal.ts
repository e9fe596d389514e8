import { zodiacAnimal, type Branch, type ZodiacAnimal } from "../../../calendar/stemsBranches.js";
import type { ZodiacRelations } from "../../rules/rules.schemas.js";
import type { SpiritMarkerReport } from "../spirits/evaluateSpiritMarkers.js";

export interface InterpersonalProfile {
  zodiac: ZodiacAnimal;
  three_harmony: ZodiacAnimal[];
  six_harmony: ZodiacAnimal[];
  clash: ZodiacAnimal[];
  harm: ZodiacAnimal[];
  /** Animals of the branches carrying an auspicious marker. */
  benefactor_zodiacs: ZodiacAnimal[];
}

function single(value: ZodiacAnimal | undefined): ZodiacAnimal[] {
  return value ? [value] : [];
}

export function analyzeInterpersonal(
  yearBranch: Branch,
  relations: ZodiacRelations,
  markers: SpiritMarkerReport
): InterpersonalProfile {
  const zodiac = zodiacAnimal(yearBranch);

  const benefactors: ZodiacAnimal[] = [];
  for (const marker of markers.details) {
    if (marker.kind !== "auspicious") continue;
    const animal = zodiacAnimal(marker.branch);
    if (!benefactors.includes(animal)) benefactors.push(animal);
  }

  return {
    zodiac,
    three_harmony: [...(relations.three_harmony?.[zodiac] ?? [])],
    six_harmony: single(relations.six_harmony?.[zodiac]),
    clash: single(relations.clash?.[zodiac]),
    harm: single(relations.harm?.[zodiac]),
    benefactor_zodiacs: benefactors,
  };
}
