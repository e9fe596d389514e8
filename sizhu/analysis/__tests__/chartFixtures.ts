import { buildPillar } from "../../../calendar/computeFourPillars.js";
import { FourPillarChartSchema, type FourPillarChart } from "../../../calendar/schemas/fourPillarChart.schema.js";
import { branchIndex, stemIndex, type Branch, type Stem } from "../../../calendar/stemsBranches.js";


type PillarSpec = readonly [Stem, Branch];

/** Build a chart directly from four stem/branch pairs. */
export function chartOf(year: PillarSpec, month: PillarSpec, day: PillarSpec, hour: PillarSpec): FourPillarChart {
  const pillar = ([stem, branch]: PillarSpec) => buildPillar(stemIndex(stem), branchIndex(branch));
  const dayPillar = pillar(day);
  return FourPillarChartSchema.parse({
    year: pillar(year),
    month: pillar(month),
    day: dayPillar,
    hour: pillar(hour),
    day_master: {
      stem: dayPillar.stem,
      element: dayPillar.stem_element,
      polarity: dayPillar.stem_polarity,
    },
  });
}

/** 庚午 戊寅 丙寅 戊子, day master 丙: strong fire rooted in 午. */
export function sampleChart(): FourPillarChart {
  return chartOf(["庚", "午"], ["戊", "寅"], ["丙", "寅"], ["戊", "子"]);
}
