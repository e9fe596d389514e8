/**
 * Layer 1: spirit markers.
 *
 * Each marker is an independent table lookup: derive target branches from a
 * key (day stem or year branch), then scan the pillars year → month → day →
 * hour. Auspicious tables come from rule data; inauspicious ones are fixed
 * policy.
 */

import {
  PILLAR_ORDER,
  type FourPillarChart,
  type PillarPosition,
} from "../../../calendar/schemas/fourPillarChart.schema.js";
import type { Branch } from "../../../calendar/stemsBranches.js";
import type { SpiritMarkerTables } from "../../rules/rules.schemas.js";
import { INAUSPICIOUS_MARKER_TABLES } from "../policy/analysisPolicy.v1.js";

export type SpiritMarkerName =
  | "tianyi_noble"
  | "wenchang_noble"
  | "red_luan"
  | "heavenly_joy"
  | "peach_blossom"
  | "goat_blade"
  | "robbery_sha"
  | "calamity_sha"
  | "lonely_star"
  | "widow_star";

export type SpiritMarkerKind = "auspicious" | "inauspicious";

export interface SpiritMarker {
  name: SpiritMarkerName;
  kind: SpiritMarkerKind;
  position: PillarPosition;
  branch: Branch;
  /** Which key produced the match, e.g. "day_stem" or "year_branch". */
  keyed_by: "day_stem" | "year_branch" | "day_branch";
  tag: string;
}

export interface SpiritMarkerReport {
  auspicious: SpiritMarkerName[];
  inauspicious: SpiritMarkerName[];
  details: SpiritMarker[];
}

const TAGS: Record<SpiritMarkerName, string> = {
  tianyi_noble: "Help from benefactors; obstacles resolve with outside support.",
  wenchang_noble: "Scholarly aptitude; favours study and examinations.",
  red_luan: "Romance and marriage prospects.",
  heavenly_joy: "Celebrations and happy events.",
  peach_blossom: "Charm and popularity; attracts admirers.",
  goat_blade: "Forceful temperament; prone to accidents and conflict.",
  robbery_sha: "Risk of loss and unexpected expenses.",
  calamity_sha: "Exposure to illness or mishap.",
  lonely_star: "Tendency toward solitude.",
  widow_star: "Tendency toward separation in relationships.",
};

const KINDS: Record<SpiritMarkerName, SpiritMarkerKind> = {
  tianyi_noble: "auspicious",
  wenchang_noble: "auspicious",
  red_luan: "auspicious",
  heavenly_joy: "auspicious",
  peach_blossom: "auspicious",
  goat_blade: "inauspicious",
  robbery_sha: "inauspicious",
  calamity_sha: "inauspicious",
  lonely_star: "inauspicious",
  widow_star: "inauspicious",
};

const NON_YEAR_PILLARS: readonly PillarPosition[] = ["month", "day", "hour"];

interface ScanSpec {
  name: SpiritMarkerName;
  targets: readonly Branch[];
  keyedBy: SpiritMarker["keyed_by"];
  positions: readonly PillarPosition[];
  mode: "first" | "every";
}

function scan(chart: FourPillarChart, spec: ScanSpec): SpiritMarker[] {
  if (spec.targets.length === 0) return [];
  const hits: SpiritMarker[] = [];
  for (const position of spec.positions) {
    const branch = chart[position].branch;
    if (!spec.targets.includes(branch)) continue;
    hits.push({
      name: spec.name,
      kind: KINDS[spec.name],
      position,
      branch,
      keyed_by: spec.keyedBy,
      tag: TAGS[spec.name],
    });
    if (spec.mode === "first") break;
  }
  return hits;
}

function single(target: Branch | undefined): Branch[] {
  return target ? [target] : [];
}

export function evaluateSpiritMarkers(chart: FourPillarChart, tables: SpiritMarkerTables): SpiritMarkerReport {
  const dayStem = chart.day.stem;
  const yearBranch = chart.year.branch;
  const dayBranch = chart.day.branch;

  const details: SpiritMarker[] = [
    ...scan(chart, {
      name: "tianyi_noble",
      targets: tables.tianyi_noble?.[dayStem] ?? [],
      keyedBy: "day_stem",
      positions: PILLAR_ORDER,
      mode: "first",
    }),
    ...scan(chart, {
      name: "wenchang_noble",
      targets: single(tables.wenchang_noble?.[dayStem]),
      keyedBy: "day_stem",
      positions: PILLAR_ORDER,
      mode: "first",
    }),
    ...scan(chart, {
      name: "red_luan",
      targets: single(tables.red_luan?.[yearBranch]),
      keyedBy: "year_branch",
      positions: NON_YEAR_PILLARS,
      mode: "every",
    }),
    ...scan(chart, {
      name: "heavenly_joy",
      targets: single(tables.heavenly_joy?.[yearBranch]),
      keyedBy: "year_branch",
      positions: NON_YEAR_PILLARS,
      mode: "every",
    }),
  ];

  const peachByYear = scan(chart, {
    name: "peach_blossom",
    targets: single(tables.peach_blossom?.[yearBranch]),
    keyedBy: "year_branch",
    positions: PILLAR_ORDER,
    mode: "first",
  });
  details.push(
    ...(peachByYear.length > 0
      ? peachByYear
      : scan(chart, {
          name: "peach_blossom",
          targets: single(tables.peach_blossom?.[dayBranch]),
          keyedBy: "day_branch",
          positions: PILLAR_ORDER,
          mode: "first",
        }))
  );

  const fixed = INAUSPICIOUS_MARKER_TABLES;
  details.push(
    ...scan(chart, {
      name: "goat_blade",
      targets: single(fixed.goat_blade[dayStem]),
      keyedBy: "day_stem",
      positions: PILLAR_ORDER,
      mode: "first",
    }),
    ...scan(chart, {
      name: "robbery_sha",
      targets: single(fixed.robbery_sha[yearBranch]),
      keyedBy: "year_branch",
      positions: PILLAR_ORDER,
      mode: "first",
    }),
    ...scan(chart, {
      name: "calamity_sha",
      targets: single(fixed.calamity_sha[yearBranch]),
      keyedBy: "year_branch",
      positions: PILLAR_ORDER,
      mode: "first",
    }),
    ...scan(chart, {
      name: "lonely_star",
      targets: single(fixed.lonely_star[yearBranch]),
      keyedBy: "year_branch",
      positions: PILLAR_ORDER,
      mode: "first",
    }),
    ...scan(chart, {
      name: "widow_star",
      targets: single(fixed.widow_star[yearBranch]),
      keyedBy: "year_branch",
      positions: PILLAR_ORDER,
      mode: "first",
    })
  );

  const namesOf = (kind: SpiritMarkerKind) =>
    details
      .filter((marker) => marker.kind === kind)
      .map((marker) => marker.name)
      .filter((name, index, all) => all.indexOf(name) === index);

  return {
    auspicious: namesOf("auspicious"),
    inauspicious: namesOf("inauspicious"),
    details,
  };
}
