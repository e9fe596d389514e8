/**
 * Sexagenary symbol tables.
 *
 * Fixed lookup data for the 10 stems, 12 branches and the five elements.
 * Everything here is pure and index-based; the calendar and every analyzer
 * read from these tables and never redefine them.
 */

export const STEMS = ["甲", "乙", "丙", "丁", "戊", "己", "庚", "辛", "壬", "癸"] as const;

export const BRANCHES = [
  "子",
  "丑",
  "寅",
  "卯",
  "辰",
  "巳",
  "午",
  "未",
  "申",
  "酉",
  "戌",
  "亥",
] as const;

export const ELEMENTS = ["wood", "fire", "earth", "metal", "water"] as const;

export type Stem = (typeof STEMS)[number];
export type Branch = (typeof BRANCHES)[number];
export type Element = (typeof ELEMENTS)[number];
export type Polarity = "yang" | "yin";

const STEM_ELEMENTS: Record<Stem, Element> = {
  甲: "wood",
  乙: "wood",
  丙: "fire",
  丁: "fire",
  戊: "earth",
  己: "earth",
  庚: "metal",
  辛: "metal",
  壬: "water",
  癸: "water",
};

const BRANCH_ELEMENTS: Record<Branch, Element> = {
  子: "water",
  丑: "earth",
  寅: "wood",
  卯: "wood",
  辰: "earth",
  巳: "fire",
  午: "fire",
  未: "earth",
  申: "metal",
  酉: "metal",
  戌: "earth",
  亥: "water",
};

/** Main qi first. */
const HIDDEN_STEMS: Record<Branch, readonly Stem[]> = {
  子: ["癸"],
  丑: ["己", "癸", "辛"],
  寅: ["甲", "丙", "戊"],
  卯: ["乙"],
  辰: ["戊", "乙", "癸"],
  巳: ["丙", "戊", "庚"],
  午: ["丁", "己"],
  未: ["己", "丁", "乙"],
  申: ["庚", "壬", "戊"],
  酉: ["辛"],
  戌: ["戊", "辛", "丁"],
  亥: ["壬", "甲"],
};

export const ZODIAC_ANIMALS = [
  "rat",
  "ox",
  "tiger",
  "rabbit",
  "dragon",
  "snake",
  "horse",
  "goat",
  "monkey",
  "rooster",
  "dog",
  "pig",
] as const;

export type ZodiacAnimal = (typeof ZODIAC_ANIMALS)[number];

/** Generation cycle: each element feeds the next. */
const GENERATES: Record<Element, Element> = {
  wood: "fire",
  fire: "earth",
  earth: "metal",
  metal: "water",
  water: "wood",
};

/** Destruction cycle: each element controls its target. */
const DESTROYS: Record<Element, Element> = {
  wood: "earth",
  earth: "water",
  water: "fire",
  fire: "metal",
  metal: "wood",
};

const GENERATOR_OF: Record<Element, Element> = {
  fire: "wood",
  earth: "fire",
  metal: "earth",
  water: "metal",
  wood: "water",
};

const DESTROYER_OF: Record<Element, Element> = {
  earth: "wood",
  water: "earth",
  fire: "water",
  metal: "fire",
  wood: "metal",
};

/** Non-negative modulo; JS `%` keeps the sign of the dividend. */
export function mod(n: number, m: number): number {
  return ((n % m) + m) % m;
}

export function stemAt(index: number): Stem {
  return STEMS[mod(index, 10)];
}

export function branchAt(index: number): Branch {
  return BRANCHES[mod(index, 12)];
}

export function stemIndex(stem: Stem): number {
  return STEMS.indexOf(stem);
}

export function branchIndex(branch: Branch): number {
  return BRANCHES.indexOf(branch);
}

export function isStem(value: string): value is Stem {
  return STEMS.some((stem) => stem === value);
}

export function isBranch(value: string): value is Branch {
  return BRANCHES.some((branch) => branch === value);
}

export function stemElement(stem: Stem): Element {
  return STEM_ELEMENTS[stem];
}

export function branchElement(branch: Branch): Element {
  return BRANCH_ELEMENTS[branch];
}

export function stemPolarity(stem: Stem): Polarity {
  return stemIndex(stem) % 2 === 0 ? "yang" : "yin";
}

export function branchPolarity(branch: Branch): Polarity {
  return branchIndex(branch) % 2 === 0 ? "yang" : "yin";
}

export function hiddenStems(branch: Branch): readonly Stem[] {
  return HIDDEN_STEMS[branch];
}

export function zodiacAnimal(branch: Branch): ZodiacAnimal {
  return ZODIAC_ANIMALS[branchIndex(branch)];
}

/** Six-clash partner: the branch directly opposite. */
export function clashPartner(branch: Branch): Branch {
  return branchAt(branchIndex(branch) + 6);
}

/** The element `element` feeds. */
export function generates(element: Element): Element {
  return GENERATES[element];
}

/** The element `element` controls. */
export function destroys(element: Element): Element {
  return DESTROYS[element];
}

/** The element that generates `element`. */
export function generatorOf(element: Element): Element {
  return GENERATOR_OF[element];
}

/** The element that destroys `element`. */
export function destroyerOf(element: Element): Element {
  return DESTROYER_OF[element];
}
