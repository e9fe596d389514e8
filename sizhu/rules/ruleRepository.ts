import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { analysisLog } from "../../logging/analysisLog.js";
import {
  emptyRuleTables,
  RULE_SCHEMAS,
  type RuleCategory,
  type RuleTables,
} from "./rules.schemas.js";

/**
 * Rule table repository.
 *
 * Construct one per process and pass it into every analysis. Each category
 * is read from `<rulesDir>/<category>.json` at most once; later lookups
 * return the cached outcome, including a cached failure.
 */

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
export const DEFAULT_RULES_DIR = path.resolve(__dirname, "tables");

export type RuleFailureReason = "read_error" | "invalid_json" | "schema_mismatch";

export type RuleLoadResult<T> =
  | { status: "loaded"; table: T }
  | { status: "empty"; reason: "source_missing" | "empty_table"; table: T }
  | { status: "failed"; reason: RuleFailureReason; message: string; table: T };

export type RuleLoadStatus =
  | { status: "loaded" }
  | { status: "empty"; reason: "source_missing" | "empty_table" }
  | { status: "failed"; reason: RuleFailureReason; message: string };

type RuleCache = { [K in RuleCategory]?: RuleLoadResult<RuleTables[K]> };

export interface RuleRepositoryOptions {
  rulesDir?: string;
}

export class RuleRepository {
  readonly rulesDir: string;
  private readonly cache: RuleCache = {};
  private readCount = 0;

  constructor(options: RuleRepositoryOptions = {}) {
    this.rulesDir = options.rulesDir ?? DEFAULT_RULES_DIR;
  }

  /** Load (or return the cached) outcome for a category. Never throws. */
  load<K extends RuleCategory>(category: K): RuleLoadResult<RuleTables[K]> {
    const cached: RuleCache[K] = this.cache[category];
    if (cached) return cached;

    const result = this.readCategory(category);
    const cache: { [P in K]?: RuleLoadResult<RuleTables[P]> } = this.cache;
    cache[category] = result;
    this.logOutcome(category, result);
    return result;
  }

  /** The table for a category; empty when it is missing or failed to load. */
  table<K extends RuleCategory>(category: K): RuleTables[K] {
    return this.load(category).table;
  }

  /** Load every category and report the outcome per category. */
  snapshot(): { tables: RuleTables; status: Record<RuleCategory, RuleLoadStatus> } {
    const tables: RuleTables = {
      ten_god_traits: this.table("ten_god_traits"),
      pattern_careers: this.table("pattern_careers"),
      spirit_markers: this.table("spirit_markers"),
      personality_scoring: this.table("personality_scoring"),
      zodiac_relations: this.table("zodiac_relations"),
    };
    const status: Record<RuleCategory, RuleLoadStatus> = {
      ten_god_traits: toStatus(this.load("ten_god_traits")),
      pattern_careers: toStatus(this.load("pattern_careers")),
      spirit_markers: toStatus(this.load("spirit_markers")),
      personality_scoring: toStatus(this.load("personality_scoring")),
      zodiac_relations: toStatus(this.load("zodiac_relations")),
    };
    return { tables, status };
  }

  /** Number of files actually read from disk. */
  get diskReads(): number {
    return this.readCount;
  }

  private readCategory<K extends RuleCategory>(category: K): RuleLoadResult<RuleTables[K]> {
    const empty = emptyRuleTables()[category];
    const fullPath = path.join(this.rulesDir, `${category}.json`);

    if (!fs.existsSync(fullPath)) {
      return { status: "empty", reason: "source_missing", table: empty };
    }

    this.readCount += 1;
    let raw: string;
    try {
      raw = fs.readFileSync(fullPath, "utf-8");
    } catch (err) {
      return {
        status: "failed",
        reason: "read_error",
        message: `Failed to read ${category}.json: ${err instanceof Error ? err.message : String(err)}`,
        table: empty,
      };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      return {
        status: "failed",
        reason: "invalid_json",
        message: `Failed to parse ${category}.json: ${err instanceof Error ? err.message : String(err)}`,
        table: empty,
      };
    }

    const result = RULE_SCHEMAS[category].safeParse(parsed);
    if (!result.success) {
      return {
        status: "failed",
        reason: "schema_mismatch",
        message: `Rule schema validation failed for ${category}.json: ${result.error.message}`,
        table: empty,
      };
    }

    if (isEmptyTable(result.data)) {
      return { status: "empty", reason: "empty_table", table: result.data };
    }
    return { status: "loaded", table: result.data };
  }

  private logOutcome(category: RuleCategory, result: RuleLoadResult<unknown>): void {
    if (result.status === "loaded") {
      analysisLog({ event: "rules.loaded", level: "debug", category });
    } else if (result.status === "empty") {
      analysisLog({ event: "rules.empty", level: "warn", category, reason: result.reason });
    } else {
      analysisLog({
        event: "rules.failed",
        level: "error",
        category,
        error_code: result.reason,
        error_message: result.message,
      });
    }
  }
}

function toStatus(result: RuleLoadResult<unknown>): RuleLoadStatus {
  switch (result.status) {
    case "loaded":
      return { status: "loaded" };
    case "empty":
      return { status: "empty", reason: result.reason };
    case "failed":
      return { status: "failed", reason: result.reason, message: result.message };
  }
}

function isEmptyTable(value: unknown): boolean {
  if (value === null || typeof value !== "object") return false;
  return Object.values(value).every(
    (entry) => entry === undefined || (typeof entry === "object" && entry !== null && Object.keys(entry).length === 0)
  );
}
