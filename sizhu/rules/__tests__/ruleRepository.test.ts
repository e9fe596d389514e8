import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RuleRepository } from "../ruleRepository.js";
import { RULE_CATEGORIES } from "../rules.schemas.js";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "sizhu-rules-"));
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

function writeTable(name: string, body: string) {
  fs.writeFileSync(path.join(dir, `${name}.json`), body, "utf-8");
}

describe("RuleRepository", () => {
  it("loads every bundled table", () => {
    const { status, tables } = new RuleRepository().snapshot();

    for (const category of RULE_CATEGORIES) {
      expect(status[category]).toEqual({ status: "loaded" });
    }
    expect(tables.ten_god_traits.companion?.positive).toContain("independent");
    expect(tables.zodiac_relations.six_harmony?.rat).toBe("ox");
  });

  it("reports a missing file as empty without reading disk", () => {
    const repo = new RuleRepository({ rulesDir: dir });

    expect(repo.load("pattern_careers")).toEqual({ status: "empty", reason: "source_missing", table: {} });
    expect(repo.diskReads).toBe(0);
  });

  it("distinguishes an empty table from a missing one", () => {
    writeTable("zodiac_relations", "{}");
    const repo = new RuleRepository({ rulesDir: dir });

    expect(repo.load("zodiac_relations")).toEqual({ status: "empty", reason: "empty_table", table: {} });
  });

  it("fails on malformed JSON and serves an empty table", () => {
    writeTable("ten_god_traits", "{ not json");
    const repo = new RuleRepository({ rulesDir: dir });
    const result = repo.load("ten_god_traits");

    expect(result.status).toBe("failed");
    if (result.status === "failed") expect(result.reason).toBe("invalid_json");
    expect(repo.table("ten_god_traits")).toEqual({});
  });

  it("fails without throwing when the table path cannot be read", () => {
    fs.mkdirSync(path.join(dir, "spirit_markers.json"));
    const repo = new RuleRepository({ rulesDir: dir });
    const result = repo.load("spirit_markers");

    expect(result.status).toBe("failed");
    if (result.status === "failed") {
      expect(result.reason).toBe("read_error");
      expect(result.message.startsWith("Failed to read spirit_markers.json: ")).toBe(true);
    }
    expect(repo.table("spirit_markers")).toEqual({});
    expect(repo.diskReads).toBe(1);
  });

  it("fails when the table does not match its schema", () => {
    writeTable("personality_scoring", JSON.stringify({ leadership: [{ predicate: "day_master_strong", score_range: [9, 2] }] }));
    const result = new RuleRepository({ rulesDir: dir }).load("personality_scoring");

    expect(result.status).toBe("failed");
    if (result.status === "failed") expect(result.reason).toBe("schema_mismatch");
  });

  it("reads each file at most once, including failures", () => {
    writeTable("pattern_careers", JSON.stringify({ ordinary: { suitable: ["general management"] } }));
    writeTable("ten_god_traits", "oops");
    const repo = new RuleRepository({ rulesDir: dir });

    repo.load("pattern_careers");
    repo.load("pattern_careers");
    repo.load("ten_god_traits");
    repo.snapshot();

    expect(repo.diskReads).toBe(2);
    expect(repo.table("pattern_careers")).toEqual({ ordinary: { suitable: ["general management"] } });
  });

  it("logs a failure once as an error event", () => {
    writeTable("spirit_markers", "[");
    const repo = new RuleRepository({ rulesDir: dir });
    repo.load("spirit_markers");
    repo.load("spirit_markers");

    const errors = vi.mocked(console.error).mock.calls.map(([line]) => JSON.parse(String(line)));
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({
      event: "rules.failed",
      level: "error",
      category: "spirit_markers",
      error_code: "invalid_json",
    });
  });
});
