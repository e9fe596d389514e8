import { beforeEach, describe, expect, it, vi } from "vitest";
import { buildWriters, runAnalysis } from "../run-analysis.js";
import { AppConfigSchema } from "../sizhu/config/loadConfig.js";
import type { PersistenceWriter } from "../sizhu/persistence/types.js";

const config = AppConfigSchema.parse({
  user: {
    name: "test-subject",
    gender: "male",
    birth: { year: 1990, month: 1, day: 1, hour: 0 },
  },
  output: { supabase: { enabled: true } },
});

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

describe("buildWriters", () => {
  it("enables local JSON and Supabase per config", () => {
    expect(buildWriters(config).map((w) => w.name)).toEqual(["local-json", "supabase"]);
  });
});

describe("runAnalysis", () => {
  it("analyzes, skips the report and hands the record to every writer", async () => {
    const written: string[] = [];
    const writer: PersistenceWriter = {
      name: "memory",
      write: async (record) => {
        written.push(record.analysis.chart.day.stem);
        return "memory://1";
      },
    };

    const { analysis, report, persisted } = await runAnalysis({ config, writers: [writer] });

    expect(analysis.pattern.type).toBe("indirect_wealth_pattern");
    expect(report).toBeNull();
    expect(written).toEqual(["丙"]);
    expect(persisted).toEqual([{ status: "ok", writer: "memory", location: "memory://1" }]);
  });

  it("writes nothing when saving is off", async () => {
    const write = vi.fn(async () => "unused");

    const { persisted } = await runAnalysis({ config, save: false, writers: [{ name: "spy", write }] });

    expect(persisted).toEqual([]);
    expect(write).not.toHaveBeenCalled();
  });

  it("logs and rethrows analysis failures", async () => {
    const invalid = AppConfigSchema.parse({
      user: { name: "test-subject", gender: "male", birth: { year: 1990, month: 2, day: 31, hour: 0 } },
    });

    await expect(runAnalysis({ config: invalid, save: false })).rejects.toThrow("day");
    const logged = vi.mocked(console.error).mock.calls.map(([line]) => JSON.parse(String(line)));
    expect(logged[0]).toMatchObject({ event: "analysis.failed", error_code: "InvalidBirthInputError" });
  });
});
