import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { analysisLog, getLogLevel, setLogLevel } from "../analysisLog.js";

let initial = getLogLevel();

beforeEach(() => {
  initial = getLogLevel();
  vi.useFakeTimers();
  vi.setSystemTime(new Date("2024-05-01T00:00:00.000Z"));
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  setLogLevel(initial);
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe("analysisLog", () => {
  it("writes one JSON line with timestamp and level", () => {
    setLogLevel("info");
    analysisLog({ event: "analysis.started", subject: "test-subject" });

    expect(console.log).toHaveBeenCalledWith(
      '{"timestamp":"2024-05-01T00:00:00.000Z","event":"analysis.started","subject":"test-subject","level":"info"}'
    );
  });

  it("routes warn and error to stderr", () => {
    setLogLevel("info");
    analysisLog({ event: "rules.empty", level: "warn", category: "zodiac_relations" });

    expect(console.error).toHaveBeenCalledTimes(1);
    expect(console.log).not.toHaveBeenCalled();
  });

  it("drops entries below the minimum level", () => {
    setLogLevel("warn");
    analysisLog({ event: "rules.loaded", level: "debug", category: "ten_god_traits" });
    analysisLog({ event: "report.started" });

    expect(console.log).not.toHaveBeenCalled();
    expect(console.error).not.toHaveBeenCalled();
  });
});
