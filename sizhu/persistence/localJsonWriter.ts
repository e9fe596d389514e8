import fs from "node:fs/promises";
import path from "node:path";
import { PersistenceError } from "../errors.js";
import type { AnalysisRecord, PersistenceWriter } from "./types.js";

export const RESULT_FORMAT_VERSION = "1.0.0";

export type LocalJsonWriterOptions = {
  dir: string;
  pretty: boolean;
};

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** `<name>_<YYYYMMDD>` from the subject and the clock birth date. */
export function resultDirName(record: AnalysisRecord): string {
  const { clock } = record.analysis.birth_moment;
  const name = (record.analysis.subject.name ?? "anonymous").replace(/[\\/:*?"<>|\s]+/g, "_");
  return `${name}_${clock.year}${pad2(clock.month)}${pad2(clock.day)}`;
}

/**
 * Writes one result.json per subject and birth date. A rerun overwrites the
 * previous file.
 */
export class LocalJsonWriter implements PersistenceWriter {
  name = "local-json";

  constructor(private readonly options: LocalJsonWriterOptions) {}

  async write(record: AnalysisRecord): Promise<string> {
    const dir = path.join(this.options.dir, resultDirName(record));
    const filePath = path.join(dir, "result.json");

    const payload = {
      ...record.analysis,
      report: record.report,
      metadata: {
        version: RESULT_FORMAT_VERSION,
        timestamp: record.generated_at,
        analysis_policy_version: record.analysis.analysis_policy_version,
      },
    };

    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(
        filePath,
        this.options.pretty ? JSON.stringify(payload, null, 2) : JSON.stringify(payload),
        "utf-8"
      );
    } catch (err) {
      throw new PersistenceError(this.name, err instanceof Error ? err.message : String(err));
    }
    return filePath;
  }
}
