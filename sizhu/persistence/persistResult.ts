import { analysisLog } from "../../logging/analysisLog.js";
import type { AnalysisRecord, PersistenceWriter, PersistOutcome } from "./types.js";

/**
 * Runs every writer in order. A failing writer is logged and reported; it
 * does not stop the others.
 */
export async function persistResult(
  writers: readonly PersistenceWriter[],
  record: AnalysisRecord
): Promise<PersistOutcome[]> {
  const outcomes: PersistOutcome[] = [];
  const subject = record.analysis.subject.name ?? undefined;

  for (const writer of writers) {
    try {
      const location = await writer.write(record);
      analysisLog({ event: "persistence.succeeded", subject, writer: writer.name, location });
      outcomes.push({ status: "ok", writer: writer.name, location });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      analysisLog({
        event: "persistence.failed",
        level: "error",
        subject,
        writer: writer.name,
        error_message: message,
      });
      outcomes.push({ status: "error", writer: writer.name, message });
    }
  }

  return outcomes;
}
