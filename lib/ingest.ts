// lib/ingest.ts
import type { Logger } from "pino";
import { DeviceStateStore } from "./device-state-store";
import { ConstraintError, HeartbeatError } from "./errors";
import { NormalizedEntry } from "./payload";
import { RecordResult } from "./types";

export interface IngestSummary {
  updated: number;
  failed: number;
}

function failedResult(
  index: number,
  deviceId: string | null,
  error: HeartbeatError,
): RecordResult {
  return {
    index,
    device_id: deviceId,
    status: "failed",
    error: { code: error.code, message: error.message },
  };
}

/** Results for entries that never reach the database. */
export function rejectedResults(entries: NormalizedEntry[]): RecordResult[] {
  return entries.flatMap((entry) =>
    entry.ok ? [] : [failedResult(entry.index, entry.device_id, entry.error)],
  );
}

/**
 * Write every valid entry inside one store transaction and report one
 * result per entry, in request order.
 *
 * Validation and constraint failures stay with their record. Anything else
 * (connectivity, storage) propagates and aborts the transaction.
 */
export async function writeHeartbeats(
  store: DeviceStateStore,
  entries: NormalizedEntry[],
  seenAt: Date,
  log: Logger,
): Promise<RecordResult[]> {
  const results: RecordResult[] = [];

  await store.transaction(async (writer) => {
    for (const entry of entries) {
      if (!entry.ok) {
        log.warn(
          { index: entry.index, device_id: entry.device_id, code: entry.error.code },
          "Rejected device record",
        );
        results.push(failedResult(entry.index, entry.device_id, entry.error));
        continue;
      }

      const { device_id } = entry.heartbeat;
      try {
        await writer.upsert(entry.heartbeat, seenAt);
      } catch (err) {
        if (!(err instanceof ConstraintError)) throw err;
        log.warn(
          { index: entry.index, device_id, code: err.code, context: err.context },
          "Device record violated a constraint",
        );
        results.push(failedResult(entry.index, device_id, err));
        continue;
      }

      log.info({ device_id }, "Updated heartbeat");
      results.push({ index: entry.index, device_id, status: "updated" });
    }
  });

  return results;
}

export function summarize(results: RecordResult[]): IngestSummary {
  const updated = results.filter((r) => r.status === "updated").length;
  return { updated, failed: results.length - updated };
}
