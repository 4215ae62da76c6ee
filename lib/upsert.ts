// lib/upsert.ts
import { DeviceHeartbeat, OPTIONAL_COLUMNS, SqlParam } from "./types";

export const DEVICE_STATE_TABLE = "device_state";

export interface UpsertStatement {
  text: string;
  params: SqlParam[];
  columns: string[];
}

/**
 * Build the parameterized UPSERT for one heartbeat.
 *
 * Only columns present in the heartbeat appear in the INSERT list and in the
 * conflict SET clause, so an update never touches a column the device did
 * not report. `updated_at` is left to the column default on insert.
 */
export function buildUpsert(heartbeat: DeviceHeartbeat, seenAt: Date): UpsertStatement {
  const columns = ["device_id", "site_id", "last_seen_ts"];
  const params: SqlParam[] = [heartbeat.device_id, heartbeat.site_id, seenAt];

  for (const column of OPTIONAL_COLUMNS) {
    const field = heartbeat.fields[column];
    if (field.present) {
      columns.push(column);
      params.push(field.value);
    }
  }

  const placeholders = params.map((_, i) => `$${i + 1}`);
  const assignments = columns
    .filter((column) => column !== "device_id")
    .map((column) => `${column} = EXCLUDED.${column}`);
  assignments.push("updated_at = now()");

  const text = [
    `INSERT INTO ${DEVICE_STATE_TABLE} (${columns.join(", ")})`,
    `VALUES (${placeholders.join(", ")})`,
    `ON CONFLICT (device_id) DO UPDATE SET ${assignments.join(", ")}`,
  ].join("\n");

  return { text, params, columns };
}
