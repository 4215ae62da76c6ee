// lib/types.ts

export const DEVICE_STATUSES = ["ready", "degraded", "error"] as const;
export type DeviceStatus = (typeof DEVICE_STATUSES)[number];

/** Value types of the optional device_state columns a heartbeat may carry. */
export interface OptionalColumnValues {
  status: DeviceStatus;
  agent_version: string;
  cpu_pct: number;
  disk_free_gb: number;
  queue_depth: number;
  poll_interval_s: number;
  /** Validated ISO-8601 text, passed through so sub-millisecond precision survives. */
  last_upload_ts: string;
}

export type OptionalColumn = keyof OptionalColumnValues;

// Column order of the generated statement.
export const OPTIONAL_COLUMNS: readonly OptionalColumn[] = [
  "status",
  "agent_version",
  "cpu_pct",
  "disk_free_gb",
  "queue_depth",
  "poll_interval_s",
  "last_upload_ts",
];

export type Presence<T> =
  | { readonly present: true; readonly value: T }
  | { readonly present: false };

export type FieldPresenceMap = {
  readonly [K in OptionalColumn]: Presence<OptionalColumnValues[K]>;
};

/**
 * One normalized heartbeat. Optional columns are kept as an explicit
 * presence map so an absent field is never confused with a stored null.
 */
export interface DeviceHeartbeat {
  device_id: string;
  site_id: string;
  fields: FieldPresenceMap;
}

export type SqlParam = string | number | Date;

export interface RecordResult {
  index: number;
  device_id: string | null;
  status: "updated" | "failed";
  error?: { code: string; message: string };
}
