// lib/payload.ts
import { ConstraintError, HeartbeatError, ValidationError } from "./errors";
import {
  batchEnvelopeSchema,
  deviceRecordSchema,
  formatIssues,
} from "./schema";
import {
  DEVICE_STATUSES,
  DeviceHeartbeat,
  DeviceStatus,
  Presence,
} from "./types";

export type NormalizedEntry =
  | { index: number; ok: true; heartbeat: DeviceHeartbeat }
  | { index: number; ok: false; device_id: string | null; error: HeartbeatError };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isDeviceStatus(value: string): value is DeviceStatus {
  return DEVICE_STATUSES.some((status) => status === value);
}

function presence<T>(value: T | null | undefined): Presence<T> {
  return value === null || value === undefined
    ? { present: false }
    : { present: true, value };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ValidationError("Request body is not valid JSON", "VALIDATION_JSON", {
      reason: err instanceof Error ? err.message : String(err),
    });
  }
}

/**
 * Unwrap the invocation event into the JSON payload.
 *
 * Direct invocations and IoT rules hand us an object (or a JSON string);
 * HTTP API / Function URL events carry the payload as a string `body`,
 * possibly base64-encoded.
 */
export function decodeEvent(event: unknown): unknown {
  if (typeof event === "string") return parseJson(event);

  if (isRecord(event) && isRecord(event.requestContext)) {
    const body = event.body;
    if (typeof body !== "string" || body.length === 0) {
      throw new ValidationError("Request body is empty", "VALIDATION_PAYLOAD");
    }
    const text =
      event.isBase64Encoded === true
        ? Buffer.from(body, "base64").toString("utf8")
        : body;
    return parseJson(text);
  }

  return event;
}

/**
 * Split a payload into raw device records: `{ devices: [...] }` for a
 * batch, otherwise the payload itself is the single record.
 */
export function extractRecords(payload: unknown): unknown[] {
  if (!isRecord(payload)) {
    throw new ValidationError("Payload must be a JSON object", "VALIDATION_PAYLOAD");
  }

  if (!("devices" in payload)) return [payload];

  const parsed = batchEnvelopeSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ValidationError(formatIssues(parsed.error), "VALIDATION_PAYLOAD", {
      issues: parsed.error.issues,
    });
  }
  return parsed.data.devices;
}

/** Best-effort device_id for reporting a record that failed validation. */
export function peekDeviceId(raw: unknown): string | null {
  if (!isRecord(raw) || typeof raw.device_id !== "string") return null;
  const id = raw.device_id.trim();
  return id.length > 0 ? id : null;
}

export function normalizeRecord(raw: unknown): DeviceHeartbeat {
  const parsed = deviceRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(formatIssues(parsed.error), "VALIDATION_RECORD", {
      issues: parsed.error.issues,
    });
  }
  const record = parsed.data;

  let status: DeviceStatus | null = null;
  if (record.status !== null && record.status !== undefined) {
    if (!isDeviceStatus(record.status)) {
      throw new ConstraintError(
        `status must be one of ${DEVICE_STATUSES.join(", ")}`,
        "CONSTRAINT_STATUS",
        { status: record.status },
      );
    }
    status = record.status;
  }

  return {
    device_id: record.device_id,
    site_id: record.site_id,
    fields: {
      status: presence(status),
      agent_version: presence(record.agent_version),
      cpu_pct: presence(record.cpu_pct),
      disk_free_gb: presence(record.disk_free_gb),
      queue_depth: presence(record.queue_depth),
      poll_interval_s: presence(record.poll_interval_s),
      last_upload_ts: presence(record.last_upload_ts),
    },
  };
}

/** Validate every record independently; failures are kept, not thrown. */
export function normalizeRecords(records: unknown[]): NormalizedEntry[] {
  return records.map((raw, index): NormalizedEntry => {
    try {
      return { index, ok: true, heartbeat: normalizeRecord(raw) };
    } catch (err) {
      if (err instanceof HeartbeatError) {
        return { index, ok: false, device_id: peekDeviceId(raw), error: err };
      }
      throw err;
    }
  });
}
