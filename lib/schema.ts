// lib/schema.ts
import { z } from "zod";

/** Upper bound on records per invocation. */
export const MAX_DEVICES_PER_REQUEST = 500;

// An explicit null reads as missing, same as an absent key.
const requiredId = z.preprocess(
  (value) => (value === null ? undefined : value),
  z
    .string({ required_error: "is required", invalid_type_error: "must be a string" })
    .trim()
    .min(1, "is required"),
);

const optionalNumber = z
  .number({ invalid_type_error: "must be a number" })
  .finite("must be a finite number")
  .nullish();

const optionalInteger = z
  .number({ invalid_type_error: "must be a number" })
  .int("must be an integer")
  .nullish();

/**
 * Shape of one device record. `status` is only type-checked here; membership
 * in the allowed set is a constraint check done during normalization.
 */
export const deviceRecordSchema = z.object(
  {
    device_id: requiredId,
    site_id: requiredId,
    status: z.string({ invalid_type_error: "must be a string" }).nullish(),
    agent_version: z.string({ invalid_type_error: "must be a string" }).nullish(),
    cpu_pct: optionalNumber,
    disk_free_gb: optionalNumber,
    queue_depth: optionalInteger,
    poll_interval_s: optionalInteger,
    last_upload_ts: z
      .string({ invalid_type_error: "must be a string" })
      .datetime({ offset: true, message: "must be an ISO-8601 timestamp" })
      .nullish(),
  },
  { invalid_type_error: "device record must be an object" },
);

export type DeviceRecordInput = z.infer<typeof deviceRecordSchema>;

export const batchEnvelopeSchema = z.object({
  devices: z
    .array(z.unknown(), { invalid_type_error: "must be an array" })
    .min(1, "must not be empty")
    .max(
      MAX_DEVICES_PER_REQUEST,
      `must not exceed ${MAX_DEVICES_PER_REQUEST} entries`,
    ),
});

/** Flatten zod issues into "field message" pairs. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")} ${issue.message}`
        : issue.message,
    )
    .join("; ");
}
