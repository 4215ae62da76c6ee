import { normalizeRecord } from "../payload";
import { buildUpsert } from "../upsert";

const SEEN_AT = new Date("2026-03-01T12:00:00.000Z");

describe("buildUpsert", () => {
  test("required fields only: writes site_id and last_seen_ts, leaves optional columns out", () => {
    const heartbeat = normalizeRecord({ device_id: "hvac-001", site_id: "A" });

    const statement = buildUpsert(heartbeat, SEEN_AT);

    expect(statement.text).toBe(
      [
        "INSERT INTO device_state (device_id, site_id, last_seen_ts)",
        "VALUES ($1, $2, $3)",
        "ON CONFLICT (device_id) DO UPDATE SET site_id = EXCLUDED.site_id, last_seen_ts = EXCLUDED.last_seen_ts, updated_at = now()",
      ].join("\n"),
    );
    expect(statement.params).toEqual(["hvac-001", "A", SEEN_AT]);
  });

  test("present optional fields are inserted and updated in column order", () => {
    const heartbeat = normalizeRecord({
      device_id: "hvac-002",
      site_id: "B",
      cpu_pct: 41.5,
      status: "degraded",
    });

    const statement = buildUpsert(heartbeat, SEEN_AT);

    expect(statement.columns).toEqual([
      "device_id",
      "site_id",
      "last_seen_ts",
      "status",
      "cpu_pct",
    ]);
    expect(statement.text).toBe(
      [
        "INSERT INTO device_state (device_id, site_id, last_seen_ts, status, cpu_pct)",
        "VALUES ($1, $2, $3, $4, $5)",
        "ON CONFLICT (device_id) DO UPDATE SET site_id = EXCLUDED.site_id, last_seen_ts = EXCLUDED.last_seen_ts, status = EXCLUDED.status, cpu_pct = EXCLUDED.cpu_pct, updated_at = now()",
      ].join("\n"),
    );
    expect(statement.params).toEqual(["hvac-002", "B", SEEN_AT, "degraded", 41.5]);
  });

  test("all optional fields produce ten parameters", () => {
    const heartbeat = normalizeRecord({
      device_id: "hvac-003",
      site_id: "C",
      status: "ready",
      agent_version: "1.2.3",
      cpu_pct: 12.5,
      disk_free_gb: 80.25,
      queue_depth: 4,
      poll_interval_s: 30,
      last_upload_ts: "2026-03-01T11:59:00Z",
    });

    const statement = buildUpsert(heartbeat, SEEN_AT);

    expect(statement.params).toEqual([
      "hvac-003",
      "C",
      SEEN_AT,
      "ready",
      "1.2.3",
      12.5,
      80.25,
      4,
      30,
      "2026-03-01T11:59:00Z",
    ]);
    expect(statement.text.split("\n")[1]).toBe(
      "VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)",
    );
  });

  test("last_upload_ts is sent as the reported text, keeping microseconds", () => {
    const heartbeat = normalizeRecord({
      device_id: "hvac-006",
      site_id: "F",
      last_upload_ts: "2026-03-01T11:59:00.123456Z",
    });

    const statement = buildUpsert(heartbeat, SEEN_AT);

    expect(statement.params[3]).toBe("2026-03-01T11:59:00.123456Z");
  });

  test("null optional fields are treated as absent", () => {
    const heartbeat = normalizeRecord({
      device_id: "hvac-004",
      site_id: "D",
      agent_version: null,
      queue_depth: 0,
    });

    const statement = buildUpsert(heartbeat, SEEN_AT);

    expect(statement.columns).toEqual(["device_id", "site_id", "last_seen_ts", "queue_depth"]);
    expect(statement.params).toEqual(["hvac-004", "D", SEEN_AT, 0]);
  });

  test("never assigns device_id in the conflict clause", () => {
    const heartbeat = normalizeRecord({ device_id: "hvac-005", site_id: "E" });

    const [, , conflict] = buildUpsert(heartbeat, SEEN_AT).text.split("\n");

    expect(conflict).not.toContain("device_id =");
  });
});
