// lib/device-state-store.ts
import type { Sql } from "postgres";
import { classifyDbError } from "./db";
import { DeviceHeartbeat } from "./types";
import { buildUpsert } from "./upsert";

export interface DeviceStateWriter {
  /** Upsert one heartbeat. A rejected record leaves the rest of the transaction intact. */
  upsert(heartbeat: DeviceHeartbeat, seenAt: Date): Promise<void>;
}

export interface DeviceStateStore {
  /** Run `work` in one transaction, committed once when it resolves. */
  transaction(work: (writer: DeviceStateWriter) => Promise<void>): Promise<void>;
  close(): Promise<void>;
}

/**
 * device_state store over postgres.js. Every upsert runs in its own
 * SAVEPOINT, so a constraint violation rolls back only that record.
 * Errors leave as classified HeartbeatErrors.
 */
export function createPostgresStore(sql: Sql): DeviceStateStore {
  return {
    async transaction(work) {
      try {
        await sql.begin(async (tx) => {
          await work({
            async upsert(heartbeat, seenAt) {
              const statement = buildUpsert(heartbeat, seenAt);
              try {
                await tx.savepoint(async (sp) => {
                  await sp.unsafe(statement.text, statement.params);
                });
              } catch (err) {
                throw classifyDbError(err);
              }
            },
          });
        });
      } catch (err) {
        throw classifyDbError(err);
      }
    },

    async close() {
      await sql.end({ timeout: 5 });
    },
  };
}
