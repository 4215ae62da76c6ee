// lib/db.ts
import postgres from "postgres";
import type { Logger } from "pino";
import { DbConfig } from "./config";
import {
  ConnectivityError,
  ConstraintError,
  HeartbeatError,
  StorageError,
} from "./errors";

// Socket and driver codes that mean the server could not be reached or the link dropped.
const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EHOSTUNREACH",
  "EAI_AGAIN",
  "CONNECT_TIMEOUT",
  "CONNECTION_CLOSED",
  "CONNECTION_ENDED",
  "CONNECTION_DESTROYED",
]);

// admin_shutdown, crash_shutdown, cannot_connect_now
const SHUTDOWN_SQLSTATES = new Set(["57P01", "57P02", "57P03"]);

/**
 * Open a single-connection postgres.js client for one invocation.
 * The password is never logged; only host:port/database is.
 */
export function createDb(config: DbConfig, log: Logger): postgres.Sql {
  const sql = postgres({
    host: config.host,
    port: config.port,
    database: config.database,
    username: config.username,
    password: config.password,
    max: 1,
    connect_timeout: 10,
    ssl: "prefer",
    connection: { application_name: "hvac-heartbeat" },
    onnotice: (notice) => log.debug({ notice }, "postgres notice"),
  });

  log.debug(
    { target: `${config.host}:${config.port}/${config.database}` },
    "database client created",
  );
  return sql;
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Map a postgres.js failure onto the handler's error taxonomy.
 *
 * SQLSTATE class 22 (data exception) and 23 (integrity violation) are
 * record-level constraint failures. Connection exceptions, auth failures,
 * server shutdowns and socket errors mean the database is unavailable.
 */
export function classifyDbError(err: unknown): HeartbeatError {
  if (err instanceof HeartbeatError) return err;

  if (err instanceof postgres.PostgresError) {
    const sqlState = err.code;
    const context = {
      sqlState,
      constraint: err.constraint_name,
      detail: err.detail,
    };

    if (sqlState.startsWith("22") || sqlState.startsWith("23")) {
      return new ConstraintError(err.message, "CONSTRAINT_VIOLATION", context);
    }
    if (
      sqlState.startsWith("08") ||
      sqlState.startsWith("28") ||
      SHUTDOWN_SQLSTATES.has(sqlState)
    ) {
      return new ConnectivityError(err.message, "CONNECTIVITY_UNAVAILABLE", context);
    }
    return new StorageError(err.message, "STORAGE_QUERY", context);
  }

  const message = err instanceof Error ? err.message : String(err);
  const code = errorCode(err);
  if (code !== undefined && CONNECTION_CODES.has(code)) {
    return new ConnectivityError(message, "CONNECTIVITY_UNAVAILABLE", { code });
  }
  return new StorageError(message, "STORAGE_ERROR", { code });
}
