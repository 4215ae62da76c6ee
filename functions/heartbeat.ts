// functions/heartbeat.ts
import type { APIGatewayProxyResult, Context } from "aws-lambda";
import type { Logger } from "pino";
import { DbConfig, loadDbConfig } from "../lib/config";
import { createDb } from "../lib/db";
import { createPostgresStore, DeviceStateStore } from "../lib/device-state-store";
import {
  ConnectivityError,
  HeartbeatError,
  ValidationError,
} from "../lib/errors";
import { rejectedResults, summarize, writeHeartbeats } from "../lib/ingest";
import { logger } from "../lib/logger";
import { decodeEvent, extractRecords, normalizeRecords } from "../lib/payload";
import { RecordResult } from "../lib/types";

export interface HandlerDeps {
  loadConfig: () => DbConfig;
  openStore: (config: DbConfig, log: Logger) => DeviceStateStore;
  now: () => Date;
  logger: Logger;
}

const defaultDeps: HandlerDeps = {
  loadConfig: () => loadDbConfig(),
  openStore: (config, log) => createPostgresStore(createDb(config, log)),
  now: () => new Date(),
  logger,
};

function json(status: number, body: unknown): APIGatewayProxyResult {
  return {
    statusCode: status,
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  };
}

function respond(results: RecordResult[], receivedAt: Date): APIGatewayProxyResult {
  const { updated, failed } = summarize(results);
  // 207 when the batch partly succeeded, 400 when nothing was written.
  const status = failed === 0 ? 200 : updated === 0 ? 400 : 207;
  return json(status, {
    message: `Heartbeat updated for ${updated} device(s)`,
    updated,
    failed,
    results,
    timestamp: receivedAt.toISOString(),
  });
}

function failure(err: unknown, log: Logger): APIGatewayProxyResult {
  if (err instanceof ValidationError) {
    log.warn({ code: err.code, context: err.context }, err.message);
    return json(400, { error: err.message, code: err.code });
  }
  if (err instanceof ConnectivityError) {
    log.error({ err }, "Database unavailable");
    return json(503, { error: err.message, code: err.code });
  }
  if (err instanceof HeartbeatError) {
    log.error({ err }, "Heartbeat update failed");
    return json(500, { error: err.message, code: err.code });
  }
  log.error({ err }, "Unexpected error updating heartbeat");
  return json(500, {
    error: err instanceof Error ? err.message : "Internal server error",
    code: "INTERNAL_ERROR",
  });
}

/**
 * Build the heartbeat handler. Accepts a single device record or
 * `{ devices: [...] }` and upserts each into device_state in one transaction.
 */
export function createHandler(overrides: Partial<HandlerDeps> = {}) {
  const deps: HandlerDeps = { ...defaultDeps, ...overrides };

  return async (event: unknown, context?: Context): Promise<APIGatewayProxyResult> => {
    const receivedAt = deps.now();
    const log = deps.logger.child({ requestId: context?.awsRequestId });

    try {
      const entries = normalizeRecords(extractRecords(decodeEvent(event)));
      log.info({ records: entries.length }, "Heartbeat request received");

      if (!entries.some((entry) => entry.ok)) {
        log.warn({ failed: entries.length }, "No valid device records");
        return respond(rejectedResults(entries), receivedAt);
      }

      const store = deps.openStore(deps.loadConfig(), log);
      let results: RecordResult[];
      try {
        results = await writeHeartbeats(store, entries, receivedAt, log);
      } finally {
        await store.close();
      }
      return respond(results, receivedAt);
    } catch (err) {
      return failure(err, log);
    }
  };
}

export const handler = createHandler();
