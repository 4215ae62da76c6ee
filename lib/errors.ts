// lib/errors.ts

/**
 * Base error for the heartbeat handler.
 * Carries a machine-readable `code` and a `context` record for logs.
 */
export class HeartbeatError extends Error {
  readonly code: string;
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "HeartbeatError";
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/** Bad or missing fields. Record-scoped unless the envelope itself is malformed. */
export class ValidationError extends HeartbeatError {
  constructor(
    message: string,
    code: string = "VALIDATION_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "ValidationError";
  }
}

/** A value the device_state constraints reject (status enum, foreign keys, ranges). */
export class ConstraintError extends HeartbeatError {
  constructor(
    message: string,
    code: string = "CONSTRAINT_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "ConstraintError";
  }
}

/** Database unreachable or the connection dropped. Fails the whole invocation. */
export class ConnectivityError extends HeartbeatError {
  constructor(
    message: string,
    code: string = "CONNECTIVITY_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "ConnectivityError";
  }
}

/** Any other database failure. */
export class StorageError extends HeartbeatError {
  constructor(
    message: string,
    code: string = "STORAGE_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "StorageError";
  }
}

export class ConfigError extends HeartbeatError {
  constructor(
    message: string,
    code: string = "CONFIG_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "ConfigError";
  }
}
