import { ConstraintError, HeartbeatError, StorageError } from "../errors";

describe("HeartbeatError", () => {
  test("subclasses keep their name, default code and context", () => {
    const err = new ConstraintError("status must be one of ready, degraded, error", undefined, {
      status: "offline",
    });

    expect(err).toBeInstanceOf(HeartbeatError);
    expect(err.name).toBe("ConstraintError");
    expect(err.code).toBe("CONSTRAINT_ERROR");
    expect(err.toJSON()).toEqual({
      name: "ConstraintError",
      code: "CONSTRAINT_ERROR",
      message: "status must be one of ready, degraded, error",
      context: { status: "offline" },
    });
  });

  test("context defaults to an empty object", () => {
    expect(new StorageError("boom", "STORAGE_QUERY").context).toEqual({});
  });
});
