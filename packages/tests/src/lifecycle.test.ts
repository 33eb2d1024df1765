import { describe, it, expect } from "vitest";
import { Effect, Exit } from "effect";
import {
  AlreadyExistsError,
  InvalidStateError,
  NotFoundError,
  SchemaVersionError,
  errorCode,
  joinUri,
  newRunId,
  requireActive,
  requireDeleted,
  viewTypeToStages,
} from "@runledger/core";

describe("lifecycle guards", () => {
  it("passes an entity in the required stage", () => {
    expect(Exit.isSuccess(Effect.runSyncExit(requireActive({ label: "run r1", lifecycleStage: "active" })))).toBe(true);
    expect(Exit.isSuccess(Effect.runSyncExit(requireDeleted({ label: "run r1", lifecycleStage: "deleted" })))).toBe(
      true,
    );
  });

  it("fails with InvalidStateError naming the entity and its stage", () => {
    const error = Effect.runSync(Effect.flip(requireActive({ label: "experiment 3", lifecycleStage: "deleted" })));
    expect(error).toBeInstanceOf(InvalidStateError);
    expect(error.message).toBe("The experiment 3 must be in the 'active' state. Current state is deleted.");
  });

  it("maps view types to stages", () => {
    expect(viewTypeToStages("ACTIVE_ONLY")).toEqual(["active"]);
    expect(viewTypeToStages("DELETED_ONLY")).toEqual(["deleted"]);
    expect(viewTypeToStages("ALL")).toEqual(["active", "deleted"]);
  });
});

describe("error codes", () => {
  it("maps each error kind to its wire code", () => {
    expect(errorCode(new AlreadyExistsError({ message: "x" }))).toBe("RESOURCE_ALREADY_EXISTS");
    expect(errorCode(new NotFoundError({ message: "x" }))).toBe("RESOURCE_DOES_NOT_EXIST");
    expect(errorCode(new InvalidStateError({ message: "x" }))).toBe("INVALID_STATE");
    expect(errorCode(new SchemaVersionError({ message: "x", found: 1, expected: 4 }))).toBe("INTERNAL_ERROR");
  });
});

describe("ids", () => {
  it("generates 32 hex character run ids", () => {
    const id = newRunId();
    expect(id).toMatch(/^[0-9a-f]{32}$/);
    expect(newRunId()).not.toBe(id);
  });

  it("joins URI segments with single slashes", () => {
    expect(joinUri("./runs", "1")).toBe("./runs/1");
    expect(joinUri("s3://bucket/root/", "7", "abc", "artifacts")).toBe("s3://bucket/root/7/abc/artifacts");
    expect(joinUri("file:///tmp/store", "/0/")).toBe("file:///tmp/store/0");
  });
});
