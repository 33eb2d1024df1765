import { describe, it, expect } from "vitest";
import { Effect, Exit } from "effect";
import {
  MAX_PARAM_VALUE_LENGTH,
  MAX_TAG_VALUE_LENGTH,
  validateBatchLimits,
  validateExperimentName,
  validateMetric,
  validateParam,
  validateRunId,
  validateTag,
  type MetricInput,
  type Param,
  type RunTag,
} from "@runledger/core";

function failureTag<A, E extends { _tag: string }>(effect: Effect.Effect<A, E>): string | null {
  const exit = Effect.runSyncExit(effect);
  if (Exit.isSuccess(exit)) return null;
  return exit.cause._tag === "Fail" ? exit.cause.error._tag : exit.cause._tag;
}

function failureMessage<A>(effect: Effect.Effect<A, { message: string }>): string {
  return Effect.runSync(Effect.match(effect, { onFailure: (e) => e.message, onSuccess: () => "" }));
}

const metrics = (n: number): MetricInput[] =>
  Array.from({ length: n }, (_, i) => ({ key: `m${i}`, value: i, timestamp: 1 }));
const params = (n: number): Param[] => Array.from({ length: n }, (_, i) => ({ key: `p${i}`, value: "v" }));
const tags = (n: number): RunTag[] => Array.from({ length: n }, (_, i) => ({ key: `t${i}`, value: "v" }));

describe("entity keys", () => {
  it("accepts alphanumerics, underscores, dashes, periods, spaces and slashes", () => {
    expect(failureTag(validateParam({ key: "train/lr_0.1 - warm", value: "x" }))).toBeNull();
  });

  it("rejects characters outside the allowed set", () => {
    expect(failureTag(validateParam({ key: "bad$key", value: "x" }))).toBe("InvalidArgumentError");
  });

  it("rejects keys that alias other keys as paths", () => {
    for (const key of ["../x", "a//b", "/lead", "trail/", "a/./b"]) {
      expect(failureTag(validateTag({ key, value: "x" }))).toBe("InvalidArgumentError");
    }
  });

  it("rejects empty and over-long keys", () => {
    expect(failureTag(validateParam({ key: "", value: "x" }))).toBe("InvalidArgumentError");
    expect(failureTag(validateParam({ key: "k".repeat(250), value: "x" }))).toBeNull();
    expect(failureTag(validateParam({ key: "k".repeat(251), value: "x" }))).toBe("InvalidArgumentError");
  });
});

describe("values", () => {
  it("limits param values to 500 characters", () => {
    expect(failureTag(validateParam({ key: "p", value: "v".repeat(MAX_PARAM_VALUE_LENGTH) }))).toBeNull();
    expect(failureMessage(validateParam({ key: "p", value: "v".repeat(MAX_PARAM_VALUE_LENGTH + 1) }))).toBe(
      "Param value for 'p' had length 501, which exceeded length limit of 500",
    );
  });

  it("limits tag values to 5000 characters", () => {
    expect(failureTag(validateTag({ key: "t", value: "v".repeat(MAX_TAG_VALUE_LENGTH) }))).toBeNull();
    expect(failureTag(validateTag({ key: "t", value: "v".repeat(MAX_TAG_VALUE_LENGTH + 1) }))).toBe(
      "InvalidArgumentError",
    );
  });

  it("requires integer non-negative timestamps and integer steps", () => {
    expect(failureTag(validateMetric({ key: "loss", value: 0.5, timestamp: 10, step: 3 }))).toBeNull();
    expect(failureTag(validateMetric({ key: "loss", value: Number.NaN, timestamp: 10 }))).toBeNull();
    expect(failureTag(validateMetric({ key: "loss", value: 0.5, timestamp: -1 }))).toBe("InvalidArgumentError");
    expect(failureTag(validateMetric({ key: "loss", value: 0.5, timestamp: 1.5 }))).toBe("InvalidArgumentError");
    expect(failureTag(validateMetric({ key: "loss", value: 0.5, timestamp: 1, step: 0.5 }))).toBe(
      "InvalidArgumentError",
    );
  });

  it("requires a non-empty experiment name", () => {
    expect(Effect.runSync(validateExperimentName("exp"))).toBe("exp");
    expect(failureTag(validateExperimentName(""))).toBe("InvalidArgumentError");
  });

  it("checks run id format", () => {
    expect(failureTag(validateRunId("0123abcd"))).toBeNull();
    expect(failureTag(validateRunId(""))).toBe("InvalidArgumentError");
    expect(failureTag(validateRunId("../etc"))).toBe("InvalidArgumentError");
  });
});

describe("batch limits", () => {
  it("accepts a batch at every limit", () => {
    expect(failureTag(validateBatchLimits(metrics(800), params(100), tags(100)))).toBeNull();
  });

  it("rejects too many metrics, params or tags", () => {
    expect(failureMessage(validateBatchLimits(metrics(1001), [], []))).toBe(
      "A batch logging request can contain at most 1000 metrics. Got 1001 metrics.",
    );
    expect(failureTag(validateBatchLimits([], params(101), []))).toBe("InvalidArgumentError");
    expect(failureTag(validateBatchLimits([], [], tags(101)))).toBe("InvalidArgumentError");
  });

  it("rejects more than 1000 items in total", () => {
    expect(failureMessage(validateBatchLimits(metrics(1000), params(1), []))).toBe(
      "A batch logging request can contain at most 1000 total metrics, params and tags. Got 1001.",
    );
  });
});
