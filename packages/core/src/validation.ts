/**
 * Format and size rules checked before any database work.
 */
import { Effect } from "effect";
import { InvalidArgumentError } from "./errors.js";
import type { ExperimentTag, MetricInput, Param, RunTag } from "./types.js";

export const MAX_ENTITY_KEY_LENGTH = 250;
export const MAX_PARAM_VALUE_LENGTH = 500;
export const MAX_TAG_VALUE_LENGTH = 5000;

export const MAX_METRICS_PER_BATCH = 1000;
export const MAX_PARAMS_PER_BATCH = 100;
export const MAX_TAGS_PER_BATCH = 100;
export const MAX_ENTITIES_PER_BATCH = 1000;

const VALID_KEY = /^[/\w.\- ]*$/;
const VALID_RUN_ID = /^[a-zA-Z0-9][\w-]{0,255}$/;

function invalid(message: string): Effect.Effect<never, InvalidArgumentError> {
  return Effect.fail(new InvalidArgumentError({ message }));
}

/** Keys double as file names in artifact layouts, so they must not alias each other as paths. */
function pathAliasing(key: string): boolean {
  if (key.startsWith("/") || key.endsWith("/")) return true;
  return key.split("/").some((seg) => seg === "" || seg === "." || seg === "..");
}

function validateKey(kind: "metric" | "param" | "tag", key: unknown): Effect.Effect<void, InvalidArgumentError> {
  if (typeof key !== "string" || key.length === 0) {
    return invalid(`Missing value for required parameter '${kind} key'`);
  }
  if (key.length > MAX_ENTITY_KEY_LENGTH) {
    return invalid(`${kind} key '${key.slice(0, 32)}...' had length ${key.length}, which exceeded length limit of ${MAX_ENTITY_KEY_LENGTH}`);
  }
  if (!VALID_KEY.test(key)) {
    return invalid(
      `Invalid ${kind} name: '${key}'. Names may only contain alphanumerics, underscores (_), dashes (-), periods (.), spaces ( ), and slashes (/).`,
    );
  }
  if (pathAliasing(key)) {
    return invalid(`Invalid ${kind} name: '${key}'. Names must not resolve to other names when treated as file paths.`);
  }
  return Effect.void;
}

function validateLength(what: string, value: unknown, limit: number): Effect.Effect<void, InvalidArgumentError> {
  if (typeof value !== "string") return invalid(`${what} must be a string, got ${typeof value}`);
  if (value.length > limit) {
    return invalid(`${what} had length ${value.length}, which exceeded length limit of ${limit}`);
  }
  return Effect.void;
}

export function validateExperimentName(name: unknown): Effect.Effect<string, InvalidArgumentError> {
  if (typeof name !== "string" || name.length === 0) return invalid("Invalid experiment name: must be a non-empty string");
  return Effect.succeed(name);
}

export function validateRunId(runId: unknown): Effect.Effect<void, InvalidArgumentError> {
  if (typeof runId !== "string" || !VALID_RUN_ID.test(runId)) {
    return invalid(`Invalid run ID: '${String(runId)}'`);
  }
  return Effect.void;
}

export function validateMetric(metric: MetricInput): Effect.Effect<void, InvalidArgumentError> {
  return Effect.gen(function* () {
    yield* validateKey("metric", metric.key);
    if (typeof metric.value !== "number") {
      return yield* invalid(`Got invalid value ${String(metric.value)} for metric '${metric.key}' (timestamp=${metric.timestamp}). Please specify value as a number.`);
    }
    if (!Number.isInteger(metric.timestamp) || metric.timestamp < 0) {
      return yield* invalid(`Got invalid timestamp ${metric.timestamp} for metric '${metric.key}' (value=${metric.value}). Timestamp must be a non-negative integer.`);
    }
    if (metric.step !== undefined && !Number.isInteger(metric.step)) {
      return yield* invalid(`Got invalid step ${metric.step} for metric '${metric.key}' (value=${metric.value}). Step must be an integer.`);
    }
  });
}

export function validateParam(param: Param): Effect.Effect<void, InvalidArgumentError> {
  return Effect.zipRight(
    validateKey("param", param.key),
    validateLength(`Param value for '${param.key}'`, param.value, MAX_PARAM_VALUE_LENGTH),
  );
}

export function validateTag(tag: RunTag | ExperimentTag): Effect.Effect<void, InvalidArgumentError> {
  return Effect.zipRight(
    validateKey("tag", tag.key),
    validateLength(`Tag value for '${tag.key}'`, tag.value, MAX_TAG_VALUE_LENGTH),
  );
}

export function validateBatchLimits(
  metrics: readonly MetricInput[],
  params: readonly Param[],
  tags: readonly RunTag[],
): Effect.Effect<void, InvalidArgumentError> {
  const total = metrics.length + params.length + tags.length;
  if (metrics.length > MAX_METRICS_PER_BATCH) {
    return invalid(`A batch logging request can contain at most ${MAX_METRICS_PER_BATCH} metrics. Got ${metrics.length} metrics.`);
  }
  if (params.length > MAX_PARAMS_PER_BATCH) {
    return invalid(`A batch logging request can contain at most ${MAX_PARAMS_PER_BATCH} params. Got ${params.length} params.`);
  }
  if (tags.length > MAX_TAGS_PER_BATCH) {
    return invalid(`A batch logging request can contain at most ${MAX_TAGS_PER_BATCH} tags. Got ${tags.length} tags.`);
  }
  if (total > MAX_ENTITIES_PER_BATCH) {
    return invalid(`A batch logging request can contain at most ${MAX_ENTITIES_PER_BATCH} total metrics, params and tags. Got ${total}.`);
  }
  return Effect.void;
}

export function validateBatchData(
  metrics: readonly MetricInput[],
  params: readonly Param[],
  tags: readonly RunTag[],
): Effect.Effect<void, InvalidArgumentError> {
  return Effect.all(
    [
      Effect.forEach(metrics, validateMetric, { discard: true }),
      Effect.forEach(params, validateParam, { discard: true }),
      Effect.forEach(tags, validateTag, { discard: true }),
    ],
    { discard: true },
  );
}
