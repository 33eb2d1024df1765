/**
 * Row ⇄ domain conversions. Nothing returned from here references a
 * session, so values stay valid after the transaction closes.
 */
import type { Experiment, Metric, MetricInput, Param, Run, RunInfo, RunTag } from "@runledger/core";
import type { DbExperiment, DbExperimentTag, DbMetric, DbParam, DbRun, DbRunWithData, DbTag } from "./types.js";

export function toExperiment(row: DbExperiment, tags: readonly DbExperimentTag[] = []): Experiment {
  return {
    experimentId: String(row.experiment_id),
    name: row.name,
    artifactLocation: row.artifact_location ?? "",
    lifecycleStage: row.lifecycle_stage,
    tags: tags.map((t) => ({ key: t.key, value: t.value })),
  };
}

export function toRunInfo(row: DbRun): RunInfo {
  return {
    runId: row.run_id,
    runName: row.name,
    experimentId: String(row.experiment_id),
    userId: row.user_id,
    status: row.status,
    startTime: row.start_time,
    endTime: row.end_time,
    artifactUri: row.artifact_uri,
    lifecycleStage: row.lifecycle_stage,
  };
}

export function toMetric(row: DbMetric): Metric {
  return { key: row.key, value: row.value, timestamp: row.timestamp, step: row.step, isNan: row.is_nan };
}

export function toParam(row: DbParam): Param {
  return { key: row.key, value: row.value };
}

export function toRunTag(row: DbTag): RunTag {
  return { key: row.key, value: row.value };
}

export function toRun(loaded: DbRunWithData): Run {
  return {
    info: toRunInfo(loaded.run),
    data: {
      metrics: loaded.latestMetrics.map(toMetric),
      params: loaded.params.map(toParam),
      tags: loaded.tags.map(toRunTag),
    },
  };
}

// ── Domain → row ───────────────────────────────────────────────────────────

/**
 * The column cannot hold NaN or ±Infinity: NaN is stored as 0 with
 * `is_nan`, infinities as the largest finite doubles.
 */
export function normalizeMetricValue(value: number): { value: number; isNan: boolean } {
  if (Number.isNaN(value)) return { value: 0, isNan: true };
  if (value === Infinity) return { value: Number.MAX_VALUE, isNan: false };
  if (value === -Infinity) return { value: -Number.MAX_VALUE, isNan: false };
  return { value, isNan: false };
}

export function toMetricRow(runId: string, metric: MetricInput): DbMetric {
  const { value, isNan } = normalizeMetricValue(metric.value);
  return {
    run_id: runId,
    key: metric.key,
    value,
    timestamp: metric.timestamp,
    step: metric.step ?? 0,
    is_nan: isNan,
  };
}
