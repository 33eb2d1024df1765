/**
 * Typed column readers for libSQL rows.
 *
 * A value of the wrong type means the schema and the code disagree; the
 * readers throw, and the session boundary turns that into an InternalError.
 */
import type { Row } from "@libsql/client";
import { isRunStatus, type LifecycleStage } from "@runledger/core";
import type { DbExperiment, DbExperimentTag, DbMetric, DbParam, DbRun, DbTag } from "./types.js";

function mismatch(column: string, expected: string, got: unknown): Error {
  return new TypeError(`Column "${column}": expected ${expected}, got ${got === null ? "null" : typeof got}`);
}

export function text(row: Row, column: string): string {
  const v = row[column];
  if (typeof v === "string") return v;
  throw mismatch(column, "text", v);
}

export function optText(row: Row, column: string): string | null {
  const v = row[column];
  if (v === null || v === undefined) return null;
  if (typeof v === "string") return v;
  throw mismatch(column, "text or null", v);
}

export function int(row: Row, column: string): number {
  const v = row[column];
  if (typeof v === "number") return v;
  if (typeof v === "bigint") return Number(v);
  throw mismatch(column, "number", v);
}

export function real(row: Row, column: string): number {
  const v = row[column];
  if (typeof v === "number") return v;
  throw mismatch(column, "real", v);
}

export function optInt(row: Row, column: string): number | null {
  const v = row[column];
  if (v === null || v === undefined) return null;
  return int(row, column);
}

function lifecycle(row: Row): LifecycleStage {
  const v = text(row, "lifecycle_stage");
  if (v === "active" || v === "deleted") return v;
  throw mismatch("lifecycle_stage", "'active' or 'deleted'", v);
}

// ── Row decoders ───────────────────────────────────────────────────────────

export function experimentRow(row: Row): DbExperiment {
  return {
    experiment_id: int(row, "experiment_id"),
    name: text(row, "name"),
    artifact_location: optText(row, "artifact_location"),
    lifecycle_stage: lifecycle(row),
  };
}

export function experimentTagRow(row: Row): DbExperimentTag {
  return { experiment_id: int(row, "experiment_id"), key: text(row, "key"), value: text(row, "value") };
}

export function runRow(row: Row): DbRun {
  const status = text(row, "status");
  if (!isRunStatus(status)) throw mismatch("status", "a run status", status);
  return {
    run_id: text(row, "run_id"),
    name: text(row, "name"),
    experiment_id: int(row, "experiment_id"),
    user_id: optText(row, "user_id"),
    status,
    start_time: optInt(row, "start_time"),
    end_time: optInt(row, "end_time"),
    artifact_uri: text(row, "artifact_uri"),
    lifecycle_stage: lifecycle(row),
  };
}

export function metricRow(row: Row): DbMetric {
  return {
    run_id: text(row, "run_id"),
    key: text(row, "key"),
    value: real(row, "value"),
    timestamp: int(row, "timestamp"),
    step: int(row, "step"),
    is_nan: int(row, "is_nan") !== 0,
  };
}

export function paramRow(row: Row): DbParam {
  return { run_id: text(row, "run_id"), key: text(row, "key"), value: text(row, "value") };
}

export function tagRow(row: Row): DbTag {
  return { run_id: text(row, "run_id"), key: text(row, "key"), value: text(row, "value") };
}

/** `?, ?, ?` for an IN list of `n` values. */
export function placeholders(n: number): string {
  return Array.from({ length: n }, () => "?").join(", ");
}
