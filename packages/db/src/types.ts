/**
 * Database row types for @runledger/db.
 */
import type { LifecycleStage, RunStatus } from "@runledger/core";

export interface DbExperiment {
  experiment_id: number;
  name: string;
  artifact_location: string | null;
  lifecycle_stage: LifecycleStage;
}

export interface DbExperimentTag {
  experiment_id: number;
  key: string;
  value: string;
}

export interface DbRun {
  run_id: string;
  name: string;
  experiment_id: number;
  user_id: string | null;
  status: RunStatus;
  start_time: number | null;
  end_time: number | null;
  artifact_uri: string;
  lifecycle_stage: LifecycleStage;
}

/** One fact of a metric time series. Also the shape of `latest_metrics`. */
export interface DbMetric {
  run_id: string;
  key: string;
  value: number;
  timestamp: number;
  step: number;
  is_nan: boolean;
}

export interface DbParam {
  run_id: string;
  key: string;
  value: string;
}

export interface DbTag {
  run_id: string;
  key: string;
  value: string;
}

/** A run with its latest metrics, params and tags already loaded. */
export interface DbRunWithData {
  run: DbRun;
  latestMetrics: DbMetric[];
  params: DbParam[];
  tags: DbTag[];
}
