/**
 * Ports. The SQL store implements `TrackingStore`; migrations are an
 * outside collaborator reached through `SchemaMigrator`.
 */
import { Context, Effect, Option } from "effect";
import type { InternalError, StoreError } from "./errors.js";
import type {
  CreateRunInput,
  Experiment,
  ExperimentTag,
  Metric,
  MetricInput,
  Param,
  Run,
  RunInfo,
  RunPage,
  RunStatus,
  RunTag,
  SearchRunsInput,
  ViewType,
} from "./types.js";

// ── Tracking store ─────────────────────────────────────────────────────────
export interface TrackingStore {
  // experiments
  createExperiment(name: string, artifactLocation?: string): Effect.Effect<string, StoreError>;
  listExperiments(viewType?: ViewType): Effect.Effect<readonly Experiment[], StoreError>;
  getExperiment(experimentId: string): Effect.Effect<Experiment, StoreError>;
  getExperimentByName(name: string): Effect.Effect<Option.Option<Experiment>, StoreError>;
  deleteExperiment(experimentId: string): Effect.Effect<void, StoreError>;
  restoreExperiment(experimentId: string): Effect.Effect<void, StoreError>;
  renameExperiment(experimentId: string, newName: string): Effect.Effect<void, StoreError>;
  setExperimentTag(experimentId: string, tag: ExperimentTag): Effect.Effect<void, StoreError>;

  // runs
  createRun(input: CreateRunInput): Effect.Effect<Run, StoreError>;
  getRun(runId: string): Effect.Effect<Run, StoreError>;
  updateRunInfo(runId: string, status: RunStatus, endTime: number | null): Effect.Effect<RunInfo, StoreError>;
  deleteRun(runId: string): Effect.Effect<void, StoreError>;
  restoreRun(runId: string): Effect.Effect<void, StoreError>;

  // write path
  logMetric(runId: string, metric: MetricInput): Effect.Effect<void, StoreError>;
  getMetricHistory(runId: string, key: string): Effect.Effect<readonly Metric[], StoreError>;
  logParam(runId: string, param: Param): Effect.Effect<void, StoreError>;
  setTag(runId: string, tag: RunTag): Effect.Effect<void, StoreError>;
  deleteTag(runId: string, key: string): Effect.Effect<void, StoreError>;
  /** Not atomic as a whole: items applied before a failure stay committed. */
  logBatch(
    runId: string,
    batch: { metrics?: readonly MetricInput[]; params?: readonly Param[]; tags?: readonly RunTag[] },
  ): Effect.Effect<void, StoreError>;

  // search
  searchRuns(input: SearchRunsInput): Effect.Effect<RunPage, StoreError>;
}

export class TrackingStoreService extends Context.Tag("TrackingStoreService")<
  TrackingStoreService,
  TrackingStore
>() {}

// ── Schema migrations ──────────────────────────────────────────────────────
export interface SchemaMigrator<Conn> {
  /** 0 when the database has never been migrated. */
  currentSchemaVersion(conn: Conn): Effect.Effect<number, InternalError>;
  expectedSchemaVersion(): number;
  /** Applies every pending migration; returns how many ran. */
  migrateToLatest(conn: Conn): Effect.Effect<number, InternalError>;
}
