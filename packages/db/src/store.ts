/**
 * SqlTrackingStore: the TrackingStore backed by libSQL / SQLite.
 *
 * Each public operation validates its input, then does all of its database
 * work (lookups, lifecycle guards, writes) inside one session, so guards and
 * the writes they protect commit or roll back together.
 */
import type { Client } from "@libsql/client";
import { Effect, Option } from "effect";
import {
  InvalidArgumentError,
  InvalidStateError,
  RUN_STATUSES,
  inMemoryRunQuery,
  isRunStatus,
  joinUri,
  newRunId,
  requireActive,
  requireDeleted,
  validateExperimentName,
  validateMetric,
  validateParam,
  validateTag,
  type ConfigError,
  type CreateRunInput,
  type Experiment,
  type ExperimentTag,
  type InternalError,
  type LifecycleEntity,
  type Metric,
  type MetricInput,
  type Param,
  type Run,
  type RunInfo,
  type RunPage,
  type RunQueryEngine,
  type RunStatus,
  type RunTag,
  type SchemaMigrator,
  type SchemaVersionError,
  type SearchRunsInput,
  type StoreError,
  type TrackingStore,
  type ViewType,
} from "@runledger/core";
import { closeClient, openClient } from "./client.js";
import { loadStoreConfig, type StoreConfig, type StoreOptions } from "./config.js";
import { SessionManager, type Session } from "./session.js";
import { sqlMigrator } from "./migrate.js";
import { ensureArtifactRoot, initializeTablesIfAbsent, seedDefaultExperiment, verifySchema } from "./bootstrap.js";
import {
  fetchExperiment,
  findExperimentTags,
  findExperiments,
  insertExperiment,
  updateArtifactLocation,
  updateExperimentName,
  updateExperimentStage,
  upsertExperimentTag,
} from "./experiments.js";
import { fetchRun, fetchRunWithData, insertRun, insertRunTags, updateRunStage, updateRunStatus } from "./runs.js";
import { findMetricHistory, insertMetricFact, updateLatestMetricIfNecessary } from "./metrics.js";
import { insertParam } from "./params.js";
import { removeTag, upsertTag } from "./tags.js";
import { logBatch, type Batch } from "./batch.js";
import { searchRuns } from "./search.js";
import { toExperiment, toMetric, toMetricRow, toRun, toRunInfo } from "./entities.js";
import type { DbExperiment, DbRun } from "./types.js";

export const ARTIFACTS_FOLDER_NAME = "artifacts";

function experimentEntity(row: DbExperiment): LifecycleEntity {
  return { label: `experiment ${row.experiment_id}`, lifecycleStage: row.lifecycle_stage };
}

function runEntity(row: DbRun): LifecycleEntity {
  return { label: `run ${row.run_id}`, lifecycleStage: row.lifecycle_stage };
}

function withTags(session: Session, row: DbExperiment): Effect.Effect<Experiment, InternalError> {
  return Effect.map(findExperimentTags(session, [row.experiment_id]), (tags) => toExperiment(row, tags));
}

export class SqlTrackingStore implements TrackingStore {
  constructor(
    readonly config: StoreConfig,
    private readonly client: Client,
    private readonly sessions: SessionManager,
    private readonly queryEngine: RunQueryEngine = inMemoryRunQuery,
  ) {}

  close(): Effect.Effect<void> {
    return Effect.zipRight(this.sessions.close(), closeClient(this.client));
  }

  /** Where runs of an experiment without an explicit location keep their artifacts. */
  defaultArtifactLocation(experimentId: number): string {
    return joinUri(this.config.artifactRoot, String(experimentId));
  }

  // ── Experiments ──────────────────────────────────────────────────────────

  createExperiment(name: string, artifactLocation?: string): Effect.Effect<string, StoreError> {
    return Effect.gen(this, function* () {
      const validName = yield* validateExperimentName(name);
      const id = yield* this.sessions.withSession("write", (session) =>
        Effect.gen(this, function* () {
          const created = yield* insertExperiment(session, validName, artifactLocation || null);
          if (!artifactLocation) {
            yield* updateArtifactLocation(session, created, this.defaultArtifactLocation(created));
          }
          return created;
        }),
      );
      yield* Effect.logInfo(`Created experiment ${id} '${validName}'`);
      return String(id);
    });
  }

  listExperiments(viewType: ViewType = "ACTIVE_ONLY"): Effect.Effect<readonly Experiment[], StoreError> {
    return this.sessions.withSession("read", (session) =>
      Effect.gen(function* () {
        const rows = yield* findExperiments(session, { viewType });
        const tags = yield* findExperimentTags(session, rows.map((r) => r.experiment_id));
        return rows.map((row) => toExperiment(row, tags.filter((t) => t.experiment_id === row.experiment_id)));
      }),
    );
  }

  getExperiment(experimentId: string): Effect.Effect<Experiment, StoreError> {
    return this.sessions.withSession("read", (session) =>
      Effect.flatMap(fetchExperiment(session, experimentId, "ALL"), (row) => withTags(session, row)),
    );
  }

  getExperimentByName(name: string): Effect.Effect<Option.Option<Experiment>, StoreError> {
    return this.sessions.withSession("read", (session) =>
      Effect.gen(function* () {
        const rows = yield* findExperiments(session, { names: [name], viewType: "ALL" });
        if (rows.length === 0) return Option.none();
        if (rows.length > 1) {
          return yield* Effect.fail(
            new InvalidStateError({ message: `Expected only 1 experiment with name=${name}. Found ${rows.length}.` }),
          );
        }
        return Option.some(yield* withTags(session, rows[0]));
      }),
    );
  }

  deleteExperiment(experimentId: string): Effect.Effect<void, StoreError> {
    return this.sessions
      .withSession("write", (session) =>
        Effect.gen(function* () {
          const row = yield* fetchExperiment(session, experimentId, "ALL");
          yield* requireActive(experimentEntity(row));
          yield* updateExperimentStage(session, row.experiment_id, "deleted");
        }),
      )
      .pipe(Effect.tap(() => Effect.logInfo(`Deleted experiment ${experimentId}`)));
  }

  restoreExperiment(experimentId: string): Effect.Effect<void, StoreError> {
    return this.sessions
      .withSession("write", (session) =>
        Effect.gen(function* () {
          const row = yield* fetchExperiment(session, experimentId, "ALL");
          yield* requireDeleted(experimentEntity(row));
          yield* updateExperimentStage(session, row.experiment_id, "active");
        }),
      )
      .pipe(Effect.tap(() => Effect.logInfo(`Restored experiment ${experimentId}`)));
  }

  renameExperiment(experimentId: string, newName: string): Effect.Effect<void, StoreError> {
    return Effect.gen(this, function* () {
      const validName = yield* validateExperimentName(newName);
      yield* this.sessions.withSession("write", (session) =>
        Effect.gen(function* () {
          const row = yield* fetchExperiment(session, experimentId, "ALL");
          yield* requireActive(experimentEntity(row));
          yield* updateExperimentName(session, row.experiment_id, validName);
        }),
      );
      yield* Effect.logInfo(`Renamed experiment ${experimentId} to '${validName}'`);
    });
  }

  setExperimentTag(experimentId: string, tag: ExperimentTag): Effect.Effect<void, StoreError> {
    return Effect.zipRight(
      validateTag(tag),
      this.sessions.withSession("write", (session) =>
        Effect.gen(function* () {
          const row = yield* fetchExperiment(session, experimentId, "ALL");
          yield* requireActive(experimentEntity(row));
          yield* upsertExperimentTag(session, row.experiment_id, tag);
        }),
      ),
    );
  }

  // ── Runs ─────────────────────────────────────────────────────────────────

  createRun(input: CreateRunInput): Effect.Effect<Run, StoreError> {
    const tags = input.tags ?? [];
    return Effect.gen(this, function* () {
      yield* Effect.forEach(tags, validateTag, { discard: true });
      const run = yield* this.sessions.withSession("write", (session) =>
        Effect.gen(this, function* () {
          const experiment = yield* fetchExperiment(session, input.experimentId, "ALL");
          yield* requireActive(experimentEntity(experiment));

          const runId = newRunId();
          const location = experiment.artifact_location || this.defaultArtifactLocation(experiment.experiment_id);
          yield* insertRun(session, {
            run_id: runId,
            name: input.runName ?? "",
            experiment_id: experiment.experiment_id,
            user_id: input.userId ?? null,
            status: "RUNNING",
            start_time: input.startTime ?? null,
            end_time: null,
            artifact_uri: joinUri(location, runId, ARTIFACTS_FOLDER_NAME),
            lifecycle_stage: "active",
          });
          yield* insertRunTags(session, runId, tags);
          return toRun(yield* fetchRunWithData(session, runId));
        }),
      );
      yield* Effect.logInfo(`Created run ${run.info.runId} in experiment ${run.info.experimentId}`);
      return run;
    });
  }

  getRun(runId: string): Effect.Effect<Run, StoreError> {
    return this.sessions.withSession("read", (session) => Effect.map(fetchRunWithData(session, runId), toRun));
  }

  updateRunInfo(runId: string, status: RunStatus, endTime: number | null): Effect.Effect<RunInfo, StoreError> {
    if (!isRunStatus(status)) {
      return Effect.fail(
        new InvalidArgumentError({ message: `Invalid run status '${String(status)}'; expected one of ${RUN_STATUSES.join(", ")}` }),
      );
    }
    return this.sessions.withSession("write", (session) =>
      Effect.gen(function* () {
        const row = yield* fetchRun(session, runId);
        yield* requireActive(runEntity(row));
        yield* updateRunStatus(session, runId, status, endTime);
        return toRunInfo({ ...row, status, end_time: endTime });
      }),
    );
  }

  deleteRun(runId: string): Effect.Effect<void, StoreError> {
    return this.sessions.withSession("write", (session) =>
      Effect.gen(function* () {
        const row = yield* fetchRun(session, runId);
        yield* requireActive(runEntity(row));
        yield* updateRunStage(session, runId, "deleted");
      }),
    ).pipe(Effect.tap(() => Effect.logInfo(`Deleted run ${runId}`)));
  }

  restoreRun(runId: string): Effect.Effect<void, StoreError> {
    return this.sessions.withSession("write", (session) =>
      Effect.gen(function* () {
        const row = yield* fetchRun(session, runId);
        yield* requireDeleted(runEntity(row));
        yield* updateRunStage(session, runId, "active");
      }),
    ).pipe(Effect.tap(() => Effect.logInfo(`Restored run ${runId}`)));
  }

  /** Guard used by batch logging: the run exists and is active. */
  requireActiveRun(runId: string): Effect.Effect<void, StoreError> {
    return this.sessions.withSession("read", (session) =>
      Effect.flatMap(fetchRun(session, runId), (row) => requireActive(runEntity(row))),
    );
  }

  // ── Write path ───────────────────────────────────────────────────────────

  logMetric(runId: string, metric: MetricInput): Effect.Effect<void, StoreError> {
    return Effect.gen(this, function* () {
      yield* validateMetric(metric);
      const fact = toMetricRow(runId, metric);
      const created = yield* this.sessions.withSession("write", (session) =>
        Effect.gen(function* () {
          const row = yield* fetchRun(session, runId);
          yield* requireActive(runEntity(row));
          const inserted = yield* insertMetricFact(session, fact);
          if (inserted) yield* updateLatestMetricIfNecessary(session, fact);
          return inserted;
        }),
      );
      if (!created) yield* Effect.logDebug(`Metric '${metric.key}' for run ${runId} already logged; skipped`);
    });
  }

  getMetricHistory(runId: string, key: string): Effect.Effect<readonly Metric[], StoreError> {
    return this.sessions.withSession("read", (session) =>
      Effect.gen(function* () {
        yield* fetchRun(session, runId);
        const rows = yield* findMetricHistory(session, runId, key);
        return rows.map(toMetric);
      }),
    );
  }

  logParam(runId: string, param: Param): Effect.Effect<void, StoreError> {
    return Effect.zipRight(
      validateParam(param),
      this.sessions.withSession("write", (session) =>
        Effect.gen(function* () {
          const row = yield* fetchRun(session, runId);
          yield* requireActive(runEntity(row));
          yield* insertParam(session, runId, param);
        }),
      ),
    ).pipe(Effect.tap(() => Effect.logDebug(`Logged param '${param.key}' for run ${runId}`)));
  }

  setTag(runId: string, tag: RunTag): Effect.Effect<void, StoreError> {
    return Effect.zipRight(
      validateTag(tag),
      this.sessions.withSession("write", (session) =>
        Effect.gen(function* () {
          const row = yield* fetchRun(session, runId);
          yield* requireActive(runEntity(row));
          yield* upsertTag(session, runId, tag);
        }),
      ),
    ).pipe(Effect.tap(() => Effect.logDebug(`Set tag '${tag.key}' on run ${runId}`)));
  }

  deleteTag(runId: string, key: string): Effect.Effect<void, StoreError> {
    return this.sessions.withSession("write", (session) =>
      Effect.gen(function* () {
        const row = yield* fetchRun(session, runId);
        yield* requireActive(runEntity(row));
        yield* removeTag(session, runId, key);
      }),
    );
  }

  logBatch(runId: string, batch: Batch): Effect.Effect<void, StoreError> {
    return logBatch(this, runId, batch);
  }

  // ── Search ───────────────────────────────────────────────────────────────

  searchRuns(input: SearchRunsInput): Effect.Effect<RunPage, StoreError> {
    return searchRuns(this.sessions, this.queryEngine, input);
  }
}

// ── Opening a store ────────────────────────────────────────────────────────

export interface OpenStoreDeps {
  migrator?: SchemaMigrator<Client>;
  queryEngine?: RunQueryEngine;
}

/**
 * Loads configuration, connects, runs the startup checks and returns a ready
 * store. Its connections are closed again if any check fails.
 */
export function openStore(
  options: StoreOptions = {},
  deps: OpenStoreDeps = {},
): Effect.Effect<SqlTrackingStore, ConfigError | SchemaVersionError | InternalError> {
  const migrator = deps.migrator ?? sqlMigrator;
  return Effect.gen(function* () {
    const config = yield* loadStoreConfig(options);
    const client = yield* openClient(config);

    return yield* Effect.gen(function* () {
      yield* initializeTablesIfAbsent(client, migrator);
      yield* verifySchema(client, migrator);
      yield* ensureArtifactRoot(config.artifactRoot);
      const sessions = yield* SessionManager.make(client, config);
      yield* seedDefaultExperiment(sessions, config.artifactRoot).pipe(Effect.tapError(() => sessions.close()));
      yield* Effect.logDebug(`Opened tracking store at ${config.url}`);
      return new SqlTrackingStore(config, client, sessions, deps.queryEngine);
    }).pipe(Effect.tapError(() => closeClient(client)));
  });
}
