/**
 * Run reads and writes inside a session.
 */
import type { InValue } from "@libsql/client";
import { Effect } from "effect";
import {
  InvalidStateError,
  NotFoundError,
  type InternalError,
  type LifecycleStage,
  type RunStatus,
  type RunTag,
} from "@runledger/core";
import type { Session } from "./session.js";
import { metricRow, paramRow, runRow, tagRow } from "./rows.js";
import type { DbRun, DbRunWithData } from "./types.js";

const RUN_COLUMNS =
  "run_id, name, experiment_id, user_id, status, start_time, end_time, artifact_uri, lifecycle_stage";

/** A WHERE clause over the runs table, without the keyword. */
export interface RunScope {
  sql: string;
  args: InValue[];
}

export function insertRun(session: Session, run: DbRun): Effect.Effect<void, InternalError> {
  return Effect.asVoid(
    session.execute(`INSERT INTO runs (${RUN_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`, [
      run.run_id,
      run.name,
      run.experiment_id,
      run.user_id,
      run.status,
      run.start_time,
      run.end_time,
      run.artifact_uri,
      run.lifecycle_stage,
    ]),
  );
}

export function fetchRun(
  session: Session,
  runId: string,
): Effect.Effect<DbRun, NotFoundError | InvalidStateError | InternalError> {
  return Effect.gen(function* () {
    const rs = yield* session.execute(`SELECT ${RUN_COLUMNS} FROM runs WHERE run_id = ?`, [runId]);
    if (rs.rows.length === 0) {
      return yield* Effect.fail(new NotFoundError({ message: `Run with id=${runId} not found` }));
    }
    if (rs.rows.length > 1) {
      return yield* Effect.fail(
        new InvalidStateError({ message: `Expected only 1 run with id=${runId}. Found ${rs.rows.length}.` }),
      );
    }
    return runRow(rs.rows[0]);
  });
}

/**
 * Loads every run in `scope` together with its latest metrics, params and
 * tags: four queries in total, however many runs match.
 */
export function loadRunsWithData(session: Session, scope: RunScope): Effect.Effect<DbRunWithData[], InternalError> {
  return Effect.gen(function* () {
    const runs = (yield* session.execute(`SELECT ${RUN_COLUMNS} FROM runs WHERE ${scope.sql}`, scope.args)).rows.map(
      runRow,
    );
    if (runs.length === 0) return [];

    const inScope = `run_id IN (SELECT run_id FROM runs WHERE ${scope.sql})`;
    const [metrics, params, tags] = yield* Effect.all([
      session.execute(
        `SELECT run_id, key, value, timestamp, step, is_nan FROM latest_metrics WHERE ${inScope} ORDER BY key`,
        scope.args,
      ),
      session.execute(`SELECT run_id, key, value FROM params WHERE ${inScope} ORDER BY key`, scope.args),
      session.execute(`SELECT run_id, key, value FROM tags WHERE ${inScope} ORDER BY key`, scope.args),
    ]);

    const byRun = new Map<string, DbRunWithData>();
    for (const run of runs) byRun.set(run.run_id, { run, latestMetrics: [], params: [], tags: [] });
    for (const m of metrics.rows.map(metricRow)) byRun.get(m.run_id)?.latestMetrics.push(m);
    for (const p of params.rows.map(paramRow)) byRun.get(p.run_id)?.params.push(p);
    for (const t of tags.rows.map(tagRow)) byRun.get(t.run_id)?.tags.push(t);
    return [...byRun.values()];
  });
}

export function fetchRunWithData(
  session: Session,
  runId: string,
): Effect.Effect<DbRunWithData, NotFoundError | InvalidStateError | InternalError> {
  return Effect.gen(function* () {
    yield* fetchRun(session, runId);
    const [loaded] = yield* loadRunsWithData(session, { sql: "run_id = ?", args: [runId] });
    return loaded;
  });
}

export function updateRunStatus(
  session: Session,
  runId: string,
  status: RunStatus,
  endTime: number | null,
): Effect.Effect<void, InternalError> {
  return Effect.asVoid(session.execute("UPDATE runs SET status = ?, end_time = ? WHERE run_id = ?", [status, endTime, runId]));
}

export function updateRunStage(session: Session, runId: string, stage: LifecycleStage): Effect.Effect<void, InternalError> {
  return Effect.asVoid(session.execute("UPDATE runs SET lifecycle_stage = ? WHERE run_id = ?", [stage, runId]));
}

/** Later tags with the same key win. */
export function insertRunTags(session: Session, runId: string, tags: readonly RunTag[]): Effect.Effect<void, InternalError> {
  const merged = new Map<string, string>();
  for (const tag of tags) merged.set(tag.key, tag.value);
  return Effect.forEach(
    merged,
    ([key, value]) => session.execute("INSERT INTO tags (run_id, key, value) VALUES (?, ?, ?)", [runId, key, value]),
    { discard: true },
  );
}
