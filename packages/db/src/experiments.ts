/**
 * Experiment reads and writes inside a session.
 */
import { Effect } from "effect";
import {
  AlreadyExistsError,
  DEFAULT_EXPERIMENT_ID,
  InvalidArgumentError,
  InvalidStateError,
  NotFoundError,
  viewTypeToStages,
  type ExperimentTag,
  type InternalError,
  type LifecycleStage,
  type ViewType,
} from "@runledger/core";
import type { InValue } from "@libsql/client";
import { isUniqueViolation, type Session } from "./session.js";
import { experimentRow, experimentTagRow, int, placeholders } from "./rows.js";
import type { DbExperiment, DbExperimentTag } from "./types.js";

export interface ExperimentQuery {
  ids?: readonly number[];
  names?: readonly string[];
  viewType: ViewType;
}

export function parseExperimentId(experimentId: string): Effect.Effect<number, InvalidArgumentError> {
  const id = experimentId === "" ? DEFAULT_EXPERIMENT_ID : experimentId;
  if (!/^\d+$/.test(id)) {
    return Effect.fail(new InvalidArgumentError({ message: `Invalid experiment ID: '${experimentId}'` }));
  }
  return Effect.succeed(Number(id));
}

export function findExperiments(session: Session, query: ExperimentQuery): Effect.Effect<DbExperiment[], InternalError> {
  const stages = viewTypeToStages(query.viewType);
  const conditions = [`lifecycle_stage IN (${placeholders(stages.length)})`];
  const args: InValue[] = [...stages];

  if (query.ids && query.ids.length > 0) {
    conditions.push(`experiment_id IN (${placeholders(query.ids.length)})`);
    args.push(...query.ids);
  }
  if (query.names && query.names.length > 0) {
    conditions.push(`name IN (${placeholders(query.names.length)})`);
    args.push(...query.names);
  }

  return session
    .execute(
      `SELECT experiment_id, name, artifact_location, lifecycle_stage FROM experiments
       WHERE ${conditions.join(" AND ")} ORDER BY experiment_id`,
      args,
    )
    .pipe(Effect.map((rs) => rs.rows.map(experimentRow)));
}

/** Exactly one experiment by id, in any of the stages `viewType` allows. */
export function fetchExperiment(
  session: Session,
  experimentId: string,
  viewType: ViewType,
): Effect.Effect<DbExperiment, InvalidArgumentError | NotFoundError | InvalidStateError | InternalError> {
  return Effect.gen(function* () {
    const id = yield* parseExperimentId(experimentId);
    const rows = yield* findExperiments(session, { ids: [id], viewType });
    if (rows.length === 0) {
      return yield* Effect.fail(new NotFoundError({ message: `No Experiment with id=${id} exists` }));
    }
    if (rows.length > 1) {
      return yield* Effect.fail(
        new InvalidStateError({ message: `Expected only 1 experiment with id=${id}. Found ${rows.length}.` }),
      );
    }
    return rows[0];
  });
}

export function findExperimentTags(
  session: Session,
  experimentIds: readonly number[],
): Effect.Effect<DbExperimentTag[], InternalError> {
  if (experimentIds.length === 0) return Effect.succeed([]);
  return session
    .execute(
      `SELECT experiment_id, key, value FROM experiment_tags
       WHERE experiment_id IN (${placeholders(experimentIds.length)}) ORDER BY key`,
      [...experimentIds],
    )
    .pipe(Effect.map((rs) => rs.rows.map(experimentTagRow)));
}

function nameTaken(name: string) {
  return (err: InternalError): Effect.Effect<never, AlreadyExistsError | InternalError> =>
    isUniqueViolation(err)
      ? Effect.fail(new AlreadyExistsError({ message: `Experiment(name=${name}) already exists. Names of deleted experiments stay reserved.`, cause: err.cause }))
      : Effect.fail(err);
}

/** Inserts an active experiment and returns the id the database assigned to it. */
export function insertExperiment(
  session: Session,
  name: string,
  artifactLocation: string | null,
): Effect.Effect<number, AlreadyExistsError | InternalError> {
  return Effect.gen(function* () {
    yield* session
      .execute("INSERT INTO experiments (name, artifact_location, lifecycle_stage) VALUES (?, ?, 'active')", [
        name,
        artifactLocation,
      ])
      .pipe(Effect.catchTag("InternalError", nameTaken(name)));
    const rs = yield* session.execute("SELECT experiment_id FROM experiments WHERE name = ?", [name]);
    return int(rs.rows[0], "experiment_id");
  });
}

/**
 * Id 0 is not a value AUTOINCREMENT hands out, so the default experiment is
 * written with an explicit id.
 */
export function insertDefaultExperiment(
  session: Session,
  name: string,
  artifactLocation: string,
): Effect.Effect<void, InternalError> {
  return Effect.asVoid(
    session.execute(
      "INSERT INTO experiments (experiment_id, name, artifact_location, lifecycle_stage) VALUES (?, ?, ?, 'active')",
      [Number(DEFAULT_EXPERIMENT_ID), name, artifactLocation],
    ),
  );
}

export function updateArtifactLocation(session: Session, id: number, location: string): Effect.Effect<void, InternalError> {
  return Effect.asVoid(
    session.execute("UPDATE experiments SET artifact_location = ? WHERE experiment_id = ?", [location, id]),
  );
}

export function updateExperimentStage(
  session: Session,
  id: number,
  stage: LifecycleStage,
): Effect.Effect<void, InternalError> {
  return Effect.asVoid(session.execute("UPDATE experiments SET lifecycle_stage = ? WHERE experiment_id = ?", [stage, id]));
}

export function updateExperimentName(
  session: Session,
  id: number,
  name: string,
): Effect.Effect<void, AlreadyExistsError | InternalError> {
  return session
    .execute("UPDATE experiments SET name = ? WHERE experiment_id = ?", [name, id])
    .pipe(Effect.asVoid, Effect.catchTag("InternalError", nameTaken(name)));
}

export function upsertExperimentTag(session: Session, id: number, tag: ExperimentTag): Effect.Effect<void, InternalError> {
  return Effect.asVoid(
    session.execute(
      `INSERT INTO experiment_tags (experiment_id, key, value) VALUES (?, ?, ?)
       ON CONFLICT(experiment_id, key) DO UPDATE SET value = excluded.value`,
      [id, tag.key, tag.value],
    ),
  );
}
