/**
 * Write-once params.
 *
 * The (run_id, key) primary key is the arbiter: the insert runs under a
 * savepoint, and a uniqueness failure is diagnosed in the same transaction
 * after rolling back to it. Same value means a retried write; a different
 * value is a conflict.
 */
import { Effect } from "effect";
import { AlreadyExistsError, type InternalError, type Param } from "@runledger/core";
import { isUniqueViolation, type Session } from "./session.js";
import { paramRow } from "./rows.js";
import type { DbParam } from "./types.js";

export function findParams(session: Session, runId: string): Effect.Effect<DbParam[], InternalError> {
  return session
    .execute("SELECT run_id, key, value FROM params WHERE run_id = ? ORDER BY key", [runId])
    .pipe(Effect.map((rs) => rs.rows.map(paramRow)));
}

function reconcile(
  session: Session,
  runId: string,
  param: Param,
  failure: InternalError,
): Effect.Effect<void, AlreadyExistsError | InternalError> {
  return Effect.gen(function* () {
    const existing = (yield* findParams(session, runId)).find((p) => p.key === param.key);
    if (existing === undefined) return yield* Effect.fail(failure);
    if (existing.value === param.value) {
      yield* Effect.logDebug(`Param '${param.key}' already logged with the same value for run ${runId}`);
      return;
    }
    return yield* Effect.fail(
      new AlreadyExistsError({
        message:
          `Changing param value is not allowed. Param with key='${param.key}' was already logged ` +
          `with value='${existing.value}' for run ID='${runId}'. Attempted logging new value '${param.value}'.`,
      }),
    );
  });
}

export function insertParam(
  session: Session,
  runId: string,
  param: Param,
): Effect.Effect<void, AlreadyExistsError | InternalError> {
  const insert = session.execute("INSERT INTO params (run_id, key, value) VALUES (?, ?, ?)", [
    runId,
    param.key,
    param.value,
  ]);
  return session.savepoint("log_param", insert).pipe(
    Effect.asVoid,
    Effect.catchTag("InternalError", (err): Effect.Effect<void, AlreadyExistsError | InternalError> =>
      isUniqueViolation(err) ? reconcile(session, runId, param, err) : Effect.fail(err),
    ),
  );
}
