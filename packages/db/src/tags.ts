/**
 * Run tags: last write wins, explicit delete.
 */
import { Effect } from "effect";
import { InvalidStateError, NotFoundError, type InternalError, type RunTag } from "@runledger/core";
import type { Session } from "./session.js";
import { tagRow } from "./rows.js";

export function upsertTag(session: Session, runId: string, tag: RunTag): Effect.Effect<void, InternalError> {
  return Effect.asVoid(
    session.execute(
      `INSERT INTO tags (run_id, key, value) VALUES (?, ?, ?)
       ON CONFLICT(run_id, key) DO UPDATE SET value = excluded.value`,
      [runId, tag.key, tag.value],
    ),
  );
}

export function removeTag(
  session: Session,
  runId: string,
  key: string,
): Effect.Effect<void, NotFoundError | InvalidStateError | InternalError> {
  return Effect.gen(function* () {
    const rs = yield* session.execute("SELECT run_id, key, value FROM tags WHERE run_id = ? AND key = ?", [runId, key]);
    const matching = rs.rows.map(tagRow);
    if (matching.length === 0) {
      return yield* Effect.fail(new NotFoundError({ message: `No tag with name: ${key} in run with id ${runId}` }));
    }
    if (matching.length > 1) {
      return yield* Effect.fail(
        new InvalidStateError({
          message: `Bad data in database - tags for a specific run must have a single unique value. Found ${matching.length} for key '${key}' in run ${runId}.`,
        }),
      );
    }
    yield* session.execute("DELETE FROM tags WHERE run_id = ? AND key = ?", [runId, key]);
  });
}
