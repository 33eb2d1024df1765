/**
 * Metric facts and the latest_metrics view.
 *
 * `metrics` is append-only; `latest_metrics` holds, per (run, key), the fact
 * with the greatest (step, timestamp, value). Both are written in the same
 * write transaction. A write transaction holds SQLite's write lock from
 * BEGIN IMMEDIATE to COMMIT, so the read-compare-replace on latest_metrics
 * cannot interleave with another writer's.
 */
import { Effect } from "effect";
import type { InternalError } from "@runledger/core";
import type { Session } from "./session.js";
import { metricRow } from "./rows.js";
import type { DbMetric } from "./types.js";

type Ordered = Pick<DbMetric, "step" | "timestamp" | "value">;

/** True when `a` sorts strictly after `b` by (step, timestamp, value). */
export function isNewerMetric(a: Ordered, b: Ordered): boolean {
  if (a.step !== b.step) return a.step > b.step;
  if (a.timestamp !== b.timestamp) return a.timestamp > b.timestamp;
  return a.value > b.value;
}

/**
 * Conditional insert backed by the unique index over all fact columns.
 * Returns false when an identical fact was already logged.
 */
export function insertMetricFact(session: Session, fact: DbMetric): Effect.Effect<boolean, InternalError> {
  return session
    .execute(
      `INSERT INTO metrics (run_id, key, value, timestamp, step, is_nan)
       VALUES (?, ?, ?, ?, ?, ?)
       ON CONFLICT DO NOTHING`,
      [fact.run_id, fact.key, fact.value, fact.timestamp, fact.step, fact.is_nan ? 1 : 0],
    )
    .pipe(Effect.map((rs) => rs.rowsAffected === 1));
}

export function findLatestMetric(session: Session, runId: string, key: string): Effect.Effect<DbMetric | null, InternalError> {
  return session
    .execute(
      "SELECT run_id, key, value, timestamp, step, is_nan FROM latest_metrics WHERE run_id = ? AND key = ?",
      [runId, key],
    )
    .pipe(Effect.map((rs) => (rs.rows.length === 0 ? null : metricRow(rs.rows[0]))));
}

export function updateLatestMetricIfNecessary(session: Session, fact: DbMetric): Effect.Effect<void, InternalError> {
  return Effect.gen(function* () {
    const current = yield* findLatestMetric(session, fact.run_id, fact.key);
    if (current !== null && !isNewerMetric(fact, current)) return;

    yield* session.execute(
      `INSERT INTO latest_metrics (run_id, key, value, timestamp, step, is_nan)
       VALUES (?, ?, ?, ?, ?, ?)
       ON CONFLICT(run_id, key) DO UPDATE SET
         value = excluded.value,
         timestamp = excluded.timestamp,
         step = excluded.step,
         is_nan = excluded.is_nan`,
      [fact.run_id, fact.key, fact.value, fact.timestamp, fact.step, fact.is_nan ? 1 : 0],
    );
  });
}

/** Every fact for (run, key) in the order it was logged. */
export function findMetricHistory(session: Session, runId: string, key: string): Effect.Effect<DbMetric[], InternalError> {
  return session
    .execute(
      `SELECT run_id, key, value, timestamp, step, is_nan FROM metrics
       WHERE run_id = ? AND key = ? ORDER BY rowid`,
      [runId, key],
    )
    .pipe(Effect.map((rs) => rs.rows.map(metricRow)));
}
