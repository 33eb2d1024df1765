/**
 * Batch logging.
 *
 * A batch is validated as a whole, then applied one item at a time, each in
 * its own transaction: params, then metrics, then tags. It is not atomic.
 * When an item fails, the items before it stay committed and the failure is
 * returned as is. Callers must treat a failed batch as partly applied.
 *
 * Keeping transactions per item keeps the latest_metrics write lock short
 * even for batches of a thousand metrics.
 */
import { Effect } from "effect";
import {
  InternalError,
  validateBatchData,
  validateBatchLimits,
  validateRunId,
  type MetricInput,
  type Param,
  type RunTag,
  type StoreError,
} from "@runledger/core";

export interface Batch {
  metrics?: readonly MetricInput[];
  params?: readonly Param[];
  tags?: readonly RunTag[];
}

/** The single-item operations a batch decomposes into. */
export interface BatchWriter {
  requireActiveRun(runId: string): Effect.Effect<void, StoreError>;
  logParam(runId: string, param: Param): Effect.Effect<void, StoreError>;
  logMetric(runId: string, metric: MetricInput): Effect.Effect<void, StoreError>;
  setTag(runId: string, tag: RunTag): Effect.Effect<void, StoreError>;
}

export function logBatch(writer: BatchWriter, runId: string, batch: Batch): Effect.Effect<void, StoreError> {
  const metrics = batch.metrics ?? [];
  const params = batch.params ?? [];
  const tags = batch.tags ?? [];

  return Effect.gen(function* () {
    yield* validateRunId(runId);
    yield* validateBatchData(metrics, params, tags);
    yield* validateBatchLimits(metrics, params, tags);
    yield* writer.requireActiveRun(runId);

    yield* Effect.forEach(params, (param) => writer.logParam(runId, param), { discard: true });
    yield* Effect.forEach(metrics, (metric) => writer.logMetric(runId, metric), { discard: true });
    yield* Effect.forEach(tags, (tag) => writer.setTag(runId, tag), { discard: true });
    yield* Effect.logDebug(
      `Logged batch for run ${runId}: ${params.length} params, ${metrics.length} metrics, ${tags.length} tags`,
    );
  }).pipe(
    Effect.annotateLogs("runId", runId),
    Effect.catchAllDefect((defect) =>
      Effect.fail(new InternalError({ message: `Batch logging for run ${runId} failed unexpectedly`, cause: defect })),
    ),
  );
}
