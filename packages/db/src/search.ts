/**
 * Run search: fetch candidate runs in one read session, then hand them to a
 * RunQueryEngine for filtering, ordering and paging.
 */
import { Effect } from "effect";
import {
  InvalidArgumentError,
  SEARCH_MAX_RESULTS_DEFAULT,
  SEARCH_MAX_RESULTS_THRESHOLD,
  viewTypeToStages,
  type InternalError,
  type RunPage,
  type RunQueryEngine,
  type SearchRunsInput,
} from "@runledger/core";
import type { SessionManager } from "./session.js";
import { parseExperimentId } from "./experiments.js";
import { loadRunsWithData } from "./runs.js";
import { placeholders } from "./rows.js";
import { toRun } from "./entities.js";
import type { DbRunWithData } from "./types.js";

export function validateMaxResults(maxResults: number): Effect.Effect<number, InvalidArgumentError> {
  if (!Number.isInteger(maxResults) || maxResults < 1 || maxResults > SEARCH_MAX_RESULTS_THRESHOLD) {
    return Effect.fail(
      new InvalidArgumentError({
        message: `Invalid value for request parameter max_results. It must be a positive integer at most ${SEARCH_MAX_RESULTS_THRESHOLD}, but got value ${maxResults}`,
      }),
    );
  }
  return Effect.succeed(maxResults);
}

/**
 * `maxResults` defaults to SEARCH_MAX_RESULTS_DEFAULT and is capped at
 * SEARCH_MAX_RESULTS_THRESHOLD. There is no unbounded call: a single page
 * holds every match only when there are at most that many of them.
 */
export function searchRuns(
  sessions: SessionManager,
  engine: RunQueryEngine,
  input: SearchRunsInput,
): Effect.Effect<RunPage, InvalidArgumentError | InternalError> {
  return Effect.gen(function* () {
    const maxResults = yield* validateMaxResults(input.maxResults ?? SEARCH_MAX_RESULTS_DEFAULT);
    const ids = yield* Effect.forEach(input.experimentIds, parseExperimentId);
    const stages = viewTypeToStages(input.viewType ?? "ACTIVE_ONLY");

    const loaded: DbRunWithData[] =
      ids.length === 0
        ? []
        : yield* sessions.withSession("read", (session) =>
            loadRunsWithData(session, {
              sql: `experiment_id IN (${placeholders(ids.length)}) AND lifecycle_stage IN (${placeholders(stages.length)})`,
              args: [...ids, ...stages],
            }),
          );

    const page = yield* engine.apply(loaded.map(toRun), {
      filter: input.filter,
      orderBy: input.orderBy,
      pageToken: input.pageToken,
      maxResults,
    });
    yield* Effect.logDebug(`searchRuns returned ${page.runs.length} runs from ${loaded.length} candidates`);
    return page;
  });
}
