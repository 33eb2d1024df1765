/**
 * Active/Deleted state machine shared by experiments and runs.
 *
 *   create ──▶ active ──delete──▶ deleted ──restore──▶ active
 *
 * Every mutation checks its guard inside the session that writes, so the
 * check and the write commit (or roll back) together.
 */
import { Effect } from "effect";
import { InvalidStateError } from "./errors.js";
import type { LifecycleStage, ViewType } from "./types.js";

export interface LifecycleEntity {
  /** e.g. `experiment 3` or `run 9f2c...` */
  readonly label: string;
  readonly lifecycleStage: LifecycleStage;
}

export function requireActive(entity: LifecycleEntity): Effect.Effect<void, InvalidStateError> {
  if (entity.lifecycleStage === "active") return Effect.void;
  return Effect.fail(
    new InvalidStateError({
      message: `The ${entity.label} must be in the 'active' state. Current state is ${entity.lifecycleStage}.`,
    }),
  );
}

export function requireDeleted(entity: LifecycleEntity): Effect.Effect<void, InvalidStateError> {
  if (entity.lifecycleStage === "deleted") return Effect.void;
  return Effect.fail(
    new InvalidStateError({
      message: `The ${entity.label} must be in the 'deleted' state. Current state is ${entity.lifecycleStage}.`,
    }),
  );
}

export function viewTypeToStages(viewType: ViewType): readonly LifecycleStage[] {
  switch (viewType) {
    case "ACTIVE_ONLY": return ["active"];
    case "DELETED_ONLY": return ["deleted"];
    case "ALL": return ["active", "deleted"];
  }
}
