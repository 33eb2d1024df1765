/**
 * Domain objects for the tracking store.
 *
 * These are the only shapes callers see: plain readonly values with no
 * database handles attached.
 */

// ── Lifecycle ──────────────────────────────────────────────────────────────
export type LifecycleStage = "active" | "deleted";

export type ViewType = "ACTIVE_ONLY" | "DELETED_ONLY" | "ALL";

export const VIEW_TYPES: readonly ViewType[] = ["ACTIVE_ONLY", "DELETED_ONLY", "ALL"];

const VIEW_TYPE_SET: ReadonlySet<string> = new Set(VIEW_TYPES);

export function isViewType(value: string): value is ViewType {
  return VIEW_TYPE_SET.has(value);
}

// ── Run status ─────────────────────────────────────────────────────────────
export const RUN_STATUSES = ["RUNNING", "SCHEDULED", "FINISHED", "FAILED", "KILLED"] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

const RUN_STATUS_SET: ReadonlySet<string> = new Set(RUN_STATUSES);

export function isRunStatus(value: string): value is RunStatus {
  return RUN_STATUS_SET.has(value);
}

// ── Experiments ────────────────────────────────────────────────────────────
export const DEFAULT_EXPERIMENT_ID = "0";
export const DEFAULT_EXPERIMENT_NAME = "Default";

export interface ExperimentTag {
  readonly key: string;
  readonly value: string;
}

export interface Experiment {
  readonly experimentId: string;
  readonly name: string;
  readonly artifactLocation: string;
  readonly lifecycleStage: LifecycleStage;
  readonly tags: readonly ExperimentTag[];
}

// ── Runs ───────────────────────────────────────────────────────────────────
export interface Metric {
  readonly key: string;
  /** Stored value: 0 when `isNan`, infinities clamped to ±Number.MAX_VALUE. */
  readonly value: number;
  readonly timestamp: number;
  readonly step: number;
  readonly isNan: boolean;
}

/** What a caller logs. `value` may be NaN or ±Infinity; `step` defaults to 0. */
export interface MetricInput {
  readonly key: string;
  readonly value: number;
  readonly timestamp: number;
  readonly step?: number;
}

export interface Param {
  readonly key: string;
  readonly value: string;
}

export interface RunTag {
  readonly key: string;
  readonly value: string;
}

export interface RunInfo {
  readonly runId: string;
  readonly runName: string;
  readonly experimentId: string;
  readonly userId: string | null;
  readonly status: RunStatus;
  readonly startTime: number | null;
  readonly endTime: number | null;
  readonly artifactUri: string;
  readonly lifecycleStage: LifecycleStage;
}

export interface RunData {
  /** Latest value per metric key. */
  readonly metrics: readonly Metric[];
  readonly params: readonly Param[];
  readonly tags: readonly RunTag[];
}

export interface Run {
  readonly info: RunInfo;
  readonly data: RunData;
}

export interface CreateRunInput {
  readonly experimentId: string;
  readonly userId?: string | null;
  readonly startTime?: number | null;
  readonly tags?: readonly RunTag[];
  readonly runName?: string;
}

// ── Search ─────────────────────────────────────────────────────────────────
export interface OrderByClause {
  /** `metrics.acc`, `params.lr`, `tags.team`, `attributes.start_time`, ... */
  readonly field: string;
  readonly direction?: "ASC" | "DESC";
}

export interface SearchRunsInput {
  readonly experimentIds: readonly string[];
  readonly filter?: string;
  readonly viewType?: ViewType;
  readonly maxResults?: number;
  readonly orderBy?: ReadonlyArray<OrderByClause | string>;
  readonly pageToken?: string;
}

export interface RunPage {
  readonly runs: readonly Run[];
  /** Absent once the last page has been returned. */
  readonly nextPageToken?: string;
}
