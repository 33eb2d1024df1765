/**
 * Database schema migrations.
 *
 * Each entry is a migration version. The migrate runner applies them
 * sequentially and tracks the current version in schema_version.
 */

/** Tables whose total absence marks a database that was never initialized. */
export const CORE_TABLES = [
  "experiments",
  "runs",
  "metrics",
  "latest_metrics",
  "params",
  "tags",
  "experiment_tags",
] as const;

export const migrations: string[][] = [
  // Version 1: initial schema
  [
    `CREATE TABLE IF NOT EXISTS experiments (
      experiment_id     INTEGER PRIMARY KEY AUTOINCREMENT,
      name              TEXT NOT NULL UNIQUE,
      artifact_location TEXT,
      lifecycle_stage   TEXT NOT NULL DEFAULT 'active'
                        CHECK(lifecycle_stage IN ('active','deleted'))
    )`,

    `CREATE TABLE IF NOT EXISTS runs (
      run_id          TEXT PRIMARY KEY,
      name            TEXT NOT NULL DEFAULT '',
      experiment_id   INTEGER NOT NULL REFERENCES experiments(experiment_id),
      user_id         TEXT,
      status          TEXT NOT NULL DEFAULT 'RUNNING'
                      CHECK(status IN ('RUNNING','SCHEDULED','FINISHED','FAILED','KILLED')),
      start_time      INTEGER,
      end_time        INTEGER,
      artifact_uri    TEXT NOT NULL,
      lifecycle_stage TEXT NOT NULL DEFAULT 'active'
                      CHECK(lifecycle_stage IN ('active','deleted'))
    )`,

    `CREATE TABLE IF NOT EXISTS metrics (
      run_id    TEXT NOT NULL REFERENCES runs(run_id),
      key       TEXT NOT NULL,
      value     REAL NOT NULL,
      timestamp INTEGER NOT NULL
    )`,

    `CREATE TABLE IF NOT EXISTS params (
      run_id TEXT NOT NULL REFERENCES runs(run_id),
      key    TEXT NOT NULL,
      value  TEXT NOT NULL,
      PRIMARY KEY (run_id, key)
    ) WITHOUT ROWID`,

    `CREATE TABLE IF NOT EXISTS tags (
      run_id TEXT NOT NULL REFERENCES runs(run_id),
      key    TEXT NOT NULL,
      value  TEXT NOT NULL,
      PRIMARY KEY (run_id, key)
    ) WITHOUT ROWID`,

    // Indices
    `CREATE INDEX IF NOT EXISTS idx_runs_experiment ON runs(experiment_id, lifecycle_stage)`,
    `CREATE INDEX IF NOT EXISTS idx_metrics_run_key ON metrics(run_id, key)`,
  ],

  // Version 2: metric steps, NaN flag, one row per distinct fact
  [
    `ALTER TABLE metrics ADD COLUMN step INTEGER NOT NULL DEFAULT 0`,
    `ALTER TABLE metrics ADD COLUMN is_nan INTEGER NOT NULL DEFAULT 0 CHECK(is_nan IN (0,1))`,
    `CREATE UNIQUE INDEX IF NOT EXISTS idx_metrics_fact
       ON metrics(run_id, key, timestamp, step, value, is_nan)`,
  ],

  // Version 3: latest value per (run, key), backfilled from history
  [
    `CREATE TABLE IF NOT EXISTS latest_metrics (
      run_id    TEXT NOT NULL REFERENCES runs(run_id),
      key       TEXT NOT NULL,
      value     REAL NOT NULL,
      timestamp INTEGER NOT NULL,
      step      INTEGER NOT NULL,
      is_nan    INTEGER NOT NULL CHECK(is_nan IN (0,1)),
      PRIMARY KEY (run_id, key)
    ) WITHOUT ROWID`,

    `INSERT OR IGNORE INTO latest_metrics (run_id, key, value, timestamp, step, is_nan)
     SELECT m.run_id, m.key, m.value, m.timestamp, m.step, m.is_nan
     FROM metrics m
     WHERE NOT EXISTS (
       SELECT 1 FROM metrics o
       WHERE o.run_id = m.run_id AND o.key = m.key
         AND (o.step, o.timestamp, o.value) > (m.step, m.timestamp, m.value)
     )`,
  ],

  // Version 4: experiment tags
  [
    `CREATE TABLE IF NOT EXISTS experiment_tags (
      experiment_id INTEGER NOT NULL REFERENCES experiments(experiment_id),
      key           TEXT NOT NULL,
      value         TEXT NOT NULL,
      PRIMARY KEY (experiment_id, key)
    ) WITHOUT ROWID`,
  ],
];
