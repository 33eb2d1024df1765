export { openStore, SqlTrackingStore, ARTIFACTS_FOLDER_NAME, type OpenStoreDeps } from "./store.js";
export { loadStoreConfig, isRemoteUrl, DEFAULT_ARTIFACT_ROOT, type StoreConfig, type StoreOptions, type LogLevelName } from "./config.js";
export { openClient, closeClient } from "./client.js";
export { SessionManager, isBusy, isUniqueViolation, type Session, type SessionMode, type SessionManagerOptions } from "./session.js";
export { createMigrator, readSchemaVersion, sqlMigrator } from "./migrate.js";
export { migrations, CORE_TABLES } from "./schema.js";
export { countCoreTables, localArtifactDir } from "./bootstrap.js";
export { isNewerMetric } from "./metrics.js";
export { normalizeMetricValue } from "./entities.js";
export type { Batch, BatchWriter } from "./batch.js";
