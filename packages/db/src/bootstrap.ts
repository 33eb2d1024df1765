/**
 * Startup checks, run once before the store takes traffic:
 *
 * 1. A database with none of the core tables is migrated from scratch.
 * 2. The live schema version must equal the expected one. A database that
 *    is merely behind is never migrated implicitly; the operator upgrades it.
 * 3. A local artifact root is created on disk.
 * 4. An empty experiments table gets the default experiment (id 0).
 */
import { mkdir } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import type { Client } from "@libsql/client";
import { Effect } from "effect";
import {
  DEFAULT_EXPERIMENT_NAME,
  InternalError,
  SchemaVersionError,
  joinUri,
  type SchemaMigrator,
} from "@runledger/core";
import { CORE_TABLES } from "./schema.js";
import { placeholders } from "./rows.js";
import { findExperiments, insertDefaultExperiment } from "./experiments.js";
import type { SessionManager } from "./session.js";

export function countCoreTables(client: Client): Effect.Effect<number, InternalError> {
  return Effect.tryPromise({
    try: async () => {
      const rs = await client.execute({
        sql: `SELECT name FROM sqlite_master WHERE type = 'table' AND name IN (${placeholders(CORE_TABLES.length)})`,
        args: [...CORE_TABLES],
      });
      return rs.rows.length;
    },
    catch: (cause) => new InternalError({ message: `Failed to inspect database schema: ${String(cause)}`, cause }),
  });
}

export function initializeTablesIfAbsent(
  client: Client,
  migrator: SchemaMigrator<Client>,
): Effect.Effect<void, InternalError> {
  return Effect.gen(function* () {
    if ((yield* countCoreTables(client)) > 0) return;
    yield* Effect.logInfo("Creating initial database tables...");
    yield* migrator.migrateToLatest(client);
  });
}

export function verifySchema(
  client: Client,
  migrator: SchemaMigrator<Client>,
): Effect.Effect<void, SchemaVersionError | InternalError> {
  return Effect.gen(function* () {
    const found = yield* migrator.currentSchemaVersion(client);
    const expected = migrator.expectedSchemaVersion();
    if (found === expected) return;
    return yield* Effect.fail(
      new SchemaVersionError({
        found,
        expected,
        message:
          `Detected out-of-date database schema (found version ${found}, but expected ${expected}). ` +
          "Take a backup of your database, then run 'runledger db upgrade <database_url>' to migrate " +
          "your database to the latest schema. NOTE: schema migration may result in database downtime.",
      }),
    );
  });
}

/** The directory behind a plain path or file: URI; null for remote stores. */
export function localArtifactDir(root: string): string | null {
  if (root.startsWith("file:")) return fileURLToPath(root);
  if (/^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//.test(root)) return null;
  return root;
}

export function ensureArtifactRoot(root: string): Effect.Effect<void, InternalError> {
  const dir = localArtifactDir(root);
  if (dir === null) return Effect.void;
  return Effect.tryPromise({
    try: async () => {
      await mkdir(dir, { recursive: true });
    },
    catch: (cause) => new InternalError({ message: `Failed to create artifact root ${dir}`, cause }),
  });
}

export function seedDefaultExperiment(sessions: SessionManager, artifactRoot: string): Effect.Effect<void, InternalError> {
  return sessions.withSession("write", (session) =>
    Effect.gen(function* () {
      const existing = yield* findExperiments(session, { viewType: "ALL" });
      if (existing.length > 0) return;
      yield* insertDefaultExperiment(session, DEFAULT_EXPERIMENT_NAME, joinUri(artifactRoot, "0"));
      yield* Effect.logInfo("Created default experiment 0");
    }),
  );
}
