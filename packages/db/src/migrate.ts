/**
 * Version-based migration runner.
 *
 * Tracks applied versions in a schema_version table and applies
 * pending migrations via client.batch().
 */
import type { Client } from "@libsql/client";
import { Effect } from "effect";
import { InternalError, type SchemaMigrator } from "@runledger/core";
import { migrations } from "./schema.js";
import { int } from "./rows.js";

function query<A>(what: string, run: () => Promise<A>): Effect.Effect<A, InternalError> {
  return Effect.tryPromise({
    try: run,
    catch: (cause) => new InternalError({ message: `${what}: ${String(cause)}`, cause }),
  });
}

/** Highest applied version, or 0 when the version table does not exist yet. */
export function readSchemaVersion(client: Client): Effect.Effect<number, InternalError> {
  return query("Failed to read schema version", async () => {
    const table = await client.execute(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'",
    );
    if (table.rows.length === 0) return 0;
    const result = await client.execute("SELECT COALESCE(MAX(version), 0) AS v FROM schema_version");
    return int(result.rows[0], "v");
  });
}

export function createMigrator(steps: readonly string[][] = migrations): SchemaMigrator<Client> {
  return {
    currentSchemaVersion: readSchemaVersion,
    expectedSchemaVersion: () => steps.length,
    migrateToLatest: (client) =>
      Effect.gen(function* () {
        // Ensure schema_version table exists
        yield* query("Failed to create schema_version", () =>
          client.execute(
            `CREATE TABLE IF NOT EXISTS schema_version (
              version INTEGER PRIMARY KEY,
              applied_at TEXT NOT NULL DEFAULT (datetime('now'))
            )`,
          ),
        );

        const current = yield* readSchemaVersion(client);

        let applied = 0;
        for (let i = current; i < steps.length; i++) {
          const version = i + 1;
          yield* query(`Migration to version ${version} failed`, () =>
            client.batch(
              [
                ...steps[i].map((sql) => ({ sql, args: [] })),
                { sql: "INSERT INTO schema_version (version) VALUES (?)", args: [version] },
              ],
              "write",
            ),
          );
          yield* Effect.logInfo(`Applied schema migration v${version}`);
          applied++;
        }
        return applied;
      }),
  };
}

export const sqlMigrator: SchemaMigrator<Client> = createMigrator();
