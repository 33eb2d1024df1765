/**
 * Command: runledger db
 *
 * Usage:
 *   runledger db upgrade <database-url>
 *   runledger db version <database-url>
 */
import type { Client } from "@libsql/client";
import { Effect } from "effect";
import type { InternalError } from "@runledger/core";
import { closeClient, openClient, sqlMigrator } from "@runledger/db";
import { parseKV, positionals } from "../parse.js";
import { runCommand } from "../run.js";

function withClient<A>(url: string, use: (client: Client) => Effect.Effect<A, InternalError>) {
  return Effect.acquireUseRelease(openClient({ url, authToken: process.env.RUNLEDGER_AUTH_TOKEN }), use, closeClient);
}

export async function dbCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const [sub, urlArg] = positionals(args);
  const url = urlArg ?? kv["url"] ?? process.env.RUNLEDGER_DATABASE_URL;
  if (!url) throw new Error("Missing database URL: runledger db <upgrade|version> <database-url>");

  if (sub === "upgrade") {
    const applied = await runCommand(
      withClient(url, (client) =>
        Effect.gen(function* () {
          const count = yield* sqlMigrator.migrateToLatest(client);
          const version = yield* sqlMigrator.currentSchemaVersion(client);
          return { count, version };
        }),
      ),
    );
    console.log(
      applied.count === 0
        ? `Schema is up to date (version ${applied.version})`
        : `Applied ${applied.count} migration(s); schema is now at version ${applied.version}`,
    );
  } else if (sub === "version") {
    const found = await runCommand(withClient(url, (client) => sqlMigrator.currentSchemaVersion(client)));
    const expected = sqlMigrator.expectedSchemaVersion();
    console.log(`Database schema version: ${found}`);
    console.log(`Expected schema version: ${expected}`);
    if (found !== expected) console.log(`Run 'runledger db upgrade ${url}' to migrate.`);
  } else {
    throw new Error(`Unknown db command: ${sub ?? "(none)"}. Expected upgrade or version.`);
  }
}
