/**
 * Database client lifecycle: openClient / closeClient.
 */
import { createClient, type Client } from "@libsql/client";
import { Effect } from "effect";
import { InternalError } from "@runledger/core";
import { isRemoteUrl, type StoreConfig } from "./config.js";

export function openClient(config: Pick<StoreConfig, "url" | "authToken">): Effect.Effect<Client, InternalError> {
  return Effect.tryPromise({
    try: async () => {
      const client = createClient({ url: config.url, authToken: config.authToken });

      // WAL, FK and busy timeout only apply to local SQLite files and hold per
      // connection. They are issued outside any transaction; journal_mode
      // cannot change inside one. The busy wait blocks the event loop, so it
      // stays short and sessions retry on SQLITE_BUSY instead.
      if (!isRemoteUrl(config.url)) {
        await client.execute("PRAGMA journal_mode=WAL");
        await client.execute("PRAGMA foreign_keys=ON");
        await client.execute("PRAGMA busy_timeout=100");
      }
      return client;
    },
    catch: (cause) => new InternalError({ message: `Failed to open database at ${config.url}: ${String(cause)}`, cause }),
  });
}

export function closeClient(client: Client): Effect.Effect<void> {
  return Effect.sync(() => {
    if (!client.closed) client.close();
  });
}
