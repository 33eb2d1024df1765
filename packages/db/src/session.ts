/**
 * Scoped transactional sessions.
 *
 * `withSession` begins a transaction, hands a `Session` to the body, commits
 * when the body succeeds and rolls back when it fails. Typed failures from
 * the body come out unchanged; driver errors and defects come out as
 * InternalError.
 *
 * On a local SQLite file the manager owns its connections and drives
 * BEGIN/COMMIT on them itself: writes go through the store's client, one at a
 * time, and reads borrow a connection from a small pool. Remote databases use
 * the client's interactive transactions instead.
 *
 * A lock held by another process surfaces as SQLITE_BUSY; begin and commit are
 * retried on a capped backoff instead of failing at once.
 */
import { LibsqlError, type Client, type InStatement, type InValue, type ResultSet } from "@libsql/client";
import { Effect, Exit, Pool, Schedule, Scope } from "effect";
import { InternalError } from "@runledger/core";
import { closeClient, openClient } from "./client.js";
import { isRemoteUrl, type StoreConfig } from "./config.js";

export type SessionMode = "read" | "write";

export interface Session {
  readonly mode: SessionMode;
  execute(sql: string, args?: InValue[]): Effect.Effect<ResultSet, InternalError>;
  /**
   * Runs `body` under a savepoint. On failure only the savepoint is rolled
   * back; the session stays usable and sees the state from before `body`.
   */
  savepoint<A, E>(name: string, body: Effect.Effect<A, E>): Effect.Effect<A, E | InternalError>;
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/** A UNIQUE or PRIMARY KEY violation reported by the database. */
export function isUniqueViolation(err: InternalError): boolean {
  const cause = err.cause;
  if (!(cause instanceof LibsqlError)) return false;
  return (
    cause.code === "SQLITE_CONSTRAINT_UNIQUE" ||
    cause.code === "SQLITE_CONSTRAINT_PRIMARYKEY" ||
    cause.message.includes("UNIQUE constraint failed")
  );
}

/** Driver errors that mean another connection holds the lock. */
export function isBusy(err: InternalError): boolean {
  const cause = err.cause;
  if (!(cause instanceof LibsqlError)) return false;
  return cause.code.startsWith("SQLITE_BUSY") || cause.message.includes("database is locked");
}

/** 10ms doubling up to 250ms between attempts, about 15 seconds in all. */
const busyRetry = Schedule.exponential("10 millis").pipe(
  Schedule.union(Schedule.spaced("250 millis")),
  Schedule.intersect(Schedule.recurs(60)),
);

/** The part of a libSQL `Transaction` a session needs. */
interface Tx {
  execute(stmt: InStatement): Promise<ResultSet>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  close(): void;
}

/** A transaction opened with a plain BEGIN on a connection the manager owns. */
class ConnectionTx implements Tx {
  constructor(private readonly conn: Client) {}

  static async begin(conn: Client, mode: SessionMode): Promise<ConnectionTx> {
    await conn.execute(mode === "write" ? "BEGIN IMMEDIATE" : "BEGIN DEFERRED");
    return new ConnectionTx(conn);
  }

  execute(stmt: InStatement): Promise<ResultSet> {
    return this.conn.execute(stmt);
  }

  async commit(): Promise<void> {
    await this.conn.execute("COMMIT");
  }

  async rollback(): Promise<void> {
    await this.conn.execute("ROLLBACK");
  }

  close(): void {
    // The connection goes back to its owner open.
  }
}

class TxSession implements Session {
  constructor(
    private readonly tx: Tx,
    readonly mode: SessionMode,
  ) {}

  execute(sql: string, args: InValue[] = []): Effect.Effect<ResultSet, InternalError> {
    return Effect.tryPromise({
      try: () => this.tx.execute({ sql, args }),
      catch: (cause) => new InternalError({ message: `Query failed: ${describe(cause)}`, cause }),
    });
  }

  savepoint<A, E>(name: string, body: Effect.Effect<A, E>): Effect.Effect<A, E | InternalError> {
    return Effect.zipRight(this.execute(`SAVEPOINT ${name}`), body).pipe(
      Effect.tap(() => this.execute(`RELEASE SAVEPOINT ${name}`)),
      Effect.tapError(() =>
        Effect.zipRight(this.execute(`ROLLBACK TO SAVEPOINT ${name}`), this.execute(`RELEASE SAVEPOINT ${name}`)),
      ),
    );
  }
}

type Backend =
  | { readonly kind: "local"; readonly writer: Client; readonly readers: Pool.Pool<Client, InternalError> }
  | { readonly kind: "remote"; readonly client: Client };

export interface SessionManagerOptions {
  /** Read connections kept open for a local database. */
  readers?: number;
}

export class SessionManager {
  private constructor(
    private readonly backend: Backend,
    private readonly writeLock: Effect.Semaphore,
    private readonly scope: Scope.CloseableScope,
  ) {}

  /**
   * `client` carries the writes and stays owned by the caller. Read
   * connections for a local database are opened here and closed by `close`.
   */
  static make(
    client: Client,
    config: Pick<StoreConfig, "url" | "authToken">,
    options: SessionManagerOptions = {},
  ): Effect.Effect<SessionManager> {
    return Effect.gen(function* () {
      const scope = yield* Scope.make();
      const lock = yield* Effect.makeSemaphore(1);
      if (isRemoteUrl(config.url)) {
        return new SessionManager({ kind: "remote", client }, lock, scope);
      }
      const readers = yield* Pool.make({
        acquire: Effect.acquireRelease(openClient(config), closeClient),
        size: options.readers ?? 4,
      }).pipe(Scope.extend(scope));
      return new SessionManager({ kind: "local", writer: client, readers }, lock, scope);
    });
  }

  /** Closes the read connections. Sessions must not be started afterwards. */
  close(): Effect.Effect<void> {
    return Scope.close(this.scope, Exit.void);
  }

  withSession<A, E>(
    mode: SessionMode,
    use: (session: Session) => Effect.Effect<A, E>,
  ): Effect.Effect<A, E | InternalError> {
    const transacted = this.onConnection(mode, use);
    const admitted = mode === "write" ? this.writeLock.withPermits(1)(transacted) : transacted;
    return Effect.catchAllDefect(admitted, (defect) =>
      Effect.fail(new InternalError({ message: `Unexpected failure in ${mode} session: ${describe(defect)}`, cause: defect })),
    );
  }

  private onConnection<A, E>(
    mode: SessionMode,
    use: (session: Session) => Effect.Effect<A, E>,
  ): Effect.Effect<A, E | InternalError> {
    const backend = this.backend;
    if (backend.kind === "remote") {
      // "write" is BEGIN IMMEDIATE: the write lock is held from the first statement.
      return transact(mode, () => backend.client.transaction(mode === "write" ? "write" : "deferred"), use);
    }
    if (mode === "write") return transact(mode, () => ConnectionTx.begin(backend.writer, mode), use);
    return Effect.scoped(
      Effect.flatMap(Pool.get(backend.readers), (conn) => transact(mode, () => ConnectionTx.begin(conn, mode), use)),
    );
  }
}

function transact<A, E>(
  mode: SessionMode,
  open: () => Promise<Tx>,
  use: (session: Session) => Effect.Effect<A, E>,
): Effect.Effect<A, E | InternalError> {
  return Effect.acquireUseRelease(
    begin(mode, open),
    (tx) => Effect.flatMap(use(new TxSession(tx, mode)), (a) => Effect.as(commit(tx), a)),
    (tx, exit) => release(tx, exit),
  );
}

function begin(mode: SessionMode, open: () => Promise<Tx>): Effect.Effect<Tx, InternalError> {
  return Effect.tryPromise({
    try: open,
    catch: (cause) => new InternalError({ message: `Failed to begin ${mode} transaction: ${describe(cause)}`, cause }),
  }).pipe(Effect.retry({ schedule: busyRetry, while: isBusy }));
}

function commit(tx: Tx): Effect.Effect<void, InternalError> {
  return Effect.tryPromise({
    try: () => tx.commit(),
    catch: (cause) => new InternalError({ message: `Commit failed: ${describe(cause)}`, cause }),
  }).pipe(Effect.retry({ schedule: busyRetry, while: isBusy }));
}

function release<A, E>(tx: Tx, exit: Exit.Exit<A, E>): Effect.Effect<void> {
  const rollback = Exit.isSuccess(exit)
    ? Effect.void
    : Effect.tryPromise({ try: () => tx.rollback(), catch: (cause) => cause }).pipe(
        Effect.catchAll((cause) => Effect.logWarning(`Rollback failed: ${describe(cause)}`)),
      );
  return Effect.ensuring(rollback, Effect.sync(() => tx.close()));
}
