/**
 * Runs a command's Effect with the CLI logger and turns failures into an
 * error line and exit status 1.
 */
import { Cause, Effect, Exit, Option } from "effect";
import { errorCode, type ConfigError, type SchemaVersionError, type StoreError } from "@runledger/core";
import { LoggerLive } from "@runledger/effect-runtime";

export type CommandError = StoreError | SchemaVersionError | ConfigError;

export async function runCommand<A>(effect: Effect.Effect<A, CommandError>): Promise<A> {
  const level = process.env.RUNLEDGER_LOG_LEVEL ?? "info";
  const exit = await Effect.runPromiseExit(effect.pipe(Effect.provide(LoggerLive(level))));
  if (Exit.isSuccess(exit)) return exit.value;

  const failure = Cause.failureOption(exit.cause);
  if (Option.isSome(failure)) {
    console.error(`Error [${errorCode(failure.value)}]: ${failure.value.message}`);
  } else {
    console.error(`Fatal: ${Cause.pretty(exit.cause)}`);
  }
  process.exit(1);
}
