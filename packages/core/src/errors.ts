/**
 * Typed error classes for every failure kind the store can surface.
 */
import { Data } from "effect";

export class InvalidArgumentError extends Data.TaggedError("InvalidArgumentError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class AlreadyExistsError extends Data.TaggedError("AlreadyExistsError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class NotFoundError extends Data.TaggedError("NotFoundError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Wrong lifecycle stage, or more rows than a key allows (bad data). */
export class InvalidStateError extends Data.TaggedError("InvalidStateError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Anything unexpected from the storage layer; `cause` holds the original. */
export class InternalError extends Data.TaggedError("InternalError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class SchemaVersionError extends Data.TaggedError("SchemaVersionError")<{
  readonly message: string;
  readonly found: number;
  readonly expected: number;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export type StoreError =
  | InvalidArgumentError
  | AlreadyExistsError
  | NotFoundError
  | InvalidStateError
  | InternalError;

export type ErrorCode =
  | "INVALID_PARAMETER_VALUE"
  | "RESOURCE_ALREADY_EXISTS"
  | "RESOURCE_DOES_NOT_EXIST"
  | "INVALID_STATE"
  | "INTERNAL_ERROR";

export function errorCode(err: StoreError | SchemaVersionError | ConfigError): ErrorCode {
  switch (err._tag) {
    case "InvalidArgumentError":
    case "ConfigError":
      return "INVALID_PARAMETER_VALUE";
    case "AlreadyExistsError": return "RESOURCE_ALREADY_EXISTS";
    case "NotFoundError": return "RESOURCE_DOES_NOT_EXIST";
    case "InvalidStateError": return "INVALID_STATE";
    case "InternalError":
    case "SchemaVersionError":
      return "INTERNAL_ERROR";
  }
}
