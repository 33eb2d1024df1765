/**
 * Store configuration: explicit options first, then the environment.
 *
 *   RUNLEDGER_DATABASE_URL   file:./runledger.db, libsql://..., http(s)://...
 *   RUNLEDGER_AUTH_TOKEN     remote libSQL only
 *   RUNLEDGER_ARTIFACT_ROOT  default ./runs
 *   RUNLEDGER_LOG_LEVEL      debug | info | warn | error (default info)
 */
import { Effect } from "effect";
import { ConfigError } from "@runledger/core";

export type LogLevelName = "debug" | "info" | "warn" | "error";

export interface StoreConfig {
  readonly url: string;
  readonly authToken?: string;
  readonly artifactRoot: string;
  readonly logLevel: LogLevelName;
}

export interface StoreOptions {
  url?: string;
  authToken?: string;
  artifactRoot?: string;
  logLevel?: string;
}

export const DEFAULT_ARTIFACT_ROOT = "./runs";

const SUPPORTED_SCHEMES = ["file:", "libsql:", "http:", "https:", "ws:", "wss:"];

export function isRemoteUrl(url: string): boolean {
  return !url.startsWith("file:");
}

function toLogLevel(raw: string): LogLevelName | null {
  switch (raw.toLowerCase()) {
    case "debug": return "debug";
    case "info": return "info";
    case "warn":
    case "warning": return "warn";
    case "error": return "error";
    default: return null;
  }
}

export function loadStoreConfig(
  opts: StoreOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): Effect.Effect<StoreConfig, ConfigError> {
  const url = opts.url ?? env.RUNLEDGER_DATABASE_URL;
  const authToken = opts.authToken ?? env.RUNLEDGER_AUTH_TOKEN;
  const artifactRoot = opts.artifactRoot ?? env.RUNLEDGER_ARTIFACT_ROOT ?? DEFAULT_ARTIFACT_ROOT;
  const rawLevel = opts.logLevel ?? env.RUNLEDGER_LOG_LEVEL ?? "info";

  if (!url) {
    return Effect.fail(new ConfigError({ message: "No database URL: set RUNLEDGER_DATABASE_URL or pass opts.url" }));
  }
  if (!SUPPORTED_SCHEMES.some((scheme) => url.startsWith(scheme))) {
    return Effect.fail(
      new ConfigError({ message: `Unsupported database URL "${url}" (expected one of ${SUPPORTED_SCHEMES.join(", ")})` }),
    );
  }
  if (artifactRoot.length === 0) {
    return Effect.fail(new ConfigError({ message: "Artifact root must not be empty" }));
  }
  const logLevel = toLogLevel(rawLevel);
  if (logLevel === null) {
    return Effect.fail(new ConfigError({ message: `Unknown log level "${rawLevel}"` }));
  }

  return Effect.succeed({ url, authToken, artifactRoot, logLevel });
}
