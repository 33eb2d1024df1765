import { describe, it, expect, vi } from "vitest";
import { Effect } from "effect";
import { isRemoteUrl, loadStoreConfig, localArtifactDir } from "@runledger/db";
import { LoggerLive, parseLogLevel } from "@runledger/effect-runtime";

describe("loadStoreConfig", () => {
  it("reads the environment and applies defaults", () => {
    const config = Effect.runSync(loadStoreConfig({}, { RUNLEDGER_DATABASE_URL: "file:runs.db" }));
    expect(config).toEqual({ url: "file:runs.db", artifactRoot: "./runs", logLevel: "info" });
  });

  it("prefers explicit options over the environment", () => {
    const config = Effect.runSync(
      loadStoreConfig(
        { url: "libsql://tracking.example.test", authToken: "test-token", logLevel: "WARNING" },
        { RUNLEDGER_DATABASE_URL: "file:ignored.db", RUNLEDGER_ARTIFACT_ROOT: "s3://bucket/runs" },
      ),
    );
    expect(config).toEqual({
      url: "libsql://tracking.example.test",
      authToken: "test-token",
      artifactRoot: "s3://bucket/runs",
      logLevel: "warn",
    });
  });

  it("fails without a database URL or with an unsupported one", () => {
    const missing = Effect.runSync(Effect.flip(loadStoreConfig({}, {})));
    expect(missing._tag).toBe("ConfigError");
    const mysql = Effect.runSync(Effect.flip(loadStoreConfig({ url: "mysql://db/tracking" }, {})));
    expect(mysql._tag).toBe("ConfigError");
  });

  it("fails on an unknown log level", () => {
    const error = Effect.runSync(Effect.flip(loadStoreConfig({ url: "file:x.db", logLevel: "verbose" }, {})));
    expect(error.message).toBe('Unknown log level "verbose"');
  });
});

describe("locations", () => {
  it("treats only file: URLs as local databases", () => {
    expect(isRemoteUrl("file:runs.db")).toBe(false);
    expect(isRemoteUrl("libsql://tracking.example.test")).toBe(true);
  });

  it("resolves local artifact roots and skips remote ones", () => {
    expect(localArtifactDir("./runs")).toBe("./runs");
    expect(localArtifactDir("file:///tmp/runs")).toBe("/tmp/runs");
    expect(localArtifactDir("s3://bucket/runs")).toBeNull();
  });
});

describe("logging", () => {
  it("parses log levels, defaulting to info", () => {
    expect(parseLogLevel("DEBUG").label).toBe("DEBUG");
    expect(parseLogLevel("warning").label).toBe("WARN");
    expect(parseLogLevel("chatty").label).toBe("INFO");
  });

  it("writes timestamped lines at or above the configured level", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    try {
      Effect.runSync(
        Effect.zipRight(Effect.logDebug("hidden"), Effect.logInfo("hello")).pipe(Effect.provide(LoggerLive("info"))),
      );
      expect(spy).toHaveBeenCalledTimes(1);
      expect(String(spy.mock.calls[0][0])).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] INFO  hello$/);
    } finally {
      spy.mockRestore();
    }
  });
});
