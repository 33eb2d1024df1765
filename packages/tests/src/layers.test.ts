import { describe, it, expect } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect, Logger, LogLevel } from "effect";
import { TrackingStoreService } from "@runledger/core";
import { TrackingStoreLive } from "@runledger/effect-runtime";

describe("TrackingStoreLive", () => {
  it("provides an opened store for the duration of a program", async () => {
    const dir = await mkdtemp(join(tmpdir(), "runledger-layer-"));
    try {
      const program = Effect.gen(function* () {
        const store = yield* TrackingStoreService;
        const id = yield* store.createExperiment("from-layer");
        const experiments = yield* store.listExperiments();
        return { id, names: experiments.map((e) => e.name) };
      });

      const result = await Effect.runPromise(
        program.pipe(
          Effect.provide(TrackingStoreLive({ url: `file:${join(dir, "layer.db")}`, artifactRoot: join(dir, "artifacts") })),
          Logger.withMinimumLogLevel(LogLevel.None),
        ),
      );
      expect(result).toEqual({ id: "1", names: ["Default", "from-layer"] });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
