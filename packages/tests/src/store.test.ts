import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "node:fs";
import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import { createClient } from "@libsql/client";
import { Effect, Logger, LogLevel, Option } from "effect";
import type { MetricInput } from "@runledger/core";
import { createMigrator, migrations, openStore, type SqlTrackingStore } from "@runledger/db";

const quiet = <A, E>(effect: Effect.Effect<A, E>) => effect.pipe(Logger.withMinimumLogLevel(LogLevel.None));
const run = <A, E>(effect: Effect.Effect<A, E>): Promise<A> => Effect.runPromise(quiet(effect));
const fail = <A, E>(effect: Effect.Effect<A, E>): Promise<E> => Effect.runPromise(quiet(Effect.flip(effect)));

let dir: string;
let artifactRoot: string;
let url: string;
let store: SqlTrackingStore;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "runledger-store-"));
  artifactRoot = join(dir, "artifacts");
  url = `file:${join(dir, "store.db")}`;
  store = await run(openStore({ url, artifactRoot }));
});

afterEach(async () => {
  await run(store.close());
  await rm(dir, { recursive: true, force: true });
});

async function newRun(experimentId = "0") {
  return run(store.createRun({ experimentId, userId: "tester", startTime: 1000 }));
}

describe("bootstrap", () => {
  it("creates the default experiment and the artifact root", async () => {
    const experiments = await run(store.listExperiments());
    expect(experiments).toEqual([
      {
        experimentId: "0",
        name: "Default",
        artifactLocation: `${artifactRoot}/0`,
        lifecycleStage: "active",
        tags: [],
      },
    ]);
    expect(existsSync(artifactRoot)).toBe(true);
  });

  it("does not seed a second default experiment on reopen", async () => {
    await run(store.close());
    store = await run(openStore({ url, artifactRoot }));
    expect((await run(store.listExperiments("ALL"))).map((e) => e.experimentId)).toEqual(["0"]);
  });

  it("refuses a database whose schema is behind", async () => {
    const oldUrl = `file:${join(dir, "old.db")}`;
    const old = await run(openStore({ url: oldUrl, artifactRoot }, { migrator: createMigrator(migrations.slice(0, 3)) }));
    await run(old.close());

    const error = await fail(openStore({ url: oldUrl, artifactRoot }));
    expect(error._tag).toBe("SchemaVersionError");
    if (error._tag === "SchemaVersionError") {
      expect(error.found).toBe(3);
      expect(error.expected).toBe(4);
      expect(error.message).toContain("runledger db upgrade <database_url>");
    }
  });
});

describe("experiments", () => {
  it("assigns ids from 1 and derives the artifact location from the id", async () => {
    const id = await run(store.createExperiment("exp1"));
    expect(id).toBe("1");
    const experiment = await run(store.getExperiment(id));
    expect(experiment.name).toBe("exp1");
    expect(experiment.artifactLocation).toBe(`${artifactRoot}/1`);
  });

  it("keeps an explicit artifact location", async () => {
    const id = await run(store.createExperiment("exp2", "s3://bucket/exp2"));
    expect((await run(store.getExperiment(id))).artifactLocation).toBe("s3://bucket/exp2");
  });

  it("rejects duplicate and empty names", async () => {
    await run(store.createExperiment("exp1"));
    const dup = await fail(store.createExperiment("exp1"));
    expect(dup._tag).toBe("AlreadyExistsError");
    expect(dup.message).toBe("Experiment(name=exp1) already exists. Names of deleted experiments stay reserved.");
    expect((await fail(store.createExperiment("")))._tag).toBe("InvalidArgumentError");
  });

  it("keeps a deleted experiment's name reserved", async () => {
    const id = await run(store.createExperiment("exp1"));
    await run(store.deleteExperiment(id));
    const reused = await fail(store.createExperiment("exp1"));
    expect(reused._tag).toBe("AlreadyExistsError");
    expect(reused.message).toBe("Experiment(name=exp1) already exists. Names of deleted experiments stay reserved.");
  });

  it("looks experiments up by name", async () => {
    await run(store.createExperiment("exp1"));
    const found = await run(store.getExperimentByName("exp1"));
    expect(Option.getOrNull(Option.map(found, (e) => e.experimentId))).toBe("1");
    expect(Option.isNone(await run(store.getExperimentByName("missing")))).toBe(true);
  });

  it("reports unknown and malformed ids", async () => {
    const missing = await fail(store.getExperiment("999"));
    expect(missing._tag).toBe("NotFoundError");
    expect(missing.message).toBe("No Experiment with id=999 exists");
    expect((await fail(store.getExperiment("abc")))._tag).toBe("InvalidArgumentError");
  });

  it("soft deletes and restores with lifecycle guards", async () => {
    const id = await run(store.createExperiment("exp1"));
    const { info } = await newRun(id);
    await run(store.setExperimentTag(id, { key: "team", value: "a" }));
    await run(store.deleteExperiment(id));

    expect((await run(store.listExperiments())).map((e) => e.experimentId)).toEqual(["0"]);
    expect((await run(store.listExperiments("DELETED_ONLY"))).map((e) => e.experimentId)).toEqual(["1"]);
    expect((await run(store.getExperiment(id))).lifecycleStage).toBe("deleted");

    const again = await fail(store.deleteExperiment(id));
    expect(again._tag).toBe("InvalidStateError");
    expect(again.message).toBe("The experiment 1 must be in the 'active' state. Current state is deleted.");
    expect((await fail(store.createRun({ experimentId: id })))._tag).toBe("InvalidStateError");
    expect((await fail(store.renameExperiment(id, "other")))._tag).toBe("InvalidStateError");

    await run(store.restoreExperiment(id));
    const restored = await run(store.getExperiment(id));
    expect(restored.lifecycleStage).toBe("active");
    expect(restored.tags).toEqual([{ key: "team", value: "a" }]);
    const page = await run(store.searchRuns({ experimentIds: [id] }));
    expect(page.runs.map((r) => r.info.runId)).toEqual([info.runId]);
    expect((await fail(store.restoreExperiment(id)))._tag).toBe("InvalidStateError");
  });

  it("renames, refusing a name already in use", async () => {
    const id = await run(store.createExperiment("exp1"));
    await run(store.createExperiment("exp2"));
    expect((await fail(store.renameExperiment(id, "exp2")))._tag).toBe("AlreadyExistsError");
    await run(store.renameExperiment(id, "renamed"));
    expect((await run(store.getExperiment(id))).name).toBe("renamed");
  });

  it("upserts experiment tags", async () => {
    const id = await run(store.createExperiment("exp1"));
    await run(store.setExperimentTag(id, { key: "team", value: "a" }));
    await run(store.setExperimentTag(id, { key: "team", value: "b" }));
    expect((await run(store.getExperiment(id))).tags).toEqual([{ key: "team", value: "b" }]);
  });
});

describe("runs", () => {
  it("creates a running run under the experiment's artifact location", async () => {
    const experimentId = await run(store.createExperiment("exp1"));
    const created = await run(
      store.createRun({
        experimentId,
        userId: "tester",
        startTime: 1000,
        runName: "first",
        tags: [
          { key: "a", value: "1" },
          { key: "a", value: "2" },
        ],
      }),
    );
    expect(created.info.runId).toMatch(/^[0-9a-f]{32}$/);
    expect(created.info).toEqual({
      runId: created.info.runId,
      runName: "first",
      experimentId: "1",
      userId: "tester",
      status: "RUNNING",
      startTime: 1000,
      endTime: null,
      artifactUri: `${artifactRoot}/1/${created.info.runId}/artifacts`,
      lifecycleStage: "active",
    });
    expect(created.data).toEqual({ metrics: [], params: [], tags: [{ key: "a", value: "2" }] });
  });

  it("puts runs with an empty experiment id in the default experiment", async () => {
    const created = await run(store.createRun({ experimentId: "" }));
    expect(created.info.experimentId).toBe("0");
  });

  it("fails for an unknown experiment or run", async () => {
    expect((await fail(store.createRun({ experimentId: "42" })))._tag).toBe("NotFoundError");
    const missing = await fail(store.getRun("deadbeef"));
    expect(missing._tag).toBe("NotFoundError");
    expect(missing.message).toBe("Run with id=deadbeef not found");
  });

  it("updates status and end time", async () => {
    const { info } = await newRun();
    const updated = await run(store.updateRunInfo(info.runId, "FINISHED", 2000));
    expect(updated.status).toBe("FINISHED");
    expect(updated.endTime).toBe(2000);
    const reloaded = await run(store.getRun(info.runId));
    expect(reloaded.info.status).toBe("FINISHED");
    expect(reloaded.info.endTime).toBe(2000);
  });

  it("blocks writes to a deleted run until it is restored", async () => {
    const { info } = await newRun();
    await run(store.deleteRun(info.runId));
    const metric: MetricInput = { key: "loss", value: 1, timestamp: 1 };

    const blocked = await fail(store.logMetric(info.runId, metric));
    expect(blocked._tag).toBe("InvalidStateError");
    expect(blocked.message).toBe(`The run ${info.runId} must be in the 'active' state. Current state is deleted.`);
    expect((await fail(store.setTag(info.runId, { key: "k", value: "v" })))._tag).toBe("InvalidStateError");
    expect((await fail(store.deleteRun(info.runId)))._tag).toBe("InvalidStateError");

    await run(store.restoreRun(info.runId));
    await run(store.logMetric(info.runId, metric));
    expect((await run(store.getRun(info.runId))).data.metrics.map((m) => m.key)).toEqual(["loss"]);
  });
});

describe("metrics", () => {
  it("stores NaN as 0 with a flag and clamps infinities", async () => {
    const { info } = await newRun();
    await run(store.logMetric(info.runId, { key: "nan", value: Number.NaN, timestamp: 1 }));
    await run(store.logMetric(info.runId, { key: "inf", value: Infinity, timestamp: 1 }));
    await run(store.logMetric(info.runId, { key: "inf", value: -Infinity, timestamp: 2, step: 1 }));

    expect(await run(store.getMetricHistory(info.runId, "nan"))).toEqual([
      { key: "nan", value: 0, timestamp: 1, step: 0, isNan: true },
    ]);
    expect((await run(store.getMetricHistory(info.runId, "inf"))).map((m) => m.value)).toEqual([
      Number.MAX_VALUE,
      -Number.MAX_VALUE,
    ]);
  });

  it("keeps the latest value by step, then timestamp, then value", async () => {
    const { info } = await newRun();
    await run(store.logMetric(info.runId, { key: "acc", value: 5, timestamp: 10, step: 1 }));
    await run(store.logMetric(info.runId, { key: "acc", value: 9, timestamp: 20, step: 0 }));
    await run(store.logMetric(info.runId, { key: "acc", value: 3, timestamp: 5, step: 1 }));
    expect((await run(store.getRun(info.runId))).data.metrics).toEqual([
      { key: "acc", value: 5, timestamp: 10, step: 1, isNan: false },
    ]);

    await run(store.logMetric(info.runId, { key: "acc", value: 7, timestamp: 10, step: 1 }));
    expect((await run(store.getRun(info.runId))).data.metrics).toEqual([
      { key: "acc", value: 7, timestamp: 10, step: 1, isNan: false },
    ]);
  });

  it("returns history in logging order and ignores duplicate facts", async () => {
    const { info } = await newRun();
    for (const m of [
      { key: "loss", value: 3, timestamp: 1, step: 2 },
      { key: "loss", value: 2, timestamp: 2, step: 0 },
      { key: "loss", value: 3, timestamp: 1, step: 2 },
      { key: "loss", value: 1, timestamp: 3, step: 1 },
    ]) {
      await run(store.logMetric(info.runId, m));
    }
    expect((await run(store.getMetricHistory(info.runId, "loss"))).map((m) => m.value)).toEqual([3, 2, 1]);
  });

  it("converges on the greatest step under concurrent writers", async () => {
    const { info } = await newRun();
    const writes = Array.from({ length: 20 }, (_, step) =>
      store.logMetric(info.runId, { key: "acc", value: step / 10, timestamp: 100 + step, step }),
    );
    await run(Effect.all(writes, { concurrency: "unbounded" }));

    expect(await run(store.getMetricHistory(info.runId, "acc"))).toHaveLength(20);
    expect((await run(store.getRun(info.runId))).data.metrics).toEqual([
      { key: "acc", value: 1.9, timestamp: 119, step: 19, isNan: false },
    ]);
  });

  it("breaks ties on step and timestamp by value under concurrent writers", async () => {
    const { info } = await newRun();
    const facts = [
      { value: 0.3, timestamp: 500, step: 5 },
      { value: 5, timestamp: 900, step: 2 },
      { value: 0.9, timestamp: 500, step: 5 },
      { value: 10, timestamp: 400, step: 5 },
      { value: 0.1, timestamp: 500, step: 5 },
      { value: 0.9, timestamp: 500, step: 5 },
      { value: 0.7, timestamp: 500, step: 5 },
      { value: -1, timestamp: 500, step: 4 },
    ];
    const keys = ["k0", "k3", "k6"];
    const writes = keys.flatMap((key, i) => {
      const shift = i * 3;
      const order = [...facts.slice(shift), ...facts.slice(0, shift)];
      return order.map((fact) => store.logMetric(info.runId, { key, ...fact }));
    });
    await run(Effect.all(writes, { concurrency: "unbounded" }));

    const latest = (await run(store.getRun(info.runId))).data.metrics;
    for (const key of keys) {
      expect(await run(store.getMetricHistory(info.runId, key))).toHaveLength(7);
      expect(latest.find((m) => m.key === key)).toEqual({ key, value: 0.9, timestamp: 500, step: 5, isNan: false });
    }
  });

  it("rejects a bad metric before touching the run", async () => {
    const error = await fail(store.logMetric("deadbeef", { key: "loss", value: 1, timestamp: -5 }));
    expect(error._tag).toBe("InvalidArgumentError");
  });
});

describe("connections", () => {
  const hasProcFds = existsSync("/proc/self/fd");
  const openFiles = async () => (await readdir("/proc/self/fd")).length;

  it.skipIf(!hasProcFds)("keeps the set of open files fixed across many sessions", async () => {
    const { info } = await newRun();
    await run(Effect.all(Array.from({ length: 8 }, () => store.getRun(info.runId)), { concurrency: "unbounded" }));
    const before = await openFiles();
    for (let i = 0; i < 200; i++) {
      await run(store.getRun(info.runId));
      await run(store.logMetric(info.runId, { key: "loss", value: i, timestamp: i, step: i }));
    }
    expect(await openFiles()).toBeLessThanOrEqual(before + 4);
  });

  it.skipIf(!hasProcFds)("releases every connection on close", async () => {
    const baseline = await openFiles();
    const other = await run(openStore({ url: `file:${join(dir, "other.db")}`, artifactRoot }));
    await run(Effect.all(Array.from({ length: 8 }, () => other.listExperiments()), { concurrency: "unbounded" }));
    expect(await openFiles()).toBeGreaterThan(baseline);
    await run(other.close());
    expect(await openFiles()).toBeLessThanOrEqual(baseline + 2);
  });

  it("waits for a write lock held by another connection", async () => {
    const { info } = await newRun();
    const holder = createClient({ url });
    try {
      await holder.execute("BEGIN IMMEDIATE");
      const released = delay(300).then(() => holder.execute("COMMIT"));
      const started = Date.now();
      await run(store.logMetric(info.runId, { key: "loss", value: 1, timestamp: 1 }));
      const waited = Date.now() - started;
      await released;

      expect(waited).toBeGreaterThanOrEqual(250);
      expect((await run(store.getMetricHistory(info.runId, "loss"))).map((m) => m.value)).toEqual([1]);
    } finally {
      holder.close();
    }
  });
});

describe("params and tags", () => {
  it("accepts a repeated param with the same value and refuses a changed one", async () => {
    const { info } = await newRun();
    await run(store.logParam(info.runId, { key: "lr", value: "0.1" }));
    await run(store.logParam(info.runId, { key: "lr", value: "0.1" }));

    const conflict = await fail(store.logParam(info.runId, { key: "lr", value: "0.2" }));
    expect(conflict._tag).toBe("AlreadyExistsError");
    expect(conflict.message).toBe(
      `Changing param value is not allowed. Param with key='lr' was already logged with value='0.1' for run ID='${info.runId}'. Attempted logging new value '0.2'.`,
    );
    expect((await run(store.getRun(info.runId))).data.params).toEqual([{ key: "lr", value: "0.1" }]);
  });

  it("upserts and deletes tags", async () => {
    const { info } = await newRun();
    await run(store.setTag(info.runId, { key: "team", value: "a" }));
    await run(store.setTag(info.runId, { key: "team", value: "b" }));
    expect((await run(store.getRun(info.runId))).data.tags).toEqual([{ key: "team", value: "b" }]);

    await run(store.deleteTag(info.runId, "team"));
    expect((await run(store.getRun(info.runId))).data.tags).toEqual([]);

    const missing = await fail(store.deleteTag(info.runId, "team"));
    expect(missing._tag).toBe("NotFoundError");
    expect(missing.message).toBe(`No tag with name: team in run with id ${info.runId}`);
  });
});

describe("logBatch", () => {
  it("applies params, metrics and tags", async () => {
    const { info } = await newRun();
    await run(
      store.logBatch(info.runId, {
        params: [{ key: "lr", value: "0.1" }],
        metrics: [
          { key: "loss", value: 2, timestamp: 1, step: 0 },
          { key: "loss", value: 1, timestamp: 2, step: 1 },
        ],
        tags: [{ key: "team", value: "a" }],
      }),
    );
    const loaded = await run(store.getRun(info.runId));
    expect(loaded.data).toEqual({
      metrics: [{ key: "loss", value: 1, timestamp: 2, step: 1, isNan: false }],
      params: [{ key: "lr", value: "0.1" }],
      tags: [{ key: "team", value: "a" }],
    });
  });

  it("keeps items applied before a failing one", async () => {
    const { info } = await newRun();
    await run(store.logParam(info.runId, { key: "lr", value: "0.1" }));

    const error = await fail(
      store.logBatch(info.runId, {
        params: [
          { key: "batch_size", value: "32" },
          { key: "lr", value: "0.5" },
        ],
        metrics: [{ key: "loss", value: 1, timestamp: 1 }],
      }),
    );
    expect(error._tag).toBe("AlreadyExistsError");

    const loaded = await run(store.getRun(info.runId));
    expect(loaded.data.params).toEqual([
      { key: "batch_size", value: "32" },
      { key: "lr", value: "0.1" },
    ]);
    expect(loaded.data.metrics).toEqual([]);
  });

  it("writes nothing when the batch is invalid", async () => {
    const { info } = await newRun();
    const tooMany = Array.from({ length: 101 }, (_, i) => ({ key: `p${i}`, value: "v" }));
    expect((await fail(store.logBatch(info.runId, { params: tooMany })))._tag).toBe("InvalidArgumentError");

    const badItem = await fail(
      store.logBatch(info.runId, {
        params: [{ key: "ok", value: "v" }],
        tags: [{ key: "bad$key", value: "v" }],
      }),
    );
    expect(badItem._tag).toBe("InvalidArgumentError");
    expect((await run(store.getRun(info.runId))).data.params).toEqual([]);
  });

  it("refuses a deleted or unknown run", async () => {
    const { info } = await newRun();
    await run(store.deleteRun(info.runId));
    expect((await fail(store.logBatch(info.runId, { tags: [{ key: "k", value: "v" }] })))._tag).toBe(
      "InvalidStateError",
    );
    expect((await fail(store.logBatch("deadbeef", {})))._tag).toBe("NotFoundError");
  });
});

describe("searchRuns", () => {
  async function seedRuns(experimentId: string, count: number): Promise<string[]> {
    const runIds: string[] = [];
    for (let i = 0; i < count; i++) {
      const created = await run(store.createRun({ experimentId, startTime: 1000 + i }));
      await run(store.logMetric(created.info.runId, { key: "acc", value: i / 10, timestamp: 1 }));
      runIds.push(created.info.runId);
    }
    return runIds;
  }

  it("pages through every run exactly once", async () => {
    const experimentId = await run(store.createExperiment("exp1"));
    const runIds = await seedRuns(experimentId, 5);

    const seen: string[] = [];
    let pageToken: string | undefined;
    let pages = 0;
    do {
      const page = await run(store.searchRuns({ experimentIds: [experimentId], maxResults: 2, pageToken }));
      seen.push(...page.runs.map((r) => r.info.runId));
      pageToken = page.nextPageToken;
      pages++;
    } while (pageToken !== undefined);

    expect(pages).toBe(3);
    expect(seen).toEqual([...runIds].reverse());
  });

  it("filters and orders by latest metrics", async () => {
    const experimentId = await run(store.createExperiment("exp1"));
    const runIds = await seedRuns(experimentId, 4);
    const page = await run(
      store.searchRuns({
        experimentIds: [experimentId],
        filter: "metrics.acc >= 0.1",
        orderBy: [{ field: "metrics.acc", direction: "ASC" }],
      }),
    );
    expect(page.runs.map((r) => r.info.runId)).toEqual(runIds.slice(1));
    expect(page.nextPageToken).toBeUndefined();
  });

  it("honours the view type", async () => {
    const experimentId = await run(store.createExperiment("exp1"));
    const [kept, removed] = await seedRuns(experimentId, 2);
    await run(store.deleteRun(removed));

    const active = await run(store.searchRuns({ experimentIds: [experimentId] }));
    expect(active.runs.map((r) => r.info.runId)).toEqual([kept]);
    const all = await run(store.searchRuns({ experimentIds: [experimentId], viewType: "ALL" }));
    expect(all.runs).toHaveLength(2);
  });

  it("validates max results and filters", async () => {
    expect((await fail(store.searchRuns({ experimentIds: ["0"], maxResults: 0 })))._tag).toBe("InvalidArgumentError");
    expect((await fail(store.searchRuns({ experimentIds: ["0"], maxResults: 50001 })))._tag).toBe(
      "InvalidArgumentError",
    );
    expect((await fail(store.searchRuns({ experimentIds: ["0"], filter: "nonsense" })))._tag).toBe(
      "InvalidArgumentError",
    );
  });

  it("returns nothing for no experiments", async () => {
    await newRun();
    expect(await run(store.searchRuns({ experimentIds: [] }))).toEqual({ runs: [] });
  });
});
