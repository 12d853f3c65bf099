import { PipelineStore } from "../data/pipelineStore";
import { InMemoryRds } from "../../test/support/inMemoryRds";
import { canonicalPost, silenceLogs } from "../../test/support/posts";
import { fakeStage, flaky, recordingSleep } from "../../test/support/stages";
import { PipelineOrchestrator, predictionsFor } from "./orchestrator";
import { registryOf } from "./stages";
import type { ModuleOutcome } from "./types";

const RUN_ID = "0b7e3f52-8c1d-4a9e-b6f0-2d4c6e8a0b1c";

const posts = [canonicalPost({ postId: "a" }), canonicalPost({ postId: "b" })];

const postStoreWith = (load: () => Promise<typeof posts>) => ({ load: jest.fn(load) });

describe("PipelineOrchestrator", () => {
  silenceLogs();

  let rds: InMemoryRds;
  let pipelineStore: PipelineStore;

  beforeEach(() => {
    rds = new InMemoryRds();
    pipelineStore = new PipelineStore(rds);
  });

  it("walks every state and persists one result per module", async () => {
    const orchestrator = new PipelineOrchestrator({
      stages: registryOf([
        fakeStage("first"),
        fakeStage("second", { run: async () => Promise.reject(new Error("broken stage")) }),
        fakeStage("third")
      ]),
      postStore: postStoreWith(async () => posts),
      pipelineStore,
      sleep: recordingSleep().sleep
    });

    const summary = await orchestrator.execute({ runId: RUN_ID, retryAttempts: 1 });

    expect(summary).toMatchObject({
      status: "completed",
      runId: RUN_ID,
      modulesExecuted: 3,
      successful: 2,
      failed: 1,
      skipped: 0,
      recoveryAttempts: 0,
      recordsProcessed: 2
    });
    expect(summary.results.map((outcome) => [outcome.moduleName, outcome.status])).toEqual([
      ["first", "completed"],
      ["second", "failed"],
      ["third", "completed"]
    ]);
    expect(orchestrator.transitions).toEqual(["init", "loading", "preprocessing", "running_modules", "persisting", "done"]);
    expect(orchestrator.state).toBe("done");

    expect(rds.dump("PipelineRun")).toHaveLength(1);
    expect(rds.dump("PipelineResult")).toHaveLength(3);
    expect(rds.dump("Prediction").map((row) => [row.moduleName, row.predictionType])).toEqual([
      ["first", "summary"],
      ["third", "summary"]
    ]);
  });

  it("gives up after the recovery budget when loading keeps failing", async () => {
    const { sleep, delays } = recordingSleep();
    const postStore = postStoreWith(async () => Promise.reject(new Error("database unavailable")));
    const orchestrator = new PipelineOrchestrator({
      stages: registryOf([fakeStage("first")]),
      postStore,
      pipelineStore,
      sleep
    });

    const summary = await orchestrator.execute({ runId: RUN_ID });

    expect(summary).toMatchObject({
      status: "failed",
      recoveryAttempts: 2,
      modulesExecuted: 0,
      error: "Pipeline execution failed during loading: database unavailable"
    });
    expect(delays).toEqual([5000, 10000]);
    expect(postStore.load).toHaveBeenCalledTimes(3);
    expect(orchestrator.transitions).toEqual(["init", "loading", "loading", "loading", "failed"]);

    expect(rds.dump("PipelineRun").map((row) => [row.status, row.recoveryAttempts, row.error])).toEqual([
      ["failed", 2, "Pipeline execution failed during loading: database unavailable"]
    ]);
    expect(rds.dump("PipelineResult")).toEqual([]);
  });

  it("recovers when a later load succeeds", async () => {
    const { sleep, delays } = recordingSleep();
    let calls = 0;
    const orchestrator = new PipelineOrchestrator({
      stages: registryOf([fakeStage("first")]),
      postStore: postStoreWith(async () => {
        calls += 1;
        if (calls === 1) throw new Error("timeout");
        return posts;
      }),
      sleep
    });

    const summary = await orchestrator.execute();

    expect(summary).toMatchObject({ status: "completed", recoveryAttempts: 1, successful: 1 });
    expect(delays).toEqual([5000]);
  });

  it("retries from loading when preprocessing finds no records", async () => {
    const orchestrator = new PipelineOrchestrator({
      stages: registryOf([fakeStage("first")]),
      postStore: postStoreWith(async () => []),
      sleep: recordingSleep().sleep,
      maxRecoveryAttempts: 1
    });

    const summary = await orchestrator.execute();

    expect(summary.status).toBe("failed");
    expect(summary.error).toBe("Pipeline execution failed during preprocessing: Empty dataset provided");
    expect(orchestrator.transitions).toEqual(["init", "loading", "preprocessing", "loading", "preprocessing", "failed"]);
  });

  it("runs against an uploaded CSV without the post store", async () => {
    const orchestrator = new PipelineOrchestrator({ stages: registryOf([fakeStage("first")]) });

    const summary = await orchestrator.execute({
      source: { kind: "csv", content: "post_id,timestamp,likes\nx1,2025-01-01,4\nx2,2025-01-02,6" }
    });

    expect(summary).toMatchObject({ status: "completed", recordsProcessed: 2 });
  });

  it("fails an object source when no reader is configured", async () => {
    const orchestrator = new PipelineOrchestrator({
      stages: registryOf([fakeStage("first")]),
      sleep: recordingSleep().sleep,
      maxRecoveryAttempts: 0
    });

    const summary = await orchestrator.execute({ source: { kind: "s3", bucket: "raw", key: "a.csv" } });

    expect(summary.error).toBe("Pipeline execution failed during loading: Object reader is not configured");
  });

  it("reads object sources through the configured reader", async () => {
    const readObject = jest.fn(async () => "post_id,timestamp\nk1,2025-01-01");
    const orchestrator = new PipelineOrchestrator({ stages: registryOf([fakeStage("first")]), readObject });

    const summary = await orchestrator.execute({ source: { kind: "s3", bucket: "raw", key: "a.csv" } });

    expect(readObject).toHaveBeenCalledWith("raw", "a.csv");
    expect(summary.recordsProcessed).toBe(1);
  });

  it("keeps the summary when persisting fails", async () => {
    const orchestrator = new PipelineOrchestrator({
      stages: registryOf([fakeStage("first")]),
      postStore: postStoreWith(async () => posts),
      pipelineStore: {
        savePipelineRun: async () => Promise.reject(new Error("write failed")),
        savePredictions: async () => 0
      }
    });

    const summary = await orchestrator.execute();

    expect(summary.status).toBe("completed");
    expect(orchestrator.state).toBe("done");
  });

  it("passes the stage retry budget through", async () => {
    const { sleep, delays } = recordingSleep();
    const run = flaky(2);
    const orchestrator = new PipelineOrchestrator({
      stages: registryOf([fakeStage("first", { run })]),
      postStore: postStoreWith(async () => posts),
      sleep,
      retryBackoffMs: 100
    });

    const summary = await orchestrator.execute({ retryAttempts: 3 });

    expect(summary.results[0]).toMatchObject({ status: "completed", attempts: 3, fallbackUsed: false });
    expect(delays).toEqual([200, 400]);
  });
});

describe("predictionsFor", () => {
  const outcome = (overrides: Partial<ModuleOutcome>): ModuleOutcome => ({
    moduleName: "posting_time",
    status: "completed",
    attempts: 1,
    fallbackUsed: false,
    durationMs: 1,
    finishedAt: new Date("2025-01-01T00:00:00.000Z"),
    metrics: {},
    predictions: [],
    ...overrides
  });

  it("tags stage predictions with the fallback flag", () => {
    expect(
      predictionsFor(RUN_ID, [
        outcome({ fallbackUsed: true, predictions: [{ predictionType: "posting_time_statistics", payload: { best_hour: 9 } }] })
      ])
    ).toEqual([
      {
        runId: RUN_ID,
        moduleName: "posting_time",
        predictionType: "posting_time_statistics",
        payload: { best_hour: 9, fallback_used: true }
      }
    ]);
  });

  it("summarizes completed stages without predictions and ignores the rest", () => {
    expect(
      predictionsFor(RUN_ID, [
        outcome({ moduleName: "a", metrics: { n: 2 } }),
        outcome({ moduleName: "b", status: "failed" }),
        outcome({ moduleName: "c", status: "skipped" })
      ])
    ).toEqual([{ runId: RUN_ID, moduleName: "a", predictionType: "summary", payload: { n: 2, fallback_used: false } }]);
  });
});
