import { InMemoryRds } from "../../test/support/inMemoryRds";
import type { ModuleOutcome } from "../pipeline/types";
import { PipelineStore, type PipelineRunInput } from "./pipelineStore";

const RUN_ID = "6f1c2a3b-4d5e-4f60-8a7b-9c0d1e2f3a4b";

const run = (overrides: Partial<PipelineRunInput> = {}): PipelineRunInput => ({
  id: RUN_ID,
  status: "completed",
  sourceKind: "store",
  triggerType: "manual",
  requestId: null,
  modulesExecuted: 2,
  successful: 1,
  failed: 1,
  skipped: 0,
  recoveryAttempts: 0,
  recordsProcessed: 10,
  durationMs: 1234,
  error: null,
  startedAt: new Date("2025-03-01T08:00:00.000Z"),
  finishedAt: new Date("2025-03-01T08:00:01.234Z"),
  ...overrides
});

const outcome = (overrides: Partial<ModuleOutcome>): ModuleOutcome => ({
  moduleName: "posting_time",
  status: "completed",
  attempts: 1,
  fallbackUsed: false,
  durationMs: 5,
  finishedAt: new Date("2025-03-01T08:00:01.000Z"),
  metrics: {},
  predictions: [],
  ...overrides
});

describe("PipelineStore", () => {
  let rds: InMemoryRds;
  let store: PipelineStore;

  beforeEach(() => {
    rds = new InMemoryRds();
    store = new PipelineStore(rds);
  });

  it("writes a run with one result row per outcome", async () => {
    await store.savePipelineRun(run(), [
      outcome({ metrics: { best_hour: 9 } }),
      outcome({
        moduleName: "sentiment_analysis",
        status: "failed",
        attempts: 3,
        fallbackUsed: true,
        error: "model unavailable",
        finishedAt: new Date("2025-03-01T08:00:01.100Z")
      })
    ]);

    const [stored] = await store.listPipelineRuns();
    expect(stored).toEqual({ ...run(), createdAt: new Date("2025-01-01T00:00:00.001Z") });

    const results = await store.listPipelineResults(RUN_ID);
    expect(
      results.map(({ moduleName, status, attempts, fallbackUsed, reason, error, metrics }) => ({
        moduleName,
        status,
        attempts,
        fallbackUsed,
        reason,
        error,
        metrics
      }))
    ).toEqual([
      {
        moduleName: "posting_time",
        status: "completed",
        attempts: 1,
        fallbackUsed: false,
        reason: null,
        error: null,
        metrics: { best_hour: 9 }
      },
      {
        moduleName: "sentiment_analysis",
        status: "failed",
        attempts: 3,
        fallbackUsed: true,
        reason: null,
        error: "model unavailable",
        metrics: {}
      }
    ]);
    expect(results.every((result) => result.runId === RUN_ID)).toBe(true);
  });

  it("reads a single run by id", async () => {
    await store.savePipelineRun(run({ status: "failed", error: "Empty dataset provided" }), []);

    expect(await store.getPipelineRun(RUN_ID)).toEqual({
      ...run({ status: "failed", error: "Empty dataset provided" }),
      createdAt: new Date("2025-01-01T00:00:00.001Z")
    });
    expect(await store.getPipelineRun("00000000-0000-4000-8000-000000000000")).toBeNull();
  });

  it("returns no results for an unknown run", async () => {
    await store.savePipelineRun(run(), [outcome({})]);
    expect(await store.listPipelineResults("00000000-0000-4000-8000-000000000000")).toEqual([]);
  });

  it("lists runs newest first within the limit", async () => {
    await store.savePipelineRun(run({ id: "11111111-1111-4111-8111-111111111111" }), []);
    await store.savePipelineRun(
      run({ id: "22222222-2222-4222-8222-222222222222", startedAt: new Date("2025-03-02T08:00:00.000Z") }),
      []
    );

    expect((await store.listPipelineRuns(1)).map((item) => item.id)).toEqual(["22222222-2222-4222-8222-222222222222"]);
    expect(await store.listPipelineRuns(0)).toHaveLength(1);
  });

  it("filters predictions by module and type, newest first", async () => {
    const saved = await store.savePredictions([
      { runId: RUN_ID, moduleName: "posting_time", predictionType: "optimal_posting_time", payload: { hour: 9 } },
      { runId: RUN_ID, moduleName: "hashtag_performance", predictionType: "top_hashtags", payload: { hashtags: [] } },
      { runId: null, moduleName: "posting_time", predictionType: "posting_time_statistics", payload: { best_hour: 10 } }
    ]);
    expect(saved).toBe(3);

    const postingTime = await store.listRecentPredictions({ module: "posting_time" });
    expect(postingTime.map((item) => [item.predictionType, item.runId, item.payload])).toEqual([
      ["posting_time_statistics", null, { best_hour: 10 }],
      ["optimal_posting_time", RUN_ID, { hour: 9 }]
    ]);

    const byType = await store.listRecentPredictions({ module: "posting_time", predictionType: "optimal_posting_time" });
    expect(byType).toHaveLength(1);

    expect(await store.listRecentPredictions({ limit: 2 })).toHaveLength(2);
  });
});
