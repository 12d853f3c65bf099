import { randomUUID } from "crypto";
import type { ObjectReader } from "../data/objectStore";
import type { PipelineStore, PredictionInput } from "../data/pipelineStore";
import type { PostStore } from "../data/postStore";
import { parseExport } from "../ingestion/ingest";
import { PipelineFatalError } from "./errors";
import { DEFAULT_BACKOFF_BASE_MS, DEFAULT_RETRY_ATTEMPTS, runModule } from "./moduleRunner";
import { DEFAULT_SAMPLE_SEED, DEFAULT_SAMPLE_SIZE, preprocessDataset, type PreprocessInput } from "./preprocess";
import type { StageRegistry } from "./stages";
import {
  sleep as defaultSleep,
  type AnalysisPost,
  type DataSource,
  type ModuleOutcome,
  type PipelineState,
  type PipelineSummary,
  type Sleep,
  type TriggerType
} from "./types";

export const DEFAULT_MAX_RECOVERY_ATTEMPTS = 2;
export const DEFAULT_RECOVERY_BACKOFF_MS = 5000;

export type OrchestratorDeps = {
  stages: StageRegistry;
  postStore?: Pick<PostStore, "load"> | null;
  pipelineStore?: Pick<PipelineStore, "savePipelineRun" | "savePredictions"> | null;
  readObject?: ObjectReader;
  sleep?: Sleep;
  sampleSeed?: number;
  retryBackoffMs?: number;
  maxRecoveryAttempts?: number;
  recoveryBackoffMs?: number;
};

export type ExecuteRequest = {
  source?: DataSource;
  sampleSize?: number;
  retryAttempts?: number;
  runId?: string;
  triggerType?: TriggerType;
  requestId?: string;
};

const ALLOWED_TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  init: ["loading", "failed"],
  loading: ["preprocessing", "loading", "failed"],
  preprocessing: ["running_modules", "loading", "failed"],
  running_modules: ["persisting", "failed"],
  persisting: ["done", "failed"],
  done: [],
  failed: []
};

const elapsedSeconds = (startedAt: Date): number => Math.round((Date.now() - startedAt.getTime()) / 10) / 100;

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/** A completed module always leaves at least one prediction behind. */
export const predictionsFor = (runId: string, outcomes: readonly ModuleOutcome[]): PredictionInput[] =>
  outcomes
    .filter((outcome) => outcome.status === "completed")
    .flatMap((outcome) => {
      const drafts =
        outcome.predictions.length > 0
          ? outcome.predictions
          : [{ predictionType: "summary", payload: outcome.metrics }];
      return drafts.map((draft) => ({
        runId,
        moduleName: outcome.moduleName,
        predictionType: draft.predictionType,
        payload: { ...draft.payload, fallback_used: outcome.fallbackUsed }
      }));
    });

/**
 * Drives one analysis run through
 * init → loading → preprocessing → running_modules → persisting → done.
 *
 * Loading and preprocessing failures restart the run from loading, up to
 * `maxRecoveryAttempts` times with a linear backoff. Stage failures never
 * reach this loop: each stage is isolated behind `runModule` with its own
 * retry budget, so the worst case is
 * `(maxRecoveryAttempts + 1)` loads and `stages × retryAttempts` stage calls.
 */
export class PipelineOrchestrator {
  private currentState: PipelineState = "init";
  private readonly history: PipelineState[] = [];

  constructor(private readonly deps: OrchestratorDeps) {}

  get state(): PipelineState {
    return this.currentState;
  }

  /** States entered during the last `execute`, in order. */
  get transitions(): readonly PipelineState[] {
    return this.history;
  }

  private transition(next: PipelineState, runId: string) {
    const previous = this.currentState;
    if (!ALLOWED_TRANSITIONS[previous].includes(next)) {
      throw new Error(`Invalid pipeline transition ${previous} -> ${next}`);
    }
    this.currentState = next;
    this.history.push(next);
    console.log(JSON.stringify({ level: "info", message: "pipeline_state_transition", run_id: runId, from: previous, to: next }));
  }

  private async load(source: DataSource): Promise<PreprocessInput[]> {
    if (source.kind === "store") {
      if (!this.deps.postStore) throw new Error("Post store is not configured");
      return this.deps.postStore.load();
    }

    if (source.kind === "csv") {
      return parseExport(source.content).posts;
    }

    if (!this.deps.readObject) throw new Error("Object reader is not configured");
    return parseExport(await this.deps.readObject(source.bucket, source.key)).posts;
  }

  async execute(request: ExecuteRequest = {}): Promise<PipelineSummary> {
    const startedAt = new Date();
    const runId = request.runId ?? randomUUID();
    const source: DataSource = request.source ?? { kind: "store" };
    const sampleSize = request.sampleSize ?? DEFAULT_SAMPLE_SIZE;
    const retryAttempts = Math.max(1, request.retryAttempts ?? DEFAULT_RETRY_ATTEMPTS);
    const maxRecoveryAttempts = Math.max(0, this.deps.maxRecoveryAttempts ?? DEFAULT_MAX_RECOVERY_ATTEMPTS);
    const recoveryBackoffMs = this.deps.recoveryBackoffMs ?? DEFAULT_RECOVERY_BACKOFF_MS;
    const wait = this.deps.sleep ?? defaultSleep;
    const stages = [...this.deps.stages.values()];

    this.currentState = "init";
    this.history.length = 0;
    this.history.push("init");

    console.log(
      JSON.stringify({
        level: "info",
        message: "pipeline_started",
        run_id: runId,
        source: source.kind,
        sample_size: sampleSize,
        retry_attempts: retryAttempts,
        max_recovery_attempts: maxRecoveryAttempts,
        stages: stages.map((stage) => stage.name),
        worst_case_load_attempts: maxRecoveryAttempts + 1,
        worst_case_stage_attempts: stages.length * retryAttempts
      })
    );

    let recoveryAttempts = 0;
    let dataset: AnalysisPost[] | null = null;

    while (!dataset) {
      let phase: PipelineState = "loading";
      try {
        this.transition("loading", runId);
        const records = await this.load(source);

        phase = "preprocessing";
        this.transition("preprocessing", runId);
        dataset = preprocessDataset(records, { sampleSize, seed: this.deps.sampleSeed ?? DEFAULT_SAMPLE_SEED });
      } catch (error) {
        const fatal = new PipelineFatalError(phase, errorMessage(error));
        if (recoveryAttempts >= maxRecoveryAttempts) {
          this.transition("failed", runId);
          return this.finishFailed({ runId, source, startedAt, recoveryAttempts, error: fatal, request });
        }

        recoveryAttempts += 1;
        const delayMs = recoveryBackoffMs * recoveryAttempts;
        console.log(
          JSON.stringify({
            level: "warn",
            message: "pipeline_recovery_scheduled",
            run_id: runId,
            phase,
            recovery_attempt: recoveryAttempts,
            max_recovery_attempts: maxRecoveryAttempts,
            delay_ms: delayMs,
            error: fatal.message
          })
        );
        await wait(delayMs);
      }
    }

    this.transition("running_modules", runId);
    const results: ModuleOutcome[] = [];
    for (const stage of stages) {
      results.push(
        await runModule(stage, dataset, {
          retryAttempts,
          backoffBaseMs: this.deps.retryBackoffMs ?? DEFAULT_BACKOFF_BASE_MS,
          sleep: wait
        })
      );
    }

    const summary: PipelineSummary = {
      status: "completed",
      runId,
      modulesExecuted: results.length,
      successful: results.filter((outcome) => outcome.status === "completed").length,
      failed: results.filter((outcome) => outcome.status === "failed").length,
      skipped: results.filter((outcome) => outcome.status === "skipped").length,
      durationSeconds: 0,
      recoveryAttempts,
      recordsProcessed: dataset.length,
      results
    };

    this.transition("persisting", runId);
    summary.durationSeconds = elapsedSeconds(startedAt);
    await this.persist(summary, source, startedAt, request);

    this.transition("done", runId);
    console.log(
      JSON.stringify({
        level: "info",
        message: "pipeline_completed",
        run_id: runId,
        modules_executed: summary.modulesExecuted,
        successful: summary.successful,
        failed: summary.failed,
        skipped: summary.skipped,
        records_processed: summary.recordsProcessed,
        recovery_attempts: summary.recoveryAttempts,
        duration_seconds: summary.durationSeconds
      })
    );
    return summary;
  }

  private async finishFailed(input: {
    runId: string;
    source: DataSource;
    startedAt: Date;
    recoveryAttempts: number;
    error: PipelineFatalError;
    request: ExecuteRequest;
  }): Promise<PipelineSummary> {
    const summary: PipelineSummary = {
      status: "failed",
      runId: input.runId,
      modulesExecuted: 0,
      successful: 0,
      failed: 0,
      skipped: 0,
      durationSeconds: elapsedSeconds(input.startedAt),
      recoveryAttempts: input.recoveryAttempts,
      recordsProcessed: 0,
      results: [],
      error: input.error.message
    };

    console.error(
      JSON.stringify({
        level: "error",
        message: "pipeline_failed",
        run_id: input.runId,
        phase: input.error.state,
        recovery_attempts: input.recoveryAttempts,
        error: input.error.message
      })
    );

    await this.persist(summary, input.source, input.startedAt, input.request);
    return summary;
  }

  // Persistence problems are logged only; the in-memory summary stands.
  private async persist(summary: PipelineSummary, source: DataSource, startedAt: Date, request: ExecuteRequest) {
    const store = this.deps.pipelineStore;
    if (!store) return;

    try {
      await store.savePipelineRun(
        {
          id: summary.runId,
          status: summary.status,
          sourceKind: source.kind,
          triggerType: request.triggerType ?? "manual",
          requestId: request.requestId ?? null,
          modulesExecuted: summary.modulesExecuted,
          successful: summary.successful,
          failed: summary.failed,
          skipped: summary.skipped,
          recoveryAttempts: summary.recoveryAttempts,
          recordsProcessed: summary.recordsProcessed,
          durationMs: Math.round(summary.durationSeconds * 1000),
          error: summary.error ?? null,
          startedAt,
          finishedAt: new Date()
        },
        summary.results
      );

      const predictions = predictionsFor(summary.runId, summary.results);
      if (predictions.length > 0) {
        await store.savePredictions(predictions);
      }
    } catch (error) {
      console.error(
        JSON.stringify({
          level: "error",
          message: "pipeline_persist_failure",
          run_id: summary.runId,
          persist_error: errorMessage(error)
        })
      );
    }
  }
}
