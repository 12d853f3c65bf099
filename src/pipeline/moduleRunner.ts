import type {
  AnalysisStage,
  Dataset,
  JsonRecord,
  ModuleOutcome,
  PreconditionResult,
  PredictionDraft,
  Sleep,
  StageOutput
} from "./types";
import { sleep as defaultSleep } from "./types";

export const DEFAULT_RETRY_ATTEMPTS = 3;
export const DEFAULT_BACKOFF_BASE_MS = 1000;

type RunModuleOptions = {
  retryAttempts?: number;
  backoffBaseMs?: number;
  sleep?: Sleep;
};

/** Wait after failed attempt `attempt` (1-based): base × 2^attempt. */
export const backoffDelayMs = (attempt: number, baseMs: number): number => baseMs * 2 ** attempt;

const finish = (
  stage: AnalysisStage,
  startedAt: number,
  fields: {
    status: ModuleOutcome["status"];
    attempts: number;
    fallbackUsed?: boolean;
    metrics?: JsonRecord;
    predictions?: PredictionDraft[];
    reason?: string;
    error?: string;
  }
): ModuleOutcome => {
  const outcome: ModuleOutcome = {
    moduleName: stage.name,
    status: fields.status,
    attempts: fields.attempts,
    fallbackUsed: fields.fallbackUsed ?? false,
    durationMs: Date.now() - startedAt,
    finishedAt: new Date(),
    metrics: fields.metrics ?? {},
    predictions: fields.predictions ?? []
  };
  if (fields.reason !== undefined) outcome.reason = fields.reason;
  if (fields.error !== undefined) outcome.error = fields.error;

  console.log(
    JSON.stringify({
      level: outcome.status === "failed" ? "error" : "info",
      message: "pipeline_module_finished",
      module: outcome.moduleName,
      status: outcome.status,
      attempts: outcome.attempts,
      fallback_used: outcome.fallbackUsed,
      duration_ms: outcome.durationMs,
      reason: outcome.reason ?? null,
      error: outcome.error ?? null
    })
  );

  return outcome;
};

/**
 * Runs one stage with bounded retries. A failed precondition skips without
 * consuming an attempt; after an attempt throws, the stage's fallback (when
 * declared) replaces the primary for the remaining attempts. Never throws.
 */
export const runModule = async (
  stage: AnalysisStage,
  dataset: Dataset,
  options: RunModuleOptions = {}
): Promise<ModuleOutcome> => {
  const startedAt = Date.now();
  const retryAttempts = Math.max(1, options.retryAttempts ?? DEFAULT_RETRY_ATTEMPTS);
  const backoffBaseMs = options.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS;
  const wait = options.sleep ?? defaultSleep;

  let precondition: PreconditionResult;
  try {
    precondition = stage.precondition(dataset);
  } catch (error) {
    return finish(stage, startedAt, { status: "failed", attempts: 0, error: (error as Error).message });
  }
  if (!precondition.ok) {
    return finish(stage, startedAt, { status: "skipped", attempts: 0, reason: precondition.reason });
  }

  let useFallback = false;
  let lastError = "unknown error";

  for (let attempt = 1; attempt <= retryAttempts; attempt += 1) {
    try {
      const output: StageOutput =
        useFallback && stage.fallback ? await stage.fallback(dataset) : await stage.run(dataset);

      if (output.status === "skipped") {
        return finish(stage, startedAt, { status: "skipped", attempts: attempt, reason: output.reason });
      }

      return finish(stage, startedAt, {
        status: "completed",
        attempts: attempt,
        fallbackUsed: useFallback,
        metrics: output.metrics,
        predictions: output.predictions
      });
    } catch (error) {
      lastError = (error as Error).message;
      console.log(
        JSON.stringify({
          level: "warn",
          message: "pipeline_module_attempt_failed",
          module: stage.name,
          attempt,
          retry_attempts: retryAttempts,
          strategy: useFallback ? "fallback" : "primary",
          error: lastError
        })
      );

      if (stage.fallback) useFallback = true;
      if (attempt < retryAttempts) {
        await wait(backoffDelayMs(attempt, backoffBaseMs));
      }
    }
  }

  return finish(stage, startedAt, {
    status: "failed",
    attempts: retryAttempts,
    fallbackUsed: useFallback,
    error: lastError
  });
};
