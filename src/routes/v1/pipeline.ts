import type { APIGatewayProxyEventV2 } from "aws-lambda";
import { env } from "../../config/env";
import { getQueryInt, getQueryString, getRequestId, isRecord, json, jsonError, parseBody } from "../../core/http";
import {
  createPipelineStore,
  type PipelineResultRecord,
  type PipelineRunRecord,
  type PipelineStore,
  type PredictionRecord
} from "../../data/pipelineStore";
import type { PipelineOrchestrator } from "../../pipeline/orchestrator";
import { buildRunMessage, enqueueRunMessage, type RunEnqueuer } from "../../pipeline/queue";
import { createPipelineOrchestrator, parseRunMessage } from "../../pipeline/runtime";
import type { ModuleOutcome, PipelineSummary } from "../../pipeline/types";

const UUID_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export type PipelineRouteDeps = {
  queueUrl: string | undefined;
  enqueue: RunEnqueuer;
  orchestrator: () => Pick<PipelineOrchestrator, "execute">;
  store: () => Pick<
    PipelineStore,
    "listPipelineRuns" | "getPipelineRun" | "listPipelineResults" | "listRecentPredictions"
  > | null;
};

const resolveDeps = (deps: Partial<PipelineRouteDeps> = {}): PipelineRouteDeps => ({
  queueUrl: env.pipelineQueueUrl,
  enqueue: enqueueRunMessage,
  orchestrator: createPipelineOrchestrator,
  store: createPipelineStore,
  ...deps
});

const toOutcomePayload = (outcome: ModuleOutcome) => ({
  module: outcome.moduleName,
  status: outcome.status,
  attempts: outcome.attempts,
  fallback_used: outcome.fallbackUsed,
  duration_ms: outcome.durationMs,
  reason: outcome.reason ?? null,
  error: outcome.error ?? null,
  metrics: outcome.metrics
});

export const toSummaryPayload = (summary: PipelineSummary) => ({
  status: summary.status,
  run_id: summary.runId,
  modules_executed: summary.modulesExecuted,
  successful: summary.successful,
  failed: summary.failed,
  skipped: summary.skipped,
  duration_seconds: summary.durationSeconds,
  recovery_attempts: summary.recoveryAttempts,
  records_processed: summary.recordsProcessed,
  results: summary.results.map(toOutcomePayload),
  error: summary.error ?? null
});

const toRunPayload = (run: PipelineRunRecord) => ({
  id: run.id,
  status: run.status,
  source_kind: run.sourceKind,
  trigger_type: run.triggerType,
  request_id: run.requestId,
  modules_executed: run.modulesExecuted,
  successful: run.successful,
  failed: run.failed,
  skipped: run.skipped,
  recovery_attempts: run.recoveryAttempts,
  records_processed: run.recordsProcessed,
  duration_ms: run.durationMs,
  error: run.error,
  started_at: run.startedAt.toISOString(),
  finished_at: run.finishedAt.toISOString()
});

const toResultPayload = (result: PipelineResultRecord) => ({
  id: result.id,
  module: result.moduleName,
  status: result.status,
  attempts: result.attempts,
  fallback_used: result.fallbackUsed,
  reason: result.reason,
  error: result.error,
  metrics: result.metrics,
  timestamp: result.timestamp.toISOString()
});

const toPredictionPayload = (prediction: PredictionRecord) => ({
  id: prediction.id,
  run_id: prediction.runId,
  module: prediction.moduleName,
  prediction_type: prediction.predictionType,
  payload: prediction.payload,
  created_at: prediction.createdAt.toISOString()
});

const misconfigured = () => jsonError(500, "misconfigured", "Database runtime is not configured");

export const createPipelineRun = async (event: APIGatewayProxyEventV2, overrides?: Partial<PipelineRouteDeps>) => {
  const deps = resolveDeps(overrides);
  const body = event.body ? parseBody(event) : {};
  if (!isRecord(body)) {
    return jsonError(400, "invalid_json", "Body must be a JSON object");
  }

  const requestId = getRequestId(event);
  const validation = parseRunMessage({ ...body, request_id: requestId }, { triggerType: "manual" });
  if (!validation.ok) {
    return jsonError(422, "validation_error", validation.message);
  }
  const request = validation.request;

  if (deps.queueUrl) {
    const message = buildRunMessage({
      runId: request.runId,
      requestId,
      triggerType: request.triggerType ?? "manual",
      sampleSize: request.sampleSize,
      retryAttempts: request.retryAttempts,
      source: request.source
    });
    const runId = message.run_id;
    await deps.enqueue(deps.queueUrl, message);

    console.log(JSON.stringify({ level: "info", message: "pipeline_run_enqueued", run_id: runId, request_id: requestId }));
    return json(202, { status: "queued", run_id: runId, request_id: requestId });
  }

  const summary = await deps.orchestrator().execute(request);
  return json(200, toSummaryPayload(summary));
};

export const listPipelineRuns = async (event: APIGatewayProxyEventV2, overrides?: Partial<PipelineRouteDeps>) => {
  const limit = getQueryInt(event, "limit", 1, 200);
  if (limit === null) {
    return jsonError(422, "validation_error", "limit must be an integer between 1 and 200");
  }

  const store = resolveDeps(overrides).store();
  if (!store) return misconfigured();

  const runs = await store.listPipelineRuns(limit ?? 20);
  return json(200, { items: runs.map(toRunPayload), count: runs.length });
};

export const listPipelineResults = async (
  runId: string,
  overrides?: Partial<PipelineRouteDeps>
) => {
  if (!UUID_REGEX.test(runId)) {
    return jsonError(422, "validation_error", "run id must be a valid UUID");
  }

  const store = resolveDeps(overrides).store();
  if (!store) return misconfigured();

  const run = await store.getPipelineRun(runId);
  if (!run) {
    return jsonError(404, "not_found", "Pipeline run not found", { run_id: runId });
  }

  const results = await store.listPipelineResults(runId);
  return json(200, { run_id: runId, status: run.status, items: results.map(toResultPayload) });
};

export const listPredictions = async (event: APIGatewayProxyEventV2, overrides?: Partial<PipelineRouteDeps>) => {
  const limit = getQueryInt(event, "limit", 1, 200);
  if (limit === null) {
    return jsonError(422, "validation_error", "limit must be an integer between 1 and 200");
  }

  const store = resolveDeps(overrides).store();
  if (!store) return misconfigured();

  const predictions = await store.listRecentPredictions({
    module: getQueryString(event, "module"),
    predictionType: getQueryString(event, "type"),
    limit: limit ?? 10
  });
  return json(200, { items: predictions.map(toPredictionPayload), count: predictions.length });
};
