import { randomUUID } from "crypto";
import { isRecord } from "../core/http";
import type { PipelineOrchestrator } from "./orchestrator";
import { createPipelineOrchestrator, parseRunMessage, type PipelineRunMessage } from "./runtime";
import type { TriggerType } from "./types";

export type SchedulerResponse = {
  status: "completed" | "failed";
  request_id: string;
  trigger_type: TriggerType;
  run_id: string | null;
  modules_executed: number;
  successful: number;
  failed: number;
  skipped: number;
  recovery_attempts: number;
  duration_seconds: number;
  error_message?: string;
};

const parseEvent = (event: unknown): PipelineRunMessage => (isRecord(event) ? event : {});

export const runScheduledPipeline = async (
  event: unknown,
  orchestrator: Pick<PipelineOrchestrator, "execute">
): Promise<SchedulerResponse> => {
  const payload = parseEvent(event);
  const rawRequestId = payload.request_id;
  const requestId =
    typeof rawRequestId === "string" && rawRequestId.trim() ? rawRequestId.trim() : `pipeline-${randomUUID()}`;

  const validation = parseRunMessage({ ...payload, request_id: requestId }, { triggerType: "scheduled" });
  if (!validation.ok) {
    return {
      status: "failed",
      request_id: requestId,
      trigger_type: "scheduled",
      run_id: null,
      modules_executed: 0,
      successful: 0,
      failed: 0,
      skipped: 0,
      recovery_attempts: 0,
      duration_seconds: 0,
      error_message: validation.message
    };
  }

  const summary = await orchestrator.execute(validation.request);
  const response: SchedulerResponse = {
    status: summary.status,
    request_id: requestId,
    trigger_type: validation.request.triggerType ?? "scheduled",
    run_id: summary.runId,
    modules_executed: summary.modulesExecuted,
    successful: summary.successful,
    failed: summary.failed,
    skipped: summary.skipped,
    recovery_attempts: summary.recoveryAttempts,
    duration_seconds: summary.durationSeconds
  };
  if (summary.error) response.error_message = summary.error;

  console.log(JSON.stringify({ level: "info", message: "pipeline_scheduler_tick", ...response }));
  return response;
};

export const main = async (event: unknown): Promise<SchedulerResponse> =>
  runScheduledPipeline(event, createPipelineOrchestrator());
