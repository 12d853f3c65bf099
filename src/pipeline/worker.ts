import type { SQSEvent } from "aws-lambda";
import { isRecord } from "../core/http";
import type { PipelineOrchestrator } from "./orchestrator";
import { createPipelineOrchestrator, parseRunMessage, type PipelineRunMessage } from "./runtime";

const parseMessage = (body: string): PipelineRunMessage => {
  try {
    const parsed = JSON.parse(body) as unknown;
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
};

export const handleRunMessages = async (event: SQSEvent, orchestrator: Pick<PipelineOrchestrator, "execute">) => {
  const results: Record<string, unknown>[] = [];

  for (const record of event.Records) {
    const validation = parseRunMessage(parseMessage(record.body), { triggerType: "manual" });
    if (!validation.ok) {
      console.log(
        JSON.stringify({
          level: "warn",
          message: "pipeline_worker_message_rejected",
          message_id: record.messageId,
          error: validation.message
        })
      );
      results.push({ message_id: record.messageId, status: "rejected", error: validation.message });
      continue;
    }

    const summary = await orchestrator.execute(validation.request);
    results.push({
      message_id: record.messageId,
      run_id: summary.runId,
      status: summary.status,
      successful: summary.successful,
      failed: summary.failed,
      skipped: summary.skipped
    });
  }

  console.log(
    JSON.stringify({
      level: "info",
      message: "pipeline_worker_batch_processed",
      records: event.Records.length,
      results
    })
  );

  return results;
};

export const main = async (event: SQSEvent) => {
  await handleRunMessages(event, createPipelineOrchestrator());
};
