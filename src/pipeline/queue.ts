import AWS from "aws-sdk";
import { randomUUID } from "crypto";
import { env } from "../config/env";
import type { DataSource, TriggerType } from "./types";

const sqs = new AWS.SQS({ region: env.awsRegion });

export type RunEnqueuer = (queueUrl: string, payload: Record<string, unknown>) => Promise<void>;

export const enqueueRunMessage: RunEnqueuer = async (queueUrl, payload) => {
  await sqs
    .sendMessage({
      QueueUrl: queueUrl,
      MessageBody: JSON.stringify(payload)
    })
    .promise();
};

type RunMessageInput = {
  runId?: string;
  requestId: string | null;
  triggerType: TriggerType;
  sampleSize?: number;
  retryAttempts?: number;
  source?: DataSource;
};

/** Body of a pipeline SQS message, read back by `parseRunMessage`. */
export const buildRunMessage = (input: RunMessageInput) => ({
  run_id: input.runId ?? randomUUID(),
  request_id: input.requestId,
  trigger_type: input.triggerType,
  sample_size: input.sampleSize,
  retry_attempts: input.retryAttempts,
  source: input.source ?? { kind: "store" },
  requested_at: new Date().toISOString()
});
