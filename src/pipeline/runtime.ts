import { env } from "../config/env";
import { isRecord } from "../core/http";
import { readObjectText } from "../data/objectStore";
import { createPipelineStore } from "../data/pipelineStore";
import { createPostStore } from "../data/postStore";
import { createBedrockSentimentClassifier } from "./bedrockSentiment";
import { PipelineOrchestrator, type ExecuteRequest } from "./orchestrator";
import { createStageRegistry } from "./stages";
import { TRIGGER_TYPES, type DataSource, type TriggerType } from "./types";

export const createPipelineOrchestrator = (): PipelineOrchestrator =>
  new PipelineOrchestrator({
    stages: createStageRegistry({
      sentimentClassifier: createBedrockSentimentClassifier(),
      sentimentMaxCaptions: env.sentimentMaxCaptions,
      seed: env.pipelineSampleSeed
    }),
    postStore: createPostStore(),
    pipelineStore: createPipelineStore(),
    readObject: readObjectText,
    sampleSeed: env.pipelineSampleSeed,
    retryBackoffMs: env.pipelineRetryBackoffMs,
    maxRecoveryAttempts: env.pipelineMaxRecoveryAttempts,
    recoveryBackoffMs: env.pipelineRecoveryBackoffMs
  });

/** Run request as it arrives over HTTP, SQS or a schedule (snake_case JSON). */
export type PipelineRunMessage = Record<string, unknown>;

export type RunRequestValidation = { ok: true; request: ExecuteRequest } | { ok: false; message: string };

const UUID_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

const positiveInt = (value: unknown, max: number): number | null | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1 || value > max) return null;
  return value;
};

const parseSource = (value: unknown): DataSource | null | undefined => {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) return null;
  if (value.kind === "store") return { kind: "store" };
  if (value.kind === "csv" && typeof value.content === "string" && value.content.trim()) {
    return { kind: "csv", content: value.content };
  }
  if (value.kind === "s3" && typeof value.key === "string" && value.key.trim()) {
    const bucket = typeof value.bucket === "string" && value.bucket.trim() ? value.bucket.trim() : env.rawBucketName;
    if (!bucket) return null;
    return { kind: "s3", bucket, key: value.key.trim() };
  }
  return null;
};

export const parseRunMessage = (message: PipelineRunMessage, defaults: { triggerType: TriggerType }): RunRequestValidation => {
  const sampleSize = positiveInt(message.sample_size, 1_000_000);
  if (sampleSize === null) return { ok: false, message: "sample_size must be a positive integer" };

  const retryAttempts = positiveInt(message.retry_attempts, 10);
  if (retryAttempts === null) return { ok: false, message: "retry_attempts must be an integer between 1 and 10" };

  const source = parseSource(message.source);
  if (source === null) return { ok: false, message: "source must be {kind: store}, {kind: csv, content} or {kind: s3, key}" };

  const triggerType = TRIGGER_TYPES.find((candidate) => candidate === message.trigger_type);
  const request: ExecuteRequest = {
    sampleSize: sampleSize ?? env.pipelineSampleSize,
    retryAttempts: retryAttempts ?? env.pipelineRetryAttempts,
    source: source ?? { kind: "store" },
    triggerType: triggerType ?? defaults.triggerType
  };
  const runId = message.run_id;
  const requestId = message.request_id;
  if (typeof runId === "string" && UUID_REGEX.test(runId)) request.runId = runId;
  if (typeof requestId === "string" && requestId.trim()) request.requestId = requestId.trim();

  return { ok: true, request };
};
