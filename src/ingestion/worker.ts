import type { S3Event } from "aws-lambda";
import { env } from "../config/env";
import { readObjectText, type ObjectReader } from "../data/objectStore";
import { createPostStore, type PostStore } from "../data/postStore";
import { buildRunMessage, enqueueRunMessage, type RunEnqueuer } from "../pipeline/queue";
import { IngestionError } from "./errors";
import { ingestCsv } from "./ingest";

export type ObjectResult = {
  bucket: string;
  key: string;
  status: "ingested" | "rejected" | "ignored";
  format?: string;
  records?: number;
  inserted?: number;
  error_code?: string;
  error_message?: string;
};

export type IngestionWorkerDeps = {
  rawPrefix: string;
  readObject: ObjectReader;
  store: () => Pick<PostStore, "save"> | null;
  queueUrl: string | undefined;
  enqueue: RunEnqueuer;
};

// S3 notifications carry keys form-encoded, spaces as "+".
export const decodeObjectKey = (raw: string): string => decodeURIComponent(raw.replace(/\+/g, " "));

const processObject = async (bucket: string, key: string, deps: IngestionWorkerDeps): Promise<ObjectResult> => {
  if (deps.rawPrefix && !key.startsWith(deps.rawPrefix)) {
    return { bucket, key, status: "ignored" };
  }

  const store = deps.store();
  if (!store) {
    throw new Error("Database runtime is not configured");
  }

  const content = await deps.readObject(bucket, key);

  try {
    const report = await ingestCsv(content, { store, fileName: key });
    return {
      bucket,
      key,
      status: "ingested",
      format: report.format,
      records: report.records,
      inserted: report.store?.inserted ?? 0
    };
  } catch (error) {
    // A malformed file will not improve on redelivery.
    if (error instanceof IngestionError) {
      console.log(
        JSON.stringify({
          level: "warn",
          message: "ingestion_object_rejected",
          bucket,
          key,
          error_code: error.code,
          error: error.message
        })
      );
      return { bucket, key, status: "rejected", error_code: error.code, error_message: error.message };
    }
    throw error;
  }
};

/** New posts invalidate the last analysis; one run is queued per batch. */
const requestAnalysis = async (results: readonly ObjectResult[], deps: IngestionWorkerDeps): Promise<void> => {
  const inserted = results.reduce((total, result) => total + (result.inserted ?? 0), 0);
  if (inserted === 0 || !deps.queueUrl) return;

  const message = buildRunMessage({ requestId: null, triggerType: "ingestion" });
  await deps.enqueue(deps.queueUrl, message);
  console.log(
    JSON.stringify({
      level: "info",
      message: "pipeline_run_enqueued",
      run_id: message.run_id,
      trigger_type: message.trigger_type,
      posts_inserted: inserted
    })
  );
};

export const handleS3Event = async (event: S3Event, deps: IngestionWorkerDeps): Promise<ObjectResult[]> => {
  const results: ObjectResult[] = [];

  for (const record of event.Records) {
    const bucket = record.s3.bucket.name;
    const key = decodeObjectKey(record.s3.object.key);
    results.push(await processObject(bucket, key, deps));
  }

  await requestAnalysis(results, deps);

  console.log(
    JSON.stringify({
      level: "info",
      message: "ingestion_worker_batch_processed",
      records: event.Records.length,
      results
    })
  );

  return results;
};

export const main = async (event: S3Event) =>
  handleS3Event(event, {
    rawPrefix: env.rawPrefix,
    readObject: readObjectText,
    store: createPostStore,
    queueUrl: env.pipelineQueueUrl,
    enqueue: enqueueRunMessage
  });
