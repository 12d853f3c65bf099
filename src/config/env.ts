export type AppEnv = {
  appEnv: string;
  awsRegion: string;
  bedrockModelId: string;
  dbResourceArn?: string;
  dbSecretArn?: string;
  dbName?: string;
  rawBucketName?: string;
  rawPrefix: string;
  pipelineQueueUrl?: string;
  pipelineSampleSize: number;
  pipelineSampleSeed: number;
  pipelineRetryAttempts: number;
  pipelineRetryBackoffMs: number;
  pipelineMaxRecoveryAttempts: number;
  pipelineRecoveryBackoffMs: number;
  sentimentMaxCaptions: number;
};

const parseIntOr = (raw: string | undefined, fallback: number): number => {
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const env: AppEnv = {
  appEnv: process.env.APP_ENV ?? "prod",
  awsRegion: process.env.AWS_REGION ?? "us-east-1",
  bedrockModelId: process.env.BEDROCK_MODEL_ID ?? "anthropic.claude-3-haiku-20240307-v1:0",
  dbResourceArn: process.env.DB_RESOURCE_ARN,
  dbSecretArn: process.env.DB_SECRET_ARN,
  dbName: process.env.DB_NAME,
  rawBucketName: process.env.RAW_BUCKET_NAME,
  rawPrefix: process.env.RAW_PREFIX ?? "imports/",
  pipelineQueueUrl: process.env.PIPELINE_QUEUE_URL,
  pipelineSampleSize: parseIntOr(process.env.PIPELINE_SAMPLE_SIZE, 5000),
  pipelineSampleSeed: parseIntOr(process.env.PIPELINE_SAMPLE_SEED, 42),
  pipelineRetryAttempts: parseIntOr(process.env.PIPELINE_RETRY_ATTEMPTS, 3),
  pipelineRetryBackoffMs: parseIntOr(process.env.PIPELINE_RETRY_BACKOFF_MS, 1000),
  pipelineMaxRecoveryAttempts: parseIntOr(process.env.PIPELINE_MAX_RECOVERY_ATTEMPTS, 2),
  pipelineRecoveryBackoffMs: parseIntOr(process.env.PIPELINE_RECOVERY_BACKOFF_MS, 5000),
  sentimentMaxCaptions: parseIntOr(process.env.SENTIMENT_MAX_CAPTIONS, 300)
};
