import { env } from "../../config/env";
import { json } from "../../core/http";
import { createBedrockSentimentClassifier } from "../../pipeline/bedrockSentiment";
import { createStageRegistry, describeStages } from "../../pipeline/stages";

export const SERVICE_NAME = "social-insights-api";

export const handleHealth = async () => {
  const registry = createStageRegistry({
    sentimentClassifier: createBedrockSentimentClassifier(),
    sentimentMaxCaptions: env.sentimentMaxCaptions,
    seed: env.pipelineSampleSeed
  });

  const databaseConfigured = Boolean(env.dbResourceArn && env.dbSecretArn && env.dbName);

  return json(databaseConfigured ? 200 : 503, {
    status: databaseConfigured ? "ok" : "degraded",
    service: SERVICE_NAME,
    env: env.appEnv,
    model_id: env.bedrockModelId,
    database_configured: databaseConfigured,
    queue_configured: Boolean(env.pipelineQueueUrl),
    stages: describeStages(registry),
    timestamp: new Date().toISOString()
  });
};
