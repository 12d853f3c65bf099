import AWS from "aws-sdk";
import { env } from "../config/env";
import { isRecord } from "../core/http";
import { decodeObjectBody } from "../data/objectStore";
import type { SentimentClassifier, SentimentLabel } from "./stages/sentiment";
import { sleep as defaultSleep, type Sleep } from "./types";

const MAX_BEDROCK_ATTEMPTS = 3;
const MAX_TEXT_CHARS = 4000;

const stringField = (value: unknown, key: string): string | null => {
  if (!isRecord(value)) return null;
  const field = value[key];
  return typeof field === "string" ? field : null;
};

export const extractBedrockText = (responseBody: string): string => {
  const record = JSON.parse(responseBody) as unknown;
  if (!isRecord(record)) throw new Error("bedrock_invalid_response");

  if (Array.isArray(record.content)) {
    for (const item of record.content) {
      const text = stringField(item, "text");
      if (stringField(item, "type") === "text" && text) return text;
    }
  }

  if (typeof record.completion === "string" && record.completion.trim()) {
    return record.completion;
  }

  throw new Error("bedrock_missing_text_output");
};

export const parseModelJson = (rawText: string): Record<string, unknown> => {
  const trimmed = rawText.trim();
  if (!trimmed) throw new Error("model_empty_response");

  const cleaned = trimmed.startsWith("```")
    ? trimmed
        .split("\n")
        .filter((_, index, arr) => index !== 0 && index !== arr.length - 1)
        .join("\n")
        .trim()
    : trimmed;

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch {
    const firstBrace = cleaned.indexOf("{");
    const lastBrace = cleaned.lastIndexOf("}");
    if (firstBrace < 0 || lastBrace <= firstBrace) throw new Error("model_invalid_json");
    parsed = JSON.parse(cleaned.slice(firstBrace, lastBrace + 1));
  }
  if (!isRecord(parsed)) throw new Error("model_invalid_json");
  return parsed;
};

export const toSentimentLabel = (parsed: Record<string, unknown>): SentimentLabel => {
  const sentiment = typeof parsed.sentiment === "string" ? parsed.sentiment.trim().toLowerCase() : "";
  if (sentiment === "positive" || sentiment === "negative" || sentiment === "neutral") return sentiment;
  return "unknown";
};

const shouldRetryBedrock = (error: unknown): boolean => {
  const code = stringField(error, "code") ?? stringField(error, "name") ?? "";
  const message = (stringField(error, "message") ?? "").toLowerCase();
  if (code === "ThrottlingException" || code === "ModelTimeoutException" || code === "ServiceUnavailableException") return true;
  if (message.includes("throttl") || message.includes("timeout")) return true;
  return false;
};

/** The slice of `AWS.BedrockRuntime` the classifier calls. */
export type BedrockInvoker = {
  invokeModel(params: AWS.BedrockRuntime.InvokeModelRequest): {
    promise(): Promise<AWS.BedrockRuntime.InvokeModelResponse>;
  };
};

type BedrockSentimentOptions = {
  modelId?: string;
  client?: BedrockInvoker;
  sleep?: Sleep;
};

/**
 * Caption sentiment through a Bedrock-hosted model. A caption the model cannot
 * label comes back as "unknown"; throttling is retried a few times first.
 */
export const createBedrockSentimentClassifier = (options: BedrockSentimentOptions = {}): SentimentClassifier => {
  const bedrock: BedrockInvoker = options.client ?? new AWS.BedrockRuntime({ region: env.awsRegion });
  const modelId = options.modelId ?? env.bedrockModelId;
  const wait = options.sleep ?? defaultSleep;

  const classify = async (text: string): Promise<SentimentLabel> => {
    const normalizedText = text.trim();
    if (!normalizedText) return "unknown";

    const prompt = [
      "Classify the sentiment of the following social media caption as one of: positive, negative, neutral.",
      'Return ONLY valid JSON with the exact shape: {"sentiment":"positive|negative|neutral","confidence":0..1}.',
      "Caption:",
      normalizedText.slice(0, MAX_TEXT_CHARS)
    ].join("\n");

    for (let attempt = 1; attempt <= MAX_BEDROCK_ATTEMPTS; attempt += 1) {
      try {
        const response = await bedrock
          .invokeModel({
            modelId,
            contentType: "application/json",
            accept: "application/json",
            body: JSON.stringify({
              anthropic_version: "bedrock-2023-05-31",
              max_tokens: 100,
              temperature: 0,
              messages: [{ role: "user", content: [{ type: "text", text: prompt }] }]
            })
          })
          .promise();

        return toSentimentLabel(parseModelJson(extractBedrockText(decodeObjectBody(response.body))));
      } catch (error) {
        if (attempt < MAX_BEDROCK_ATTEMPTS && shouldRetryBedrock(error)) {
          await wait(attempt * 400);
          continue;
        }
        console.log(
          JSON.stringify({
            level: "warn",
            message: "sentiment_model_call_failed",
            model_id: modelId,
            attempt,
            error: (error as Error).message
          })
        );
        return "unknown";
      }
    }

    return "unknown";
  };

  return {
    name: `bedrock:${modelId}`,
    classify
  };
};
