import type { APIGatewayProxyEventV2 } from "aws-lambda";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [k: string]: JsonValue };

export type JsonResponse = {
  statusCode: number;
  body: string;
  headers: Record<string, string>;
};

export const json = (statusCode: number, payload: JsonValue | Record<string, unknown>): JsonResponse => ({
  statusCode,
  headers: {
    "content-type": "application/json; charset=utf-8"
  },
  body: JSON.stringify(payload)
});

/** Structured error body: `{ error, message, ...details }`. */
export const jsonError = (
  statusCode: number,
  error: string,
  message: string,
  details: Record<string, unknown> = {}
): JsonResponse => json(statusCode, { error, message, ...details });

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === "object" && !Array.isArray(value);

export const getPathWithoutStage = (event: APIGatewayProxyEventV2): string => {
  const path = event.requestContext.http.path || "/";
  const stage = event.requestContext.stage;
  if (!stage || stage === "$default") return path;
  const stagePrefix = `/${stage}`;
  return path.startsWith(stagePrefix) ? path.slice(stagePrefix.length) || "/" : path;
};

export const parseBody = (event: APIGatewayProxyEventV2): unknown => {
  if (!event.body) return null;
  const raw = event.isBase64Encoded ? Buffer.from(event.body, "base64").toString("utf8") : event.body;
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return null;
  }
};

export const getQueryString = (event: APIGatewayProxyEventV2, name: string): string | undefined => {
  const value = event.queryStringParameters?.[name]?.trim();
  return value ? value : undefined;
};

/** `undefined` when absent, `null` when present but not an integer in `[min, max]`. */
export const getQueryInt = (
  event: APIGatewayProxyEventV2,
  name: string,
  min: number,
  max: number
): number | null | undefined => {
  const raw = getQueryString(event, name);
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw)) return null;
  const value = Number.parseInt(raw, 10);
  return value >= min && value <= max ? value : null;
};

export const getRequestId = (event: APIGatewayProxyEventV2): string => event.requestContext.requestId;
