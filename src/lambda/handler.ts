import type { APIGatewayProxyEventV2 } from "aws-lambda";
import { getPathWithoutStage, getRequestId, json, jsonError } from "../core/http";
import { handleHealth } from "../routes/v1/health";
import { createImport } from "../routes/v1/imports";
import { createPipelineRun, listPipelineResults, listPipelineRuns, listPredictions } from "../routes/v1/pipeline";

const RUN_RESULTS_ROUTE = /^GET \/v1\/pipeline\/runs\/([^/]+)\/results$/;

const routeKey = (event: APIGatewayProxyEventV2): string => {
  const path = getPathWithoutStage(event).replace(/\/+$/, "") || "/";
  return `${event.requestContext.http.method.toUpperCase()} ${path}`;
};

const route = async (event: APIGatewayProxyEventV2, key: string) => {
  if (key === "GET /v1/health") return handleHealth();

  if (key === "POST /v1/imports") return createImport(event);

  if (key === "POST /v1/pipeline/runs") return createPipelineRun(event);
  if (key === "GET /v1/pipeline/runs") return listPipelineRuns(event);

  const resultsMatch = key.match(RUN_RESULTS_ROUTE);
  if (resultsMatch?.[1]) return listPipelineResults(decodeURIComponent(resultsMatch[1]));

  if (key === "GET /v1/predictions") return listPredictions(event);

  return json(404, {
    error: "not_found",
    message: "Route not found",
    route: key
  });
};

export const main = async (event: APIGatewayProxyEventV2) => {
  const key = routeKey(event);
  try {
    return await route(event, key);
  } catch (error) {
    console.error(
      JSON.stringify({
        level: "error",
        message: "http_unhandled_error",
        route: key,
        request_id: getRequestId(event),
        error: (error as Error).message
      })
    );
    return jsonError(500, "internal_error", "Unexpected error", { request_id: getRequestId(event) });
  }
};
