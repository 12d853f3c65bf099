import { apiEvent, responseBody } from "../../test/support/events";
import { main } from "./handler";

describe("http handler", () => {
  it("answers unknown routes with 404", async () => {
    const response = await main(apiEvent({ method: "DELETE", path: "/v1/imports" }));

    expect(response.statusCode).toBe(404);
    expect(responseBody(response)).toEqual({ error: "not_found", message: "Route not found", route: "DELETE /v1/imports" });
  });

  it("strips the stage prefix and trailing slashes", async () => {
    const response = await main(apiEvent({ path: "/prod/v1/nothing/", stage: "prod" }));

    expect(responseBody(response)).toMatchObject({ route: "GET /v1/nothing" });
  });

  it("reports health without a database as degraded", async () => {
    const response = await main(apiEvent({ path: "/v1/health" }));

    expect(response.statusCode).toBe(503);
    expect(responseBody(response)).toMatchObject({
      status: "degraded",
      service: "social-insights-api",
      database_configured: false,
      stages: [
        { name: "follower_forecast", has_fallback: true },
        { name: "sentiment_analysis", has_fallback: true },
        { name: "hashtag_performance", has_fallback: true },
        { name: "posting_time", has_fallback: true },
        { name: "audience_segments", has_fallback: true }
      ]
    });
  });

  it("validates run ids before touching storage", async () => {
    const response = await main(apiEvent({ path: "/v1/pipeline/runs/not-a-uuid/results" }));
    expect(response.statusCode).toBe(422);
  });
});
