import { analysisPost } from "../../../test/support/posts";
import { postingTimeStage } from "./postingTime";

const dataset = [
  analysisPost({ postId: "mon-1", timestamp: new Date("2025-01-06T09:00:00.000Z"), likes: 10 }),
  analysisPost({ postId: "mon-2", timestamp: new Date("2025-01-13T09:30:00.000Z"), likes: 30 }),
  analysisPost({ postId: "sun", timestamp: new Date("2025-01-05T18:00:00.000Z"), likes: 50 }),
  analysisPost({ postId: "undated", timestamp: null, likes: 1000 })
];

describe("postingTimeStage", () => {
  it("needs at least one dated post", () => {
    expect(postingTimeStage.precondition([analysisPost({ timestamp: null })])).toEqual({
      ok: false,
      reason: "no posts with a valid timestamp"
    });
  });

  it("picks the weekday and hour with the best mean likes", async () => {
    const output = await postingTimeStage.run(dataset);
    expect(output).toEqual({
      status: "completed",
      metrics: { slots_observed: 2, best_day: "Sunday", best_hour: 18 },
      predictions: [
        {
          predictionType: "optimal_posting_time",
          payload: {
            day: "Sunday",
            hour: 18,
            average_likes: 50,
            slots: [
              { day: "Sunday", hour: 18, average_likes: 50, posts: 1 },
              { day: "Monday", hour: 9, average_likes: 20, posts: 2 }
            ]
          }
        }
      ]
    });
  });

  it("reports day and hour statistics separately in the fallback", async () => {
    const output = await postingTimeStage.fallback?.(dataset);
    expect(output).toEqual({
      status: "completed",
      metrics: { best_day: "Sunday", best_hour: 18 },
      predictions: [
        {
          predictionType: "posting_time_statistics",
          payload: {
            best_day: "Sunday",
            best_hour: 18,
            by_day: [
              { day: "Sunday", average_likes: 50, posts: 1 },
              { day: "Monday", average_likes: 20, posts: 2 }
            ],
            by_hour: [
              { hour: 9, average_likes: 20, posts: 2 },
              { hour: 18, average_likes: 50, posts: 1 }
            ]
          }
        }
      ]
    });
  });
});
