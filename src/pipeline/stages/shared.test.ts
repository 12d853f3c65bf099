import { analysisPost } from "../../../test/support/posts";
import { mostRecent } from "./shared";

describe("mostRecent", () => {
  it("orders newest first and keeps undated posts last in input order", () => {
    const dataset = [
      analysisPost({ postId: "u1", timestamp: null }),
      analysisPost({ postId: "old", timestamp: new Date("2025-01-01T00:00:00.000Z") }),
      analysisPost({ postId: "u2", timestamp: null }),
      analysisPost({ postId: "new", timestamp: new Date("2025-02-01T00:00:00.000Z") }),
      analysisPost({ postId: "u3", timestamp: null })
    ];

    expect(mostRecent(dataset, 5).map((post) => post.postId)).toEqual(["new", "old", "u1", "u2", "u3"]);
  });

  it("truncates to the limit", () => {
    const dataset = [
      analysisPost({ postId: "a", timestamp: new Date("2025-01-01T00:00:00.000Z") }),
      analysisPost({ postId: "b", timestamp: new Date("2025-01-03T00:00:00.000Z") }),
      analysisPost({ postId: "c", timestamp: new Date("2025-01-02T00:00:00.000Z") })
    ];

    expect(mostRecent(dataset, 2).map((post) => post.postId)).toEqual(["b", "c"]);
  });
});
