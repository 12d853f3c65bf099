import { instagramAdapter } from "./instagram";

const COLUMNS = ["Post ID", "Publish time", "Views", "Reach", "Likes", "Comments", "Shares", "Saves", "Follows", "Description", "Post type"];

const row = (values: Partial<Record<(typeof COLUMNS)[number], string>>): string[] =>
  COLUMNS.map((column) => values[column] ?? "");

describe("instagramAdapter", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("maps a post export row onto the canonical record", () => {
    const result = instagramAdapter.adapt({
      columns: COLUMNS,
      rows: [
        row({
          "Post ID": "ig1",
          "Publish time": "01/15/2025 10:00",
          Views: "1000",
          Likes: "150",
          Comments: "12",
          Shares: "5",
          Description: "Great day! #fun #campus",
          "Post type": "IG image"
        })
      ]
    });

    expect(result.rowsTotal).toBe(1);
    expect(result.rowsSkipped).toBe(0);
    expect(result.posts).toEqual([
      {
        postId: "ig1",
        timestamp: new Date("2025-01-15T10:00:00.000Z"),
        caption: "Great day! #fun #campus",
        likes: 150,
        comments: 12,
        shares: 5,
        saves: 0,
        impressions: 1000,
        reach: 750,
        followerCount: 16618,
        audienceGender: "Mixed",
        audienceAge: "18-24",
        location: "India",
        hashtags: "#fun #campus",
        mediaType: "Image"
      }
    ]);
  });

  it("derives impressions from likes when neither views nor reach are present", () => {
    const [post] = instagramAdapter.adapt({
      columns: COLUMNS,
      rows: [row({ "Post ID": "ig2", "Publish time": "01/15/2025 10:00", Likes: "7", Follows: "2" })]
    }).posts;

    expect(post?.impressions).toBe(100);
    expect(post?.reach).toBe(75);
    expect(post?.followerCount).toBe(16818);
  });

  it("uses reach as impressions when views are missing", () => {
    const [post] = instagramAdapter.adapt({
      columns: COLUMNS,
      rows: [row({ "Post ID": "ig3", "Publish time": "01/15/2025 10:00", Reach: "400" })]
    }).posts;

    expect(post?.impressions).toBe(400);
    expect(post?.reach).toBe(400);
  });

  it("synthesizes ids and captions for blank cells", () => {
    const [post] = instagramAdapter.adapt({
      columns: COLUMNS,
      rows: [row({ "Publish time": "01/15/2025 10:00", "Post type": "IG reel" })]
    }).posts;

    expect(post?.postId).toBe("post_0000");
    expect(post?.caption).toBe("Post from January 15, 2025");
    expect(post?.hashtags).toBe("#socialmedia #content");
    expect(post?.mediaType).toBe("Video");
  });

  it("skips rows whose publish time cannot be parsed", () => {
    const result = instagramAdapter.adapt({
      columns: COLUMNS,
      rows: [row({ "Post ID": "bad", "Publish time": "soon" }), row({ "Post ID": "ok", "Publish time": "01/15/2025 10:00" })]
    });

    expect(result.rowsTotal).toBe(2);
    expect(result.rowsSkipped).toBe(1);
    expect(result.posts.map((post) => post.postId)).toEqual(["ok"]);
  });
});
