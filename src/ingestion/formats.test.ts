import { UnrecognizedFormatError } from "./errors";
import { classifyFormat, requireKnownFormat } from "./formats";

describe("classifyFormat", () => {
  it("recognizes Instagram exports by any marker column", () => {
    expect(classifyFormat(["Post ID", "Likes"])).toBe("instagram_post_export");
    expect(classifyFormat([" Permalink ", "Views"])).toBe("instagram_post_export");
    expect(classifyFormat(["Account username"])).toBe("instagram_post_export");
  });

  it("prefers Instagram over standard when both match", () => {
    expect(classifyFormat(["post_id", "timestamp", "Post ID"])).toBe("instagram_post_export");
  });

  it("recognizes Facebook video exports by substring", () => {
    expect(classifyFormat(["Row Labels", "Sum of 3-second video views"])).toBe("facebook_video_export");
  });

  it("needs both standard columns", () => {
    expect(classifyFormat(["POST_ID", "Timestamp", "likes"])).toBe("standard");
    expect(classifyFormat(["post_id", "likes"])).toBe("unknown");
  });

  it("classifies the same header set the same way every time", () => {
    const columns = ["post_id", "timestamp", "caption"];
    expect(classifyFormat(columns)).toBe(classifyFormat([...columns]));
  });
});

describe("requireKnownFormat", () => {
  it("throws with the offending columns", () => {
    expect(() => requireKnownFormat(["foo", "bar"])).toThrow(UnrecognizedFormatError);
    try {
      requireKnownFormat(["foo", "bar"]);
    } catch (error) {
      expect(error).toBeInstanceOf(UnrecognizedFormatError);
      if (error instanceof UnrecognizedFormatError) {
        expect(error.columns).toEqual(["foo", "bar"]);
        expect(error.code).toBe("unrecognized_format");
      }
    }
  });
});
