import {
  daysSince,
  extractHashtags,
  formatLongDate,
  isBlank,
  mediaTypeFromPostType,
  nonNegativeInt,
  safeTimestamp
} from "../coercion";
import type { CanonicalPost, RawImport } from "../types";
import {
  DEFAULT_AUDIENCE_AGE,
  DEFAULT_AUDIENCE_GENDER,
  DEFAULT_LOCATION,
  adaptRows,
  requireTimestamp,
  syntheticPostId,
  type RowAccessor,
  type SchemaAdapter
} from "./shared";

const MAX_CAPTION_LENGTH = 200;
const BASE_FOLLOWERS = 10000;
const FOLLOWERS_PER_DAY = 3;
const FOLLOWERS_PER_FOLLOW = 100;

const extractInstagramPost = (row: RowAccessor): CanonicalPost => {
  const rawId = row.get("Post ID");
  const postId = isBlank(rawId) ? syntheticPostId("post", row.index) : (rawId ?? "").trim();

  const publishTime = row.get("Publish time");
  const timestamp = requireTimestamp(
    safeTimestamp(isBlank(publishTime) ? row.get("Date") : publishTime),
    row.index,
    "publish time"
  );

  const views = nonNegativeInt(row.get("Views"));
  const likes = nonNegativeInt(row.get("Likes"));
  const follows = nonNegativeInt(row.get("Follows"));
  let reach = nonNegativeInt(row.get("Reach"));

  let impressions = views > 0 ? views : reach;
  if (impressions === 0) {
    impressions = Math.max(likes * 10, 100);
  }
  if (reach === 0) {
    reach = Math.floor(impressions * 0.75);
  }

  const rawCaption = row.get("Description", "Caption");
  const caption = isBlank(rawCaption) ? "" : (rawCaption ?? "").trim().slice(0, MAX_CAPTION_LENGTH);

  return {
    postId,
    timestamp,
    caption: caption || `Post from ${formatLongDate(timestamp)}`,
    likes,
    comments: nonNegativeInt(row.get("Comments")),
    shares: nonNegativeInt(row.get("Shares")),
    saves: nonNegativeInt(row.get("Saves")),
    impressions,
    reach,
    followerCount: Math.max(
      0,
      BASE_FOLLOWERS + daysSince(timestamp) * FOLLOWERS_PER_DAY + follows * FOLLOWERS_PER_FOLLOW
    ),
    audienceGender: DEFAULT_AUDIENCE_GENDER,
    audienceAge: DEFAULT_AUDIENCE_AGE,
    location: DEFAULT_LOCATION,
    hashtags: extractHashtags(caption),
    mediaType: mediaTypeFromPostType(row.get("Post type"))
  };
};

export const instagramAdapter: SchemaAdapter = {
  variant: "instagram_post_export",
  adapt: (raw: RawImport) => adaptRows("instagram_post_export", raw.columns, raw.rows, extractInstagramPost)
};
