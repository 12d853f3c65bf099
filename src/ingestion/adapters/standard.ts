import {
  extractHashtags,
  isBlank,
  mediaTypeFromPostType,
  nonNegativeInt,
  normalizeHashtagList,
  safeTimestamp
} from "../coercion";
import type { CanonicalPost, RawImport } from "../types";
import {
  DEFAULT_AUDIENCE_AGE,
  DEFAULT_AUDIENCE_GENDER,
  DEFAULT_LOCATION,
  adaptRows,
  requireTimestamp,
  type SchemaAdapter
} from "./shared";

export const STANDARD_FIELDS = [
  "post_id",
  "timestamp",
  "caption",
  "likes",
  "comments",
  "shares",
  "saves",
  "impressions",
  "reach",
  "follower_count",
  "audience_gender",
  "audience_age",
  "location",
  "hashtags",
  "media_type"
] as const;
export type StandardField = (typeof STANDARD_FIELDS)[number];

const COLUMN_ALIASES: Record<StandardField, string[]> = {
  post_id: ["post_id", "id", "postid", "content_id"],
  timestamp: ["timestamp", "date", "time", "publish_time", "created_at", "posted_at", "date_posted"],
  caption: ["caption", "text", "description", "message", "copy", "content"],
  likes: ["likes", "like", "like_count", "reactions", "favorites"],
  comments: ["comments", "comment", "comment_count"],
  shares: ["shares", "share", "share_count", "reshares"],
  saves: ["saves", "save", "saved"],
  impressions: ["impressions", "view", "views", "view_count", "video_views"],
  reach: ["reach", "people_reached", "unique_views"],
  follower_count: ["follower_count", "follower", "followers", "follows", "subscribers"],
  audience_gender: ["audience_gender", "gender"],
  audience_age: ["audience_age", "age", "age_group"],
  location: ["location", "country", "region"],
  hashtags: ["hashtags", "tags", "topics"],
  media_type: ["media_type", "type", "post_type", "content_type", "asset_type"]
};

/** `"Comment Count"` → `"comment_count"`. */
export const toSnakeColumn = (column: string): string => column.trim().toLowerCase().replace(/[\s-]+/g, "_");

const isStandardField = (value: string): value is StandardField =>
  STANDARD_FIELDS.some((field) => field === value);

/**
 * Maps header names onto canonical fields. A column already named after a
 * field keeps it; aliases then fill the fields still unclaimed, first column
 * wins. Columns matching nothing are kept under their snake_case name.
 */
export const normalizeColumns = (columns: readonly string[]): string[] => {
  const snake = columns.map(toSnakeColumn);
  const resolved: (StandardField | null)[] = snake.map(() => null);
  const claimed = new Set<StandardField>();

  snake.forEach((column, index) => {
    if (!isStandardField(column) || claimed.has(column)) return;
    claimed.add(column);
    resolved[index] = column;
  });

  snake.forEach((column, index) => {
    if (resolved[index] !== null) return;
    const field = STANDARD_FIELDS.find((candidate) => !claimed.has(candidate) && COLUMN_ALIASES[candidate].includes(column));
    if (!field) return;
    claimed.add(field);
    resolved[index] = field;
  });

  return snake.map((column, index) => resolved[index] ?? column);
};

const textOr = (value: string | undefined, fallback: string): string => (isBlank(value) ? fallback : (value ?? "").trim());

export const standardAdapter: SchemaAdapter = {
  variant: "standard",
  adapt: (raw: RawImport) =>
    adaptRows("standard", normalizeColumns(raw.columns), raw.rows, (row): CanonicalPost => {
      const caption = textOr(row.get("caption"), "");
      return {
        postId: textOr(row.get("post_id"), `post_${row.index}`),
        timestamp: requireTimestamp(safeTimestamp(row.get("timestamp")), row.index, "timestamp"),
        caption,
        likes: nonNegativeInt(row.get("likes")),
        comments: nonNegativeInt(row.get("comments")),
        shares: nonNegativeInt(row.get("shares")),
        saves: nonNegativeInt(row.get("saves")),
        impressions: nonNegativeInt(row.get("impressions")),
        reach: nonNegativeInt(row.get("reach")),
        followerCount: nonNegativeInt(row.get("follower_count")),
        audienceGender: textOr(row.get("audience_gender"), DEFAULT_AUDIENCE_GENDER),
        audienceAge: textOr(row.get("audience_age"), DEFAULT_AUDIENCE_AGE),
        location: textOr(row.get("location"), DEFAULT_LOCATION),
        hashtags: normalizeHashtagList(row.get("hashtags")) ?? extractHashtags(caption),
        mediaType: mediaTypeFromPostType(row.get("media_type"))
      };
    })
};
