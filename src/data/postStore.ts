import { MEDIA_TYPES, type CanonicalPost, type MediaType } from "../ingestion/types";
import {
  RdsDataClient,
  fieldDate,
  fieldLong,
  fieldString,
  sqlLong,
  sqlString,
  sqlTimestamp,
  type SqlExecutor,
  type SqlParameter,
  type SqlRow
} from "./rdsData";

const ID_LOOKUP_CHUNK = 200;
const INSERT_CHUNK = 20;

export type SaveReport = {
  received: number;
  duplicatesInBatch: number;
  alreadyStored: number;
  inserted: number;
  failed: number;
};

const POST_COLUMNS = `
  "postId",
  "timestamp",
  "caption",
  "likes",
  "comments",
  "shares",
  "saves",
  "impressions",
  "reach",
  "followerCount",
  "audienceGender",
  "audienceAge",
  "location",
  "hashtags",
  "mediaType"
`;

const INSERT_POST_SQL = `
  INSERT INTO "public"."Post"
    (${POST_COLUMNS}, "createdAt")
  VALUES
    (:post_id, :timestamp, :caption, :likes, :comments, :shares, :saves, :impressions, :reach, :follower_count, :audience_gender, :audience_age, :location, :hashtags, :media_type, NOW())
`;

const toMediaType = (value: string | null): MediaType => MEDIA_TYPES.find((item) => item === value) ?? "Image";

const toInsertParameters = (post: CanonicalPost): SqlParameter[] => [
  sqlString("post_id", post.postId),
  sqlTimestamp("timestamp", post.timestamp),
  sqlString("caption", post.caption),
  sqlLong("likes", post.likes),
  sqlLong("comments", post.comments),
  sqlLong("shares", post.shares),
  sqlLong("saves", post.saves),
  sqlLong("impressions", post.impressions),
  sqlLong("reach", post.reach),
  sqlLong("follower_count", post.followerCount),
  sqlString("audience_gender", post.audienceGender),
  sqlString("audience_age", post.audienceAge),
  sqlString("location", post.location),
  sqlString("hashtags", post.hashtags),
  sqlString("media_type", post.mediaType)
];

const toCanonicalPost = (row: SqlRow): CanonicalPost | null => {
  const postId = fieldString(row, 0);
  const timestamp = fieldDate(row, 1);
  if (!postId || !timestamp) return null;

  return {
    postId,
    timestamp,
    caption: fieldString(row, 2) ?? "",
    likes: fieldLong(row, 3) ?? 0,
    comments: fieldLong(row, 4) ?? 0,
    shares: fieldLong(row, 5) ?? 0,
    saves: fieldLong(row, 6) ?? 0,
    impressions: fieldLong(row, 7) ?? 0,
    reach: fieldLong(row, 8) ?? 0,
    followerCount: fieldLong(row, 9) ?? 0,
    audienceGender: fieldString(row, 10) ?? "",
    audienceAge: fieldString(row, 11) ?? "",
    location: fieldString(row, 12) ?? "",
    hashtags: fieldString(row, 13) ?? "",
    mediaType: toMediaType(fieldString(row, 14))
  };
};

const chunk = <T>(items: T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) chunks.push(items.slice(i, i + size));
  return chunks;
};

/**
 * Canonical post storage keyed by `postId`.
 *
 * `save` is insert-if-absent: a post whose id is already stored is dropped,
 * never refreshed. The existence check and the insert are separate
 * statements, so the store assumes a single writer. A chunk that fails (a
 * concurrent writer won the race, or the existence check was unavailable) is
 * retried row by row; only the rows the primary key still rejects are
 * reported as failed.
 */
export class PostStore {
  constructor(private readonly rds: SqlExecutor) {}

  async listExistingPostIds(postIds: string[]): Promise<Set<string>> {
    const existing = new Set<string>();

    for (const ids of chunk(postIds, ID_LOOKUP_CHUNK)) {
      const placeholders = ids.map((_, index) => `:post_id_${index}`);
      const response = await this.rds.execute(
        `
          SELECT "postId"
          FROM "public"."Post"
          WHERE "postId" IN (${placeholders.join(", ")})
        `,
        ids.map((id, index) => sqlString(`post_id_${index}`, id))
      );

      for (const row of response.records ?? []) {
        const postId = fieldString(row, 0);
        if (postId) existing.add(postId);
      }
    }

    return existing;
  }

  async save(posts: readonly CanonicalPost[]): Promise<SaveReport> {
    const report: SaveReport = { received: posts.length, duplicatesInBatch: 0, alreadyStored: 0, inserted: 0, failed: 0 };
    if (posts.length === 0) {
      console.log(JSON.stringify({ level: "warn", message: "post_store_empty_batch" }));
      return report;
    }

    const unique = new Map<string, CanonicalPost>();
    for (const post of posts) {
      if (unique.has(post.postId)) {
        report.duplicatesInBatch += 1;
        continue;
      }
      unique.set(post.postId, post);
    }

    let existing = new Set<string>();
    try {
      existing = await this.listExistingPostIds([...unique.keys()]);
    } catch (error) {
      console.error(
        JSON.stringify({
          level: "error",
          message: "post_store_existing_ids_failed",
          error: (error as Error).message
        })
      );
    }

    const fresh = [...unique.values()].filter((post) => !existing.has(post.postId));
    report.alreadyStored = unique.size - fresh.length;

    for (const batch of chunk(fresh, INSERT_CHUNK)) {
      try {
        await this.rds.batchExecute(INSERT_POST_SQL, batch.map(toInsertParameters));
        report.inserted += batch.length;
      } catch (error) {
        console.error(
          JSON.stringify({
            level: "error",
            message: "post_store_insert_chunk_failed",
            rows: batch.length,
            first_post_id: batch[0]?.postId ?? null,
            error: (error as Error).message
          })
        );
        const retried = batch.length > 1 ? await this.insertOneByOne(batch) : { inserted: 0, failed: batch.length };
        report.inserted += retried.inserted;
        report.failed += retried.failed;
      }
    }

    console.log(JSON.stringify({ level: "info", message: "post_store_saved", ...report }));
    return report;
  }

  /** Row-level retry of a failed chunk, so one conflicting id does not sink its neighbours. */
  private async insertOneByOne(posts: readonly CanonicalPost[]): Promise<{ inserted: number; failed: number }> {
    let inserted = 0;
    let failed = 0;

    for (const post of posts) {
      try {
        await this.rds.execute(INSERT_POST_SQL, toInsertParameters(post));
        inserted += 1;
      } catch (error) {
        failed += 1;
        console.error(
          JSON.stringify({
            level: "error",
            message: "post_store_insert_row_failed",
            post_id: post.postId,
            error: (error as Error).message
          })
        );
      }
    }

    return { inserted, failed };
  }

  async load(): Promise<CanonicalPost[]> {
    const response = await this.rds.execute(
      `
        SELECT ${POST_COLUMNS}
        FROM "public"."Post"
        ORDER BY "timestamp" ASC, "postId" ASC
      `
    );

    const rows = response.records ?? [];
    const posts = rows.map(toCanonicalPost).filter((post): post is CanonicalPost => post !== null);
    if (posts.length < rows.length) {
      console.log(
        JSON.stringify({
          level: "warn",
          message: "post_store_unreadable_rows",
          rows_dropped: rows.length - posts.length
        })
      );
    }
    return posts;
  }

  async count(): Promise<number> {
    const response = await this.rds.execute(`SELECT COUNT(*) FROM "public"."Post"`);
    return fieldLong(response.records?.[0], 0) ?? 0;
  }
}

export const createPostStore = (): PostStore | null => {
  const client = RdsDataClient.fromEnv();
  if (!client) return null;
  return new PostStore(client);
};
