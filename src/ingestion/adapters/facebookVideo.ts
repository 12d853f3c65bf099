import {
  daysSince,
  formatLongDateTime,
  generateHashtags,
  nonNegativeInt,
  safeTimestamp
} from "../coercion";
import { EmptyResultError } from "../errors";
import type { CanonicalPost, MediaType, RawImport } from "../types";
import { DEFAULT_LOCATION, adaptRows, requireTimestamp, syntheticPostId, type RowAccessor, type SchemaAdapter } from "./shared";

const HEADER_SCAN_ROWS = 5;
const DOMINANCE_MARGIN = 1.2;
const BASE_FOLLOWERS = 8000;
const FOLLOWERS_PER_DAY = 2;
const AGE_BUCKETS = ["18-24", "25-34", "35-44", "45-54", "55-64", "65+"] as const;
const DEFAULT_AGE_BUCKET = "25-34";
const DATE_LIKE = /\d{1,4}[/-]\d{1,2}[/-]\d{1,4}/;

const isDateLike = (value: string | undefined): boolean => DATE_LIKE.test(value ?? "");

const isEmptyRow = (cells: string[]): boolean => cells.every((cell) => !cell.trim());

const isGrandTotal = (cells: string[]): boolean => (cells[0] ?? "").toLowerCase().includes("grand total");

/** Drops pivot-table title rows sitting above the first dated row. */
export const stripLeadingHeaderRows = (rows: string[][]): string[][] => {
  if (rows.length === 0 || isDateLike(rows[0]?.[0])) return rows;

  const limit = Math.min(HEADER_SCAN_ROWS, rows.length);
  for (let i = 1; i < limit; i += 1) {
    if (isDateLike(rows[i]?.[0])) return rows.slice(i);
  }
  return rows;
};

const sumColumns = (row: RowAccessor, predicate: (column: string) => boolean): number =>
  row.pick(predicate).reduce((total, [, value]) => total + nonNegativeInt(value), 0);

/** First aggregate column carrying `marker`; per-demographic breakdowns are only used when no aggregate exists. */
const metric = (row: RowAccessor, marker: string): number => {
  const candidates = row.pick((column) => column.includes(marker));
  const aggregate = candidates.find(([column]) => !column.includes("(")) ?? candidates[0];
  return aggregate ? nonNegativeInt(aggregate[1]) : 0;
};

const dominant = (a: number, b: number, labelA: string, labelB: string, fallback: string): string => {
  if (a > b * DOMINANCE_MARGIN) return labelA;
  if (b > a * DOMINANCE_MARGIN) return labelB;
  return fallback;
};

export const inferGender = (row: RowAccessor): string =>
  dominant(
    sumColumns(row, (column) => column.includes("(m,")),
    sumColumns(row, (column) => column.includes("(f,")),
    "Male",
    "Female",
    "Mixed"
  );

export const inferAgeBucket = (row: RowAccessor): string => {
  let best: string = DEFAULT_AGE_BUCKET;
  let bestTotal = 0;
  for (const bucket of AGE_BUCKETS) {
    const total = sumColumns(row, (column) => column.includes(bucket));
    if (total > bestTotal) {
      best = bucket;
      bestTotal = total;
    }
  }
  return best;
};

export const inferLocation = (row: RowAccessor): string => {
  const isCountry = (column: string) => column.includes("country");
  const india = sumColumns(row, (column) => isCountry(column) && (column.includes("india") || /\bin\b/.test(column)));
  const unitedStates = sumColumns(
    row,
    (column) => isCountry(column) && (column.includes("united states") || /\bus\b/.test(column))
  );
  return unitedStates > india * DOMINANCE_MARGIN ? "United States" : DEFAULT_LOCATION;
};

const extractFacebookVideoPost = (row: RowAccessor): CanonicalPost => {
  const timestamp = requireTimestamp(safeTimestamp(row.cells[0]), row.index, "date cell");

  const views3s = metric(row, "3-second video views");
  const views1m = metric(row, "1-minute video views");
  const reactions = metric(row, "reactions");
  const comments = metric(row, "comments");
  const shares = metric(row, "shares");

  const impressions = Math.max(views3s, 100);
  const mediaType: MediaType = views1m > 0 || views3s > 20 ? "Video" : "Image";

  return {
    postId: syntheticPostId("fb_post", row.index),
    timestamp,
    caption: `Post from ${formatLongDateTime(timestamp)}`,
    likes: reactions,
    comments,
    shares,
    saves: Math.floor((reactions + comments + shares) * 0.1),
    impressions,
    reach: Math.floor(impressions * 0.75),
    followerCount: Math.max(0, BASE_FOLLOWERS + daysSince(timestamp) * FOLLOWERS_PER_DAY),
    audienceGender: inferGender(row),
    audienceAge: inferAgeBucket(row),
    location: inferLocation(row),
    hashtags: generateHashtags(mediaType, timestamp),
    mediaType
  };
};

export const facebookVideoAdapter: SchemaAdapter = {
  variant: "facebook_video_export",
  adapt: (raw: RawImport) => {
    const rows = stripLeadingHeaderRows(raw.rows).filter((cells) => !isEmptyRow(cells) && !isGrandTotal(cells));
    if (rows.length === 0) {
      throw new EmptyResultError("facebook_video_export", raw.rows.length);
    }
    return adaptRows("facebook_video_export", raw.columns, rows, extractFacebookVideoPost);
  }
};
