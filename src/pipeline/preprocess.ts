import { safeNumber, safeTimestamp } from "../ingestion/coercion";
import type { CanonicalPost } from "../ingestion/types";
import { EmptyDatasetError } from "./errors";
import type { AnalysisPost } from "./types";

export const DEFAULT_SAMPLE_SIZE = 5000;
export const DEFAULT_SAMPLE_SEED = 42;

/** Loosely-typed input: rows from the store, an adapter or a replayed payload. */
export type PreprocessInput = { readonly [K in keyof CanonicalPost]?: unknown };

type PreprocessOptions = {
  sampleSize?: number;
  seed?: number;
};

export const createSeededRandom = (seed: number): (() => number) => {
  let state = Math.abs(Math.floor(seed)) & 0x7fffffff;
  return () => {
    state = (Math.imul(state, 1103515245) + 12345) & 0x7fffffff;
    return state / 0x80000000;
  };
};

/**
 * Picks `size` distinct positions out of `length` with a partial
 * Fisher-Yates shuffle, returned ascending so the sample keeps input order.
 */
export const samplePositions = (length: number, size: number, seed: number): number[] => {
  const random = createSeededRandom(seed);
  const positions = Array.from({ length }, (_, index) => index);

  for (let i = 0; i < size; i += 1) {
    const j = i + Math.floor(random() * (length - i));
    const picked = positions[j] ?? j;
    positions[j] = positions[i] ?? i;
    positions[i] = picked;
  }

  return positions.slice(0, size).sort((a, b) => a - b);
};

export const sampleDeterministic = <T>(items: readonly T[], size: number, seed: number): T[] => {
  if (items.length <= size) return [...items];
  return samplePositions(items.length, size, seed).flatMap((position) => {
    const item = items[position];
    return item === undefined ? [] : [item];
  });
};

const count = (value: unknown): number => safeNumber(value, 0);

const text = (value: unknown, fallback: string): string => (typeof value === "string" ? value : fallback);

export const preprocessDataset = (
  records: readonly PreprocessInput[],
  options: PreprocessOptions = {}
): AnalysisPost[] => {
  if (records.length === 0) {
    throw new EmptyDatasetError();
  }

  const sampleSize = options.sampleSize ?? DEFAULT_SAMPLE_SIZE;
  const seed = options.seed ?? DEFAULT_SAMPLE_SEED;
  const sampled = sampleDeterministic(records, Math.max(1, sampleSize), seed);

  if (sampled.length < records.length) {
    console.log(
      JSON.stringify({
        level: "info",
        message: "preprocess_downsampled",
        records_in: records.length,
        records_out: sampled.length,
        seed
      })
    );
  }

  return sampled.map((record, index) => {
    const postId = typeof record.postId === "string" ? record.postId.trim() : "";
    return {
      postId: postId || `post_${index}`,
      timestamp: safeTimestamp(record.timestamp),
      caption: text(record.caption, ""),
      likes: count(record.likes),
      comments: count(record.comments),
      shares: count(record.shares),
      saves: count(record.saves),
      impressions: count(record.impressions),
      reach: count(record.reach),
      followerCount: count(record.followerCount),
      audienceGender: text(record.audienceGender, ""),
      audienceAge: text(record.audienceAge, ""),
      location: text(record.location, ""),
      hashtags: text(record.hashtags, ""),
      mediaType: text(record.mediaType, "")
    };
  });
};
