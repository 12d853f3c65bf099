import type { AnalysisPost, Dataset } from "../types";

export const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"] as const;

export const engagementOf = (post: AnalysisPost): number => post.likes + post.comments + post.shares + post.saves;

export const round = (value: number, digits = 2): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

export const mean = (values: readonly number[]): number =>
  values.length === 0 ? 0 : values.reduce((total, value) => total + value, 0) / values.length;

export const toDayKey = (date: Date): string => date.toISOString().slice(0, 10);

export type TimedPost = AnalysisPost & { timestamp: Date };

export const withTimestamps = (dataset: Dataset): TimedPost[] =>
  dataset.filter((post): post is TimedPost => post.timestamp !== null);

/** Newest first; posts without a timestamp sort last in input order. */
export const mostRecent = (dataset: Dataset, limit: number): AnalysisPost[] =>
  [...dataset]
    .sort((a, b) => {
      if (a.timestamp === null && b.timestamp === null) return 0;
      if (a.timestamp === null) return 1;
      if (b.timestamp === null) return -1;
      return b.timestamp.getTime() - a.timestamp.getTime();
    })
    .slice(0, limit);
