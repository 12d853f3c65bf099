import type { AnalysisStage, StageOutput } from "../types";
import { WEEKDAYS, mean, round, withTimestamps, type TimedPost } from "./shared";

type Slot = { day: string; hour: number; averageLikes: number; posts: number };

const groupMeans = <K extends string | number>(
  posts: readonly TimedPost[],
  keyOf: (post: TimedPost) => K
): Map<K, { averageLikes: number; posts: number }> => {
  const groups = new Map<K, number[]>();
  for (const post of posts) {
    const key = keyOf(post);
    const likes = groups.get(key) ?? [];
    likes.push(post.likes);
    groups.set(key, likes);
  }
  const stats = new Map<K, { averageLikes: number; posts: number }>();
  for (const [key, likes] of groups) {
    stats.set(key, { averageLikes: round(mean(likes)), posts: likes.length });
  }
  return stats;
};

const slotOrder = (day: string, hour: number): number => WEEKDAYS.findIndex((name) => name === day) * 24 + hour;

/** Mean likes for every (weekday, UTC hour) slot that has posts, in calendar order. */
export const postingSlots = (posts: readonly TimedPost[]): Slot[] =>
  [...groupMeans(posts, (post) => `${WEEKDAYS[post.timestamp.getUTCDay()]}|${post.timestamp.getUTCHours()}`).entries()]
    .map(([key, stats]) => {
      const [day = "", hour = "0"] = key.split("|");
      return { day, hour: Number(hour), ...stats };
    })
    .sort((a, b) => slotOrder(a.day, a.hour) - slotOrder(b.day, b.hour));

const best = <T extends { averageLikes: number }>(items: readonly T[]): T | undefined =>
  items.reduce<T | undefined>((winner, item) => (!winner || item.averageLikes > winner.averageLikes ? item : winner), undefined);

export const postingTimeStage: AnalysisStage = {
  name: "posting_time",
  description: "Best weekday and hour to post by mean likes",
  precondition: (dataset) =>
    withTimestamps(dataset).length > 0 ? { ok: true } : { ok: false, reason: "no posts with a valid timestamp" },
  run: async (dataset): Promise<StageOutput> => {
    const slots = postingSlots(withTimestamps(dataset));
    const top = best(slots);
    if (!top) throw new Error("no posting slots");

    return {
      status: "completed",
      metrics: { slots_observed: slots.length, best_day: top.day, best_hour: top.hour },
      predictions: [
        {
          predictionType: "optimal_posting_time",
          payload: {
            day: top.day,
            hour: top.hour,
            average_likes: top.averageLikes,
            slots: slots.map((slot) => ({
              day: slot.day,
              hour: slot.hour,
              average_likes: slot.averageLikes,
              posts: slot.posts
            }))
          }
        }
      ]
    };
  },
  fallback: async (dataset): Promise<StageOutput> => {
    const posts = withTimestamps(dataset);
    const dayStats = groupMeans(posts, (post) => WEEKDAYS[post.timestamp.getUTCDay()] ?? "");
    const byDay = WEEKDAYS.flatMap((day) => {
      const stats = dayStats.get(day);
      return stats ? [{ day, ...stats }] : [];
    });
    const byHour = [...groupMeans(posts, (post) => post.timestamp.getUTCHours()).entries()]
      .map(([hour, stats]) => ({ hour, ...stats }))
      .sort((a, b) => a.hour - b.hour);

    const bestDay = best(byDay);
    const bestHour = best(byHour);
    if (!bestDay || !bestHour) throw new Error("no posting statistics");

    return {
      status: "completed",
      metrics: { best_day: bestDay.day, best_hour: bestHour.hour },
      predictions: [
        {
          predictionType: "posting_time_statistics",
          payload: {
            best_day: bestDay.day,
            best_hour: bestHour.hour,
            by_day: byDay.map((entry) => ({ day: entry.day, average_likes: entry.averageLikes, posts: entry.posts })),
            by_hour: byHour.map((entry) => ({ hour: entry.hour, average_likes: entry.averageLikes, posts: entry.posts }))
          }
        }
      ]
    };
  }
};
