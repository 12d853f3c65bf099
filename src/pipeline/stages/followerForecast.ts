import type { AnalysisStage, Dataset, JsonRecord, StageOutput } from "../types";
import { round, toDayKey, withTimestamps } from "./shared";

const DAY_MS = 24 * 60 * 60 * 1000;
export const MIN_HISTORY_DAYS = 14;
export const FORECAST_HORIZON_DAYS = 30;
export const FALLBACK_HORIZON_DAYS = 7;

export type DailyFollowers = { day: string; followerCount: number };

/** Last observed follower count per UTC day, oldest first. */
export const dailyFollowerSeries = (dataset: Dataset): DailyFollowers[] => {
  const byDay = new Map<string, { at: number; followerCount: number }>();
  for (const post of withTimestamps(dataset)) {
    const day = toDayKey(post.timestamp);
    const at = post.timestamp.getTime();
    const current = byDay.get(day);
    if (!current || at >= current.at) byDay.set(day, { at, followerCount: post.followerCount });
  }

  return [...byDay.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([day, entry]) => ({ day, followerCount: entry.followerCount }));
};

export const fitLinearTrend = (points: ReadonlyArray<[number, number]>): { slope: number; intercept: number } => {
  const n = points.length;
  const meanX = points.reduce((total, [x]) => total + x, 0) / n;
  const meanY = points.reduce((total, [, y]) => total + y, 0) / n;
  let covariance = 0;
  let variance = 0;
  for (const [x, y] of points) {
    covariance += (x - meanX) * (y - meanY);
    variance += (x - meanX) ** 2;
  }
  if (variance === 0) {
    throw new Error("follower series has no spread over time");
  }
  const slope = covariance / variance;
  return { slope, intercept: meanY - slope * meanX };
};

const dayOffset = (day: string, origin: string): number =>
  Math.round((Date.parse(`${day}T00:00:00Z`) - Date.parse(`${origin}T00:00:00Z`)) / DAY_MS);

const addDays = (day: string, days: number): string =>
  new Date(Date.parse(`${day}T00:00:00Z`) + days * DAY_MS).toISOString().slice(0, 10);

const forecast = (dataset: Dataset, horizonDays: number, predictionType: string): StageOutput => {
  const series = dailyFollowerSeries(dataset);
  const first = series[0];
  const last = series[series.length - 1];
  if (!first || !last) {
    throw new Error("follower series is empty");
  }

  const { slope, intercept } = fitLinearTrend(series.map((entry) => [dayOffset(entry.day, first.day), entry.followerCount]));
  const lastOffset = dayOffset(last.day, first.day);

  const points: JsonRecord[] = [];
  for (let step = 1; step <= horizonDays; step += 1) {
    points.push({
      day: addDays(last.day, step),
      follower_count: Math.max(0, Math.round(intercept + slope * (lastOffset + step)))
    });
  }

  return {
    status: "completed",
    metrics: {
      days_observed: series.length,
      last_follower_count: last.followerCount,
      slope_per_day: round(slope, 4),
      horizon_days: horizonDays
    },
    predictions: [
      {
        predictionType,
        payload: {
          horizon_days: horizonDays,
          slope_per_day: round(slope, 4),
          last_observed_day: last.day,
          points
        }
      }
    ]
  };
};

export const followerForecastStage: AnalysisStage = {
  name: "follower_forecast",
  description: "Linear follower trend over daily history",
  precondition: (dataset) => {
    const days = dailyFollowerSeries(dataset).length;
    if (days <= MIN_HISTORY_DAYS) {
      return { ok: false, reason: `insufficient history: ${days} day(s), need more than ${MIN_HISTORY_DAYS}` };
    }
    return { ok: true };
  },
  run: async (dataset) => forecast(dataset, FORECAST_HORIZON_DAYS, "follower_forecast"),
  fallback: async (dataset) => forecast(dataset, FALLBACK_HORIZON_DAYS, "follower_forecast_short")
};
