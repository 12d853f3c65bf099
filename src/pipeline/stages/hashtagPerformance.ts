import type { AnalysisPost, AnalysisStage, Dataset, JsonRecord, StageOutput } from "../types";
import { engagementOf, mostRecent, round } from "./shared";

const TOP_HASHTAGS = 10;
const MIN_USES = 2;
const FALLBACK_RECENT_POSTS = 200;

export type HashtagStats = {
  tag: string;
  uses: number;
  averageEngagement: number;
  averageEngagementRate: number;
};

export const hashtagsOf = (post: AnalysisPost): string[] =>
  post.hashtags
    .split(/\s+/)
    .map((token) => token.trim().toLowerCase())
    .filter((token) => token.startsWith("#") && token.length > 1);

/** Per-tag averages, best average engagement first; ties keep first-seen order. */
export const rankHashtags = (posts: readonly AnalysisPost[], minUses: number): HashtagStats[] => {
  const totals = new Map<string, { uses: number; engagement: number; rate: number }>();
  for (const post of posts) {
    const engagement = engagementOf(post);
    const rate = post.impressions > 0 ? engagement / post.impressions : 0;
    for (const tag of new Set(hashtagsOf(post))) {
      const entry = totals.get(tag) ?? { uses: 0, engagement: 0, rate: 0 };
      entry.uses += 1;
      entry.engagement += engagement;
      entry.rate += rate;
      totals.set(tag, entry);
    }
  }

  return [...totals.entries()]
    .filter(([, entry]) => entry.uses >= minUses)
    .map(([tag, entry]) => ({
      tag,
      uses: entry.uses,
      averageEngagement: round(entry.engagement / entry.uses),
      averageEngagementRate: round(entry.rate / entry.uses, 4)
    }))
    .sort((a, b) => b.averageEngagement - a.averageEngagement)
    .slice(0, TOP_HASHTAGS);
};

const toPayload = (ranked: HashtagStats[], minUses: number, postsConsidered: number): JsonRecord => ({
  min_uses: minUses,
  posts_considered: postsConsidered,
  hashtags: ranked.map((entry) => ({
    tag: entry.tag,
    uses: entry.uses,
    average_engagement: entry.averageEngagement,
    average_engagement_rate: entry.averageEngagementRate
  }))
});

const completed = (ranked: HashtagStats[], minUses: number, postsConsidered: number, predictionType: string): StageOutput => ({
  status: "completed",
  metrics: {
    hashtags_ranked: ranked.length,
    top_hashtag: ranked[0]?.tag ?? null,
    posts_considered: postsConsidered
  },
  predictions: [{ predictionType, payload: toPayload(ranked, minUses, postsConsidered) }]
});

export const hashtagPerformanceStage: AnalysisStage = {
  name: "hashtag_performance",
  description: "Average engagement per hashtag",
  precondition: (dataset: Dataset) =>
    dataset.some((post) => hashtagsOf(post).length > 0) ? { ok: true } : { ok: false, reason: "no hashtags in dataset" },
  run: async (dataset) => {
    const ranked = rankHashtags(dataset, MIN_USES);
    if (ranked.length === 0) {
      return { status: "skipped", reason: `no hashtag used at least ${MIN_USES} times` };
    }
    return completed(ranked, MIN_USES, dataset.length, "top_hashtags");
  },
  fallback: async (dataset) => {
    const recent = mostRecent(dataset, FALLBACK_RECENT_POSTS);
    return completed(rankHashtags(recent, 1), 1, recent.length, "top_hashtags_recent");
  }
};
