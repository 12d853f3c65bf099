import type { AnalysisStage } from "../types";
import { createAudienceSegmentsStage } from "./audienceSegments";
import { followerForecastStage } from "./followerForecast";
import { hashtagPerformanceStage } from "./hashtagPerformance";
import { postingTimeStage } from "./postingTime";
import { createSentimentStage, type SentimentClassifier } from "./sentiment";

export type StageRegistry = ReadonlyMap<string, AnalysisStage>;

type StageRegistryDeps = {
  sentimentClassifier: SentimentClassifier;
  sentimentMaxCaptions: number;
  seed: number;
};

/** Builds the capability map once; iteration order is reporting order. */
export const createStageRegistry = (deps: StageRegistryDeps): StageRegistry => {
  const stages: AnalysisStage[] = [
    followerForecastStage,
    createSentimentStage({
      classifier: deps.sentimentClassifier,
      maxCaptions: deps.sentimentMaxCaptions,
      seed: deps.seed
    }),
    hashtagPerformanceStage,
    postingTimeStage,
    createAudienceSegmentsStage({ seed: deps.seed })
  ];
  return registryOf(stages);
};

export const registryOf = (stages: readonly AnalysisStage[]): StageRegistry => {
  const registry = new Map<string, AnalysisStage>();
  for (const stage of stages) {
    if (registry.has(stage.name)) {
      throw new Error(`Duplicate stage name: ${stage.name}`);
    }
    registry.set(stage.name, stage);
  }
  return registry;
};

export const describeStages = (registry: StageRegistry) =>
  [...registry.values()].map((stage) => ({
    name: stage.name,
    description: stage.description,
    has_fallback: typeof stage.fallback === "function"
  }));

export type { SentimentClassifier, SentimentLabel } from "./sentiment";
