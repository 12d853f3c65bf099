import { sampleDeterministic } from "../preprocess";
import type { AnalysisStage, Dataset, StageOutput } from "../types";
import { round } from "./shared";

export type SentimentLabel = "positive" | "negative" | "neutral" | "unknown";

export interface SentimentClassifier {
  readonly name: string;
  classify(text: string): Promise<SentimentLabel>;
}

export const FALLBACK_SAMPLE_SIZE = 100;

type SentimentStageOptions = {
  classifier: SentimentClassifier;
  maxCaptions: number;
  seed: number;
};

const captionsOf = (dataset: Dataset): string[] =>
  dataset.map((post) => post.caption.trim()).filter((caption) => caption.length > 0);

export const summarizeLabels = (labels: readonly SentimentLabel[]) => {
  const counts = { positive: 0, negative: 0, neutral: 0, unknown: 0 };
  for (const label of labels) counts[label] += 1;
  const classified = counts.positive + counts.negative + counts.neutral;
  return {
    ...counts,
    classified,
    averageSentiment: classified === 0 ? 0 : (counts.positive - counts.negative) / classified
  };
};

export const createSentimentStage = (options: SentimentStageOptions): AnalysisStage => {
  const analyze = async (captions: string[], predictionType: string): Promise<StageOutput> => {
    const labels: SentimentLabel[] = [];
    for (const caption of captions) {
      labels.push(await options.classifier.classify(caption));
    }

    const summary = summarizeLabels(labels);
    if (summary.classified === 0) {
      throw new Error(`sentiment classifier ${options.classifier.name} labelled none of ${captions.length} caption(s)`);
    }

    const averageSentiment = round(summary.averageSentiment, 4);
    return {
      status: "completed",
      metrics: {
        captions_analyzed: captions.length,
        classified: summary.classified,
        average_sentiment: averageSentiment
      },
      predictions: [
        {
          predictionType,
          payload: {
            classifier: options.classifier.name,
            captions_analyzed: captions.length,
            positive: summary.positive,
            negative: summary.negative,
            neutral: summary.neutral,
            unknown: summary.unknown,
            average_sentiment: averageSentiment
          }
        }
      ]
    };
  };

  return {
    name: "sentiment_analysis",
    description: "Caption sentiment distribution",
    precondition: (dataset) =>
      captionsOf(dataset).length > 0 ? { ok: true } : { ok: false, reason: "no captions to analyze" },
    run: async (dataset) =>
      analyze(sampleDeterministic(captionsOf(dataset), options.maxCaptions, options.seed), "sentiment_distribution"),
    fallback: async (dataset) =>
      analyze(
        sampleDeterministic(captionsOf(dataset), FALLBACK_SAMPLE_SIZE, options.seed),
        "sentiment_distribution_sample"
      )
  };
};
