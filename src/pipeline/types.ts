import type { JsonValue } from "../core/http";

/** A preprocessed record. Unlike CanonicalPost, the timestamp may be unknown. */
export type AnalysisPost = Readonly<{
  postId: string;
  timestamp: Date | null;
  caption: string;
  likes: number;
  comments: number;
  shares: number;
  saves: number;
  impressions: number;
  reach: number;
  followerCount: number;
  audienceGender: string;
  audienceAge: string;
  location: string;
  hashtags: string;
  mediaType: string;
}>;

export type Dataset = readonly AnalysisPost[];

export type JsonRecord = { [key: string]: JsonValue };

export type PredictionDraft = {
  predictionType: string;
  payload: JsonRecord;
};

export type StageOutput =
  | { status: "completed"; metrics: JsonRecord; predictions: PredictionDraft[] }
  | { status: "skipped"; reason: string };

export type PreconditionResult = { ok: true } | { ok: false; reason: string };

export interface AnalysisStage {
  readonly name: string;
  readonly description: string;
  precondition(dataset: Dataset): PreconditionResult;
  run(dataset: Dataset): Promise<StageOutput>;
  /** Reduced-scope alternative tried after the primary throws. */
  fallback?(dataset: Dataset): Promise<StageOutput>;
}

export type ModuleStatus = "completed" | "failed" | "skipped";

export type ModuleOutcome = {
  moduleName: string;
  status: ModuleStatus;
  attempts: number;
  fallbackUsed: boolean;
  durationMs: number;
  finishedAt: Date;
  metrics: JsonRecord;
  predictions: PredictionDraft[];
  reason?: string;
  error?: string;
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export type DataSource =
  | { kind: "store" }
  | { kind: "csv"; content: string }
  | { kind: "s3"; bucket: string; key: string };

export const PIPELINE_STATES = [
  "init",
  "loading",
  "preprocessing",
  "running_modules",
  "persisting",
  "done",
  "failed"
] as const;
export type PipelineState = (typeof PIPELINE_STATES)[number];

export type PipelineStatus = "completed" | "failed";

export const TRIGGER_TYPES = ["manual", "scheduled", "ingestion"] as const;
export type TriggerType = (typeof TRIGGER_TYPES)[number];

export type PipelineSummary = {
  status: PipelineStatus;
  runId: string;
  modulesExecuted: number;
  successful: number;
  failed: number;
  skipped: number;
  durationSeconds: number;
  recoveryAttempts: number;
  recordsProcessed: number;
  results: ModuleOutcome[];
  error?: string;
};
