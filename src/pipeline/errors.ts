import type { PipelineState } from "./types";

export class EmptyDatasetError extends Error {
  readonly code = "empty_dataset";

  constructor(message = "Empty dataset provided") {
    super(message);
    this.name = "EmptyDatasetError";
  }
}

/** A loading or preprocessing failure; these drive the run-level recovery loop. */
export class PipelineFatalError extends Error {
  readonly code = "pipeline_fatal";

  constructor(
    public readonly state: PipelineState,
    public readonly causeMessage: string
  ) {
    super(`Pipeline execution failed during ${state}: ${causeMessage}`);
    this.name = "PipelineFatalError";
  }
}
