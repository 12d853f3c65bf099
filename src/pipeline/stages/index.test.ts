import { fakeStage } from "../../../test/support/stages";
import { createStageRegistry, describeStages, registryOf } from "./index";

describe("stage registry", () => {
  const registry = createStageRegistry({
    sentimentClassifier: { name: "fixed", classify: async () => "neutral" },
    sentimentMaxCaptions: 10,
    seed: 42
  });

  it("registers the analysis stages in reporting order", () => {
    expect([...registry.keys()]).toEqual([
      "follower_forecast",
      "sentiment_analysis",
      "hashtag_performance",
      "posting_time",
      "audience_segments"
    ]);
  });

  it("describes every stage and whether it has a fallback", () => {
    expect(describeStages(registry).every((stage) => stage.has_fallback)).toBe(true);
    expect(describeStages(registryOf([fakeStage("plain")]))).toEqual([
      { name: "plain", description: "plain stage", has_fallback: false }
    ]);
  });

  it("rejects duplicate names", () => {
    expect(() => registryOf([fakeStage("same"), fakeStage("same")])).toThrow("Duplicate stage name: same");
  });
});
