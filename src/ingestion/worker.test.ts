import { PostStore } from "../data/postStore";
import { s3Event } from "../../test/support/events";
import { InMemoryRds } from "../../test/support/inMemoryRds";
import { silenceLogs } from "../../test/support/posts";
import { decodeObjectKey, handleS3Event, type IngestionWorkerDeps } from "./worker";

const STANDARD_EXPORT = "post_id,timestamp,likes\ns1,2025-01-01,3\ns2,2025-01-02,4";

describe("decodeObjectKey", () => {
  it("decodes form-encoded keys", () => {
    expect(decodeObjectKey("imports/June+posts%282%29.csv")).toBe("imports/June posts(2).csv");
  });
});

describe("handleS3Event", () => {
  silenceLogs();

  let rds: InMemoryRds;
  let deps: IngestionWorkerDeps;
  let objects: Record<string, string>;
  let enqueue: jest.Mock<Promise<void>, [string, Record<string, unknown>]>;

  beforeEach(() => {
    rds = new InMemoryRds();
    objects = {};
    enqueue = jest.fn<Promise<void>, [string, Record<string, unknown>]>(async () => undefined);
    deps = {
      rawPrefix: "imports/",
      readObject: async (_bucket, key) => objects[key] ?? "",
      store: () => new PostStore(rds),
      queueUrl: "https://sqs.test/pipeline",
      enqueue
    };
  });

  it("ingests new objects under the prefix", async () => {
    objects["imports/posts.csv"] = STANDARD_EXPORT;

    expect(await handleS3Event(s3Event("raw", "imports/posts.csv"), deps)).toEqual([
      { bucket: "raw", key: "imports/posts.csv", status: "ingested", format: "standard", records: 2, inserted: 2 }
    ]);
    expect(rds.dump("Post").map((row) => row.postId)).toEqual(["s1", "s2"]);
  });

  it("queues one analysis run when new posts arrive", async () => {
    objects["imports/a.csv"] = STANDARD_EXPORT;
    objects["imports/b.csv"] = "post_id,timestamp,likes\ns3,2025-01-03,5";

    await handleS3Event(s3Event("raw", "imports/a.csv", "imports/b.csv"), deps);

    expect(enqueue).toHaveBeenCalledTimes(1);
    expect(enqueue).toHaveBeenCalledWith("https://sqs.test/pipeline", {
      run_id: expect.any(String),
      request_id: null,
      trigger_type: "ingestion",
      source: { kind: "store" },
      requested_at: expect.any(String)
    });
  });

  it("queues nothing when every post was already stored", async () => {
    objects["imports/posts.csv"] = STANDARD_EXPORT;
    await handleS3Event(s3Event("raw", "imports/posts.csv"), { ...deps, queueUrl: undefined });

    await handleS3Event(s3Event("raw", "imports/posts.csv"), deps);

    expect(enqueue).not.toHaveBeenCalled();
  });

  it("queues nothing without a queue", async () => {
    objects["imports/posts.csv"] = STANDARD_EXPORT;

    await handleS3Event(s3Event("raw", "imports/posts.csv"), { ...deps, queueUrl: undefined });

    expect(enqueue).not.toHaveBeenCalled();
  });

  it("ignores objects outside the prefix", async () => {
    expect(await handleS3Event(s3Event("raw", "exports/report.csv"), deps)).toEqual([
      { bucket: "raw", key: "exports/report.csv", status: "ignored" }
    ]);
  });

  it("rejects files it cannot ingest without throwing", async () => {
    objects["imports/bad.csv"] = "a,b\n1,2";

    const [result] = await handleS3Event(s3Event("raw", "imports/bad.csv"), deps);

    expect(result).toMatchObject({ status: "rejected", error_code: "unrecognized_format" });
    expect(rds.statements).toEqual([]);
  });

  it("throws when no database is configured", async () => {
    await expect(handleS3Event(s3Event("raw", "imports/posts.csv"), { ...deps, store: () => null })).rejects.toThrow(
      "Database runtime is not configured"
    );
  });
});
