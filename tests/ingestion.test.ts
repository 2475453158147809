import { describe, expect, it } from "vitest";
import {
  AuthenticationFailedError,
  EmbeddingModelMismatchError,
  OperationCancelledError,
  ServiceUnavailableError,
} from "../src/domain/errors.js";
import { InMemoryVectorIndex } from "../src/infra/store/inMemoryVectorIndex.js";
import {
  IngestionOptions,
  IngestionPipeline,
  IngestionRow,
  splitIntoBatches,
} from "../src/pipelines/ingestion.js";
import { DEFAULT_NORMALIZER_OPTIONS } from "../src/pipelines/normalizer.js";
import { FakeAiClient } from "./helpers/fakeAiClient.js";
import { SCENARIO_RECORDS } from "./helpers/transactions.js";

const OPTIONS: IngestionOptions = {
  batchSize: 2,
  concurrency: 1,
  skipUnchanged: true,
  retry: { maxAttempts: 2, initialDelayMs: 1, maxDelayMs: 1, backoffMultiplier: 1 },
  normalizer: DEFAULT_NORMALIZER_OPTIONS,
};

function toRows(records: unknown[]): IngestionRow[] {
  return records.map((record, index) => ({ line: index + 1, record }));
}

function setup(options: Partial<IngestionOptions> = {}, client = new FakeAiClient()) {
  const index = new InMemoryVectorIndex();
  const pipeline = new IngestionPipeline(index, client, { ...OPTIONS, ...options });
  return { index, client, pipeline };
}

describe("IngestionPipeline", () => {
  it("embeds and stores every valid record", async () => {
    const { index, client, pipeline } = setup();

    const report = await pipeline.ingest(toRows(SCENARIO_RECORDS));

    expect(report).toMatchObject({
      total_records: 3,
      ingested_count: 3,
      unchanged_count: 0,
      skipped: [],
      failed_batches: [],
      failed_ids: [],
      embedding_model: "fake:keywords",
    });
    expect(client.embedCalls).toBe(2);
    expect(await index.count()).toBe(3);
    expect(await index.getManifest()).toEqual({ embeddingModel: "fake:keywords", dimension: 4 });
    expect((await index.get("T1"))?.payload.text).toBe(
      "Date: 2024-01-01 08:00 | Station: A | Fuel: diesel | Quantity: 50.00 L | Unit price: $1.500 | Total: $75.00",
    );
  });

  it("reports malformed, oversized and duplicate records without stopping", async () => {
    const { index, pipeline } = setup({}, new FakeAiClient({ maxInputChars: 200 }));
    const [t1, t2] = SCENARIO_RECORDS;

    const report = await pipeline.ingest([
      { source: "/data/sales.csv", line: 2, record: t1 },
      { source: "/data/sales.csv", line: 3, record: { ...t2, id: "BAD", quantity: "lots" } },
      { source: "/data/sales.csv", line: 4, record: { ...t2, id: "LONG", stationId: "X".repeat(300) } },
      { source: "/data/sales.csv", line: 5, record: { ...t1, totalAmount: 80 } },
    ]);

    expect(report.ingested_count).toBe(1);
    expect(report.skipped).toEqual([
      {
        source: "/data/sales.csv",
        line: 3,
        id: "BAD",
        code: "MALFORMED_RECORD",
        reason: "Malformed transaction record (quantity: must be a number)",
      },
      {
        source: "/data/sales.csv",
        line: 4,
        id: "LONG",
        code: "INPUT_TOO_LONG",
        reason: expect.stringContaining("the model accepts at most 200"),
      },
      {
        source: "/data/sales.csv",
        line: 5,
        id: "T1",
        code: "DUPLICATE_ID",
        reason: "Transaction id T1 appears more than once; the first occurrence was kept.",
      },
    ]);
    expect((await index.get("T1"))?.payload.transaction.totalAmount).toBe(75);
  });

  it("skips records whose text is already indexed", async () => {
    const { index, client, pipeline } = setup();
    await pipeline.ingest(toRows(SCENARIO_RECORDS));
    const before = await index.list();

    const rerun = await pipeline.ingest(toRows(SCENARIO_RECORDS));
    expect(rerun.ingested_count).toBe(0);
    expect(rerun.unchanged_count).toBe(3);
    expect(client.embedCalls).toBe(2);
    expect(await index.list()).toEqual(before);

    const [t1, t2, t3] = SCENARIO_RECORDS;
    const changed = await pipeline.ingest(toRows([t1, { ...t2, totalAmount: 55 }, t3]));
    expect(changed.ingested_count).toBe(1);
    expect(changed.unchanged_count).toBe(2);
    expect(client.embeddedTexts.at(-1)).toHaveLength(1);
  });

  it("re-embeds everything when unchanged detection is off", async () => {
    const { pipeline } = setup({ skipUnchanged: false });
    await pipeline.ingest(toRows(SCENARIO_RECORDS));

    const rerun = await pipeline.ingest(toRows(SCENARIO_RECORDS));
    expect(rerun.ingested_count).toBe(3);
    expect(rerun.unchanged_count).toBe(0);
  });

  it("retries a batch after a transient embedding failure", async () => {
    const { index, client, pipeline } = setup({ batchSize: 10 });
    client.failNextEmbeddings(new ServiceUnavailableError("Embedding service", "HTTP 503"));

    const report = await pipeline.ingest(toRows(SCENARIO_RECORDS));

    expect(report.ingested_count).toBe(3);
    expect(report.failed_batches).toEqual([]);
    expect(client.embedCalls).toBe(2);
    expect(await index.count()).toBe(3);
  });

  it("reports a batch whose retries run out and continues with the next one", async () => {
    const { index, client, pipeline } = setup();
    client.failNextEmbeddings(
      new ServiceUnavailableError("Embedding service", "HTTP 503"),
      new ServiceUnavailableError("Embedding service", "HTTP 503"),
    );

    const report = await pipeline.ingest(toRows(SCENARIO_RECORDS));

    expect(report.ingested_count).toBe(1);
    expect(report.failed_ids).toEqual(["T1", "T2"]);
    expect(report.failed_batches).toEqual([
      {
        batch: 1,
        ids: ["T1", "T2"],
        code: "UPSTREAM_UNAVAILABLE",
        reason: "Embedding batch 1/2 failed after 2 attempt(s): Embedding service is unavailable: HTTP 503",
      },
    ]);
    expect(await index.get("T1")).toBeNull();
    expect(await index.get("T3")).not.toBeNull();
  });

  it("refuses to mix embedding models in one index", async () => {
    const { index, pipeline } = setup();
    await pipeline.ingest(toRows(SCENARIO_RECORDS));

    const other = new FakeAiClient({ modelId: "fake:other" });
    const mismatched = new IngestionPipeline(index, other, OPTIONS);

    await expect(mismatched.ingest(toRows(SCENARIO_RECORDS))).rejects.toBeInstanceOf(
      EmbeddingModelMismatchError,
    );
    expect(other.embedCalls).toBe(0);
  });

  it("stops on fatal upstream errors", async () => {
    const { index, client, pipeline } = setup();
    client.failNextEmbeddings(new AuthenticationFailedError("Embedding service"));

    await expect(pipeline.ingest(toRows(SCENARIO_RECORDS))).rejects.toBeInstanceOf(
      AuthenticationFailedError,
    );
    expect(client.embedCalls).toBe(1);
    expect(await index.count()).toBe(0);
  });

  it("honours cancellation", async () => {
    const { client, pipeline } = setup();
    const controller = new AbortController();
    controller.abort();

    await expect(
      pipeline.ingest(toRows(SCENARIO_RECORDS), { signal: controller.signal }),
    ).rejects.toBeInstanceOf(OperationCancelledError);
    expect(client.embedCalls).toBe(0);
  });
});

describe("splitIntoBatches", () => {
  it("splits into fixed-size batches", () => {
    expect(splitIntoBatches([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it("treats sizes below one as one", () => {
    expect(splitIntoBatches(["a", "b"], 0)).toEqual([["a"], ["b"]]);
  });
});
