import { describe, expect, it } from "vitest";
import { createRuntime } from "../src/bootstrap.js";
import { loadConfig } from "../src/config/env.js";
import { FakeAiClient } from "./helpers/fakeAiClient.js";
import { SCENARIO_RECORDS } from "./helpers/transactions.js";

const LOCAL_ENV = {
  EMBEDDING_PROVIDER: "ollama",
  ANSWER_MODE: "extractive",
  LOG_LEVEL: "silent",
};

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig(LOCAL_ENV);

    expect(config).toMatchObject({
      embeddingProvider: "ollama",
      answerMode: "extractive",
      enablePgvector: false,
      persistInMemoryIndex: false,
      topK: 8,
      minScore: 0.2,
      contextCharBudget: 6000,
      ingestBatchSize: 10,
      ingestConcurrency: 2,
      ingestSkipUnchanged: true,
      retry: { maxAttempts: 3, initialDelayMs: 500, maxDelayMs: 8000, backoffMultiplier: 2 },
      volumeUnit: "L",
      currencySymbol: "$",
      decimalComma: false,
      defaultStationId: null,
      transport: "stdio",
    });
  });

  it("parses numbers, flags and trims urls", () => {
    const config = loadConfig({
      ...LOCAL_ENV,
      OLLAMA_BASE_URL: "http://ollama.test:11434/",
      RAG_TOP_K: "12",
      INGEST_SKIP_UNCHANGED: "false",
      DATASET_DEFAULT_STATION: "  North  ",
      DATASET_DECIMAL_COMMA: "true",
      RAG_MIN_SCORE: "0.35",
    });

    expect(config.ollamaBaseUrl).toBe("http://ollama.test:11434");
    expect(config.topK).toBe(12);
    expect(config.ingestSkipUnchanged).toBe(false);
    expect(config.defaultStationId).toBe("North");
    expect(config.decimalComma).toBe(true);
    expect(config.minScore).toBe(0.35);
  });

  it("requires credentials for OpenAI", () => {
    expect(() => loadConfig({ EMBEDDING_PROVIDER: "openai" })).toThrow(
      "EMBEDDING_PROVIDER=openai requires OPENAI_API_KEY.",
    );
    expect(() => loadConfig({ ...LOCAL_ENV, ANSWER_MODE: "openai" })).toThrow(
      "ANSWER_MODE=openai requires OPENAI_API_KEY.",
    );
  });

  it("requires a database url for pgvector", () => {
    expect(() => loadConfig({ ...LOCAL_ENV, ENABLE_PGVECTOR: "true" })).toThrow(
      "ENABLE_PGVECTOR=true requires DATABASE_URL.",
    );
  });

  it("rejects out-of-range values", () => {
    expect(() => loadConfig({ ...LOCAL_ENV, RAG_TOP_K: "0" })).toThrow();
  });
});

describe("createRuntime", () => {
  it("wires an in-memory index into the service", async () => {
    const runtime = await createRuntime(loadConfig(LOCAL_ENV), new FakeAiClient());

    const report = await runtime.service.ingestRecords(SCENARIO_RECORDS);
    const stats = await runtime.service.describeIndex();
    await runtime.close();

    expect(report.ingested_count).toBe(3);
    expect(stats).toMatchObject({ entry_count: 3, storage: null, answer_generation_mode: "extractive" });
  });
});
