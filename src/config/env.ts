import { z } from "zod";
import { LogLevel } from "../utils/logger.js";
import { RetryPolicy } from "../utils/retry.js";

const booleanFlag = z.enum(["true", "false"]).optional();

const envSchema = z.object({
  EMBEDDING_PROVIDER: z.enum(["openai", "ollama"]).default("openai"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-large"),
  OPENAI_EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().optional(),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  ANSWER_MODE: z.enum(["extractive", "openai", "ollama"]).default("openai"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
  DATABASE_URL: z.string().optional(),
  ENABLE_PGVECTOR: booleanFlag,
  VECTOR_DIMENSION: z.coerce.number().int().positive().default(3072),
  PERSIST_INMEMORY_INDEX: booleanFlag,
  INMEMORY_INDEX_PATH: z.string().default(".data/transactions-index.json"),
  MAX_INMEMORY_INDEX_BYTES: z.coerce.number().int().positive().default(200 * 1024 * 1024),
  RAG_TOP_K: z.coerce.number().int().min(1).max(50).default(8),
  RAG_MIN_SCORE: z.coerce.number().min(-1).max(1).default(0.2),
  RAG_CONTEXT_CHAR_BUDGET: z.coerce.number().int().min(200).default(6000),
  EMBEDDING_MAX_INPUT_CHARS: z.coerce.number().int().positive().default(8000),
  INGEST_BATCH_SIZE: z.coerce.number().int().min(1).max(2048).default(10),
  INGEST_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(2),
  INGEST_SKIP_UNCHANGED: booleanFlag,
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  RETRY_INITIAL_DELAY_MS: z.coerce.number().int().min(0).default(500),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(8000),
  RETRY_BACKOFF_MULTIPLIER: z.coerce.number().min(1).default(2),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  DATASET_VOLUME_UNIT: z.string().default("L"),
  DATASET_CURRENCY_SYMBOL: z.string().default("$"),
  DATASET_DEFAULT_STATION: z.string().optional(),
  DATASET_DECIMAL_COMMA: booleanFlag,
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export type EmbeddingProvider = "openai" | "ollama";
export type AnswerMode = "extractive" | "openai" | "ollama";

export interface AppConfig {
  embeddingProvider: EmbeddingProvider;
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  openaiEmbeddingModel: string;
  openaiEmbeddingDimensions: number | null;
  openaiChatModel: string;
  answerMode: AnswerMode;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  ollamaEmbeddingModel: string;
  enablePgvector: boolean;
  databaseUrl: string | null;
  vectorDimension: number;
  persistInMemoryIndex: boolean;
  inMemoryIndexPath: string;
  maxInMemoryIndexBytes: number;
  topK: number;
  minScore: number;
  contextCharBudget: number;
  embeddingMaxInputChars: number;
  ingestBatchSize: number;
  ingestConcurrency: number;
  ingestSkipUnchanged: boolean;
  retry: RetryPolicy;
  requestTimeoutMs: number;
  volumeUnit: string;
  currencySymbol: string;
  decimalComma: boolean;
  defaultStationId: string | null;
  transport: "stdio" | "http";
  host: string;
  port: number;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const openaiApiKey = parsed.OPENAI_API_KEY?.trim() || null;
  const enablePgvector = parsed.ENABLE_PGVECTOR === "true";

  if (enablePgvector && !parsed.DATABASE_URL) {
    throw new Error("ENABLE_PGVECTOR=true requires DATABASE_URL.");
  }
  if (parsed.EMBEDDING_PROVIDER === "openai" && !openaiApiKey) {
    throw new Error("EMBEDDING_PROVIDER=openai requires OPENAI_API_KEY.");
  }
  if (parsed.ANSWER_MODE === "openai" && !openaiApiKey) {
    throw new Error("ANSWER_MODE=openai requires OPENAI_API_KEY.");
  }

  return {
    embeddingProvider: parsed.EMBEDDING_PROVIDER,
    openaiApiKey,
    openaiBaseUrl: parsed.OPENAI_BASE_URL.replace(/\/+$/, ""),
    openaiEmbeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    openaiEmbeddingDimensions: parsed.OPENAI_EMBEDDING_DIMENSIONS ?? null,
    openaiChatModel: parsed.OPENAI_CHAT_MODEL,
    answerMode: parsed.ANSWER_MODE,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL.replace(/\/+$/, ""),
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    enablePgvector,
    databaseUrl: parsed.DATABASE_URL ?? null,
    vectorDimension: parsed.VECTOR_DIMENSION,
    persistInMemoryIndex: parsed.PERSIST_INMEMORY_INDEX === "true",
    inMemoryIndexPath: parsed.INMEMORY_INDEX_PATH,
    maxInMemoryIndexBytes: parsed.MAX_INMEMORY_INDEX_BYTES,
    topK: parsed.RAG_TOP_K,
    minScore: parsed.RAG_MIN_SCORE,
    contextCharBudget: parsed.RAG_CONTEXT_CHAR_BUDGET,
    embeddingMaxInputChars: parsed.EMBEDDING_MAX_INPUT_CHARS,
    ingestBatchSize: parsed.INGEST_BATCH_SIZE,
    ingestConcurrency: parsed.INGEST_CONCURRENCY,
    ingestSkipUnchanged: parsed.INGEST_SKIP_UNCHANGED !== "false",
    retry: {
      maxAttempts: parsed.RETRY_MAX_ATTEMPTS,
      initialDelayMs: parsed.RETRY_INITIAL_DELAY_MS,
      maxDelayMs: parsed.RETRY_MAX_DELAY_MS,
      backoffMultiplier: parsed.RETRY_BACKOFF_MULTIPLIER,
    },
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    volumeUnit: parsed.DATASET_VOLUME_UNIT,
    currencySymbol: parsed.DATASET_CURRENCY_SYMBOL,
    decimalComma: parsed.DATASET_DECIMAL_COMMA === "true",
    defaultStationId: parsed.DATASET_DEFAULT_STATION?.trim() || null,
    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
    logLevel: parsed.LOG_LEVEL,
  };
}
