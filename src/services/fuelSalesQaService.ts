import path from "node:path";
import { AnswerMode } from "../config/env.js";
import { errorMessage } from "../domain/errors.js";
import { IndexManifest, StoredEntry, Transaction, TransactionFilter } from "../domain/types.js";
import { VectorIndex } from "../domain/vectorIndex.js";
import { AiClient } from "../infra/ai/types.js";
import { loadDataset, prepareRecords } from "../infra/parsers/datasetLoader.js";
import { InMemoryIndexStorageInfo } from "../infra/store/persistentInMemoryVectorIndex.js";
import { IngestionOptions, IngestionPipeline, IngestionReport, IngestionRow } from "../pipelines/ingestion.js";
import { Answer, QueryOptions, QueryPipeline } from "../pipelines/query.js";
import { throwIfCancelled } from "../utils/abort.js";

export interface FuelSalesQaOptions {
  ingestion: IngestionOptions;
  query: QueryOptions;
  defaultStationId: string | null;
}

export interface FailedFile {
  path: string;
  reason: string;
}

export interface IngestFilesResult extends IngestionReport {
  files: string[];
  failed_files: FailedFile[];
}

export interface SearchTransactionsResult {
  query: string;
  hits: Array<{
    transaction_id: string;
    score: number;
    text: string;
    transaction: Transaction;
  }>;
}

export interface DescribeIndexResult {
  entry_count: number;
  manifest: IndexManifest | null;
  embedding_model: string;
  model_compatible: boolean;
  answer_generation_mode: AnswerMode;
  sample: StoredEntry | null;
  storage: InMemoryIndexStorageInfo | null;
}

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * Facade shared by the MCP tools and the CLI. `stop()` cancels calls in flight
 * and refuses new ones, so a shutdown does not wait on the embedding service.
 */
export class FuelSalesQaService {
  private readonly lifetime = new AbortController();

  private readonly ingestion: IngestionPipeline;

  private readonly query: QueryPipeline;

  constructor(
    private readonly vectorIndex: VectorIndex,
    private readonly aiClient: AiClient,
    private readonly options: FuelSalesQaOptions,
  ) {
    this.ingestion = new IngestionPipeline(vectorIndex, aiClient, options.ingestion);
    this.query = new QueryPipeline(vectorIndex, aiClient, options.query);
  }

  async ingestFiles(paths: string[], callOptions: CallOptions = {}): Promise<IngestFilesResult> {
    const rows: IngestionRow[] = [];
    const files: string[] = [];
    const failedFiles: FailedFile[] = [];

    for (const rawPath of paths) {
      const absolutePath = path.resolve(rawPath);
      try {
        const loaded = await loadDataset(absolutePath, {
          defaultStationId: this.options.defaultStationId,
        });
        rows.push(...loaded.map((row) => ({ source: absolutePath, ...row })));
        files.push(absolutePath);
      } catch (error) {
        failedFiles.push({ path: rawPath, reason: errorMessage(error) });
      }
    }

    const report = await this.ingestion.ingest(rows, { signal: this.signalFor(callOptions.signal) });
    return { ...report, files, failed_files: failedFiles };
  }

  async ingestRecords(records: unknown[], callOptions: CallOptions = {}): Promise<IngestionReport> {
    const rows = prepareRecords(records, { defaultStationId: this.options.defaultStationId });
    return this.ingestion.ingest(rows, { signal: this.signalFor(callOptions.signal) });
  }

  async ask(input: {
    question: string;
    topK?: number;
    filter?: TransactionFilter;
    signal?: AbortSignal;
  }): Promise<Answer> {
    return this.query.ask({ ...input, signal: this.signalFor(input.signal) });
  }

  async searchTransactions(input: {
    query: string;
    topK?: number;
    filter?: TransactionFilter;
    signal?: AbortSignal;
  }): Promise<SearchTransactionsResult> {
    const hits = await this.query.retrieve({
      question: input.query,
      topK: input.topK,
      filter: input.filter,
      signal: this.signalFor(input.signal),
    });

    return {
      query: input.query,
      hits: hits.map((hit) => ({
        transaction_id: hit.entry.id,
        score: Number(hit.score.toFixed(4)),
        text: hit.entry.payload.text,
        transaction: hit.entry.payload.transaction,
      })),
    };
  }

  async deleteTransaction(id: string): Promise<{ id: string; deleted: boolean }> {
    throwIfCancelled(this.lifetime.signal, "Delete");
    return { id, deleted: await this.vectorIndex.delete(id) };
  }

  async describeIndex(): Promise<DescribeIndexResult> {
    const [entryCount, manifest, sample] = await Promise.all([
      this.vectorIndex.count(),
      this.vectorIndex.getManifest(),
      this.vectorIndex.list({ limit: 1 }),
    ]);

    return {
      entry_count: entryCount,
      manifest,
      embedding_model: this.aiClient.embeddingModelId,
      model_compatible: !manifest || manifest.embeddingModel === this.aiClient.embeddingModelId,
      answer_generation_mode: this.aiClient.getAnswerMode(),
      sample: sample[0] ?? null,
      storage: hasStorageInfo(this.vectorIndex) ? await this.vectorIndex.getStorageInfo() : null,
    };
  }

  async resetIndex(): Promise<{ cleared_entries: number }> {
    throwIfCancelled(this.lifetime.signal, "Reset");
    return this.vectorIndex.clear();
  }

  stop(): void {
    this.lifetime.abort();
  }

  private signalFor(callerSignal: AbortSignal | undefined): AbortSignal {
    return callerSignal ? AbortSignal.any([callerSignal, this.lifetime.signal]) : this.lifetime.signal;
  }
}

function hasStorageInfo(
  value: VectorIndex,
): value is VectorIndex & { getStorageInfo(): Promise<InMemoryIndexStorageInfo> } {
  return "getStorageInfo" in value && typeof value.getStorageInfo === "function";
}
