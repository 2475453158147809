import {
  EmbeddingModelMismatchError,
  ErrorCodes,
  FuelQaError,
  IndexWriteFailedError,
  InputTooLongError,
  MalformedRecordError,
  ServiceUnavailableError,
  UpstreamUnavailableError,
  errorMessage,
} from "../domain/errors.js";
import { IndexEntry, TransactionDocument } from "../domain/types.js";
import { VectorIndex } from "../domain/vectorIndex.js";
import { AiClient } from "../infra/ai/types.js";
import { throwIfCancelled } from "../utils/abort.js";
import { mapWithConcurrency } from "../utils/concurrency.js";
import { createComponentLogger } from "../utils/logger.js";
import { RetryPolicy, withRetry } from "../utils/retry.js";
import { NormalizerOptions, normalizeTransaction, parseTransaction } from "./normalizer.js";

const log = createComponentLogger("ingestion");

export interface IngestionRow {
  /** File the row came from, when there is one. */
  source?: string;
  line: number | null;
  record: unknown;
  /** Set when the row could not be read; the row is reported as skipped. */
  error?: string;
}

export interface SkippedRecord {
  source?: string;
  line: number | null;
  id: string | null;
  code: string;
  reason: string;
}

export interface FailedBatch {
  batch: number;
  ids: string[];
  code: string;
  reason: string;
}

export interface IngestionReport {
  total_records: number;
  ingested_count: number;
  unchanged_count: number;
  skipped: SkippedRecord[];
  failed_batches: FailedBatch[];
  failed_ids: string[];
  embedding_model: string;
  latency_ms: number;
}

export interface IngestionOptions {
  batchSize: number;
  concurrency: number;
  skipUnchanged: boolean;
  retry: RetryPolicy;
  normalizer: NormalizerOptions;
}

export interface IngestCallOptions {
  signal?: AbortSignal;
}

type BatchOutcome = { ok: true; count: number } | { ok: false; failure: FailedBatch };

export class IngestionPipeline {
  constructor(
    private readonly vectorIndex: VectorIndex,
    private readonly aiClient: AiClient,
    private readonly options: IngestionOptions,
  ) {}

  async ingest(rows: IngestionRow[], callOptions: IngestCallOptions = {}): Promise<IngestionReport> {
    const startedAt = Date.now();
    const { signal } = callOptions;
    const embeddingModel = this.aiClient.embeddingModelId;
    throwIfCancelled(signal, "Ingestion");

    const { documents, skipped } = this.prepareDocuments(rows);

    // A model change would mix incompatible vectors, so check before anything is written.
    const manifest = await this.vectorIndex.getManifest();
    if (manifest && manifest.embeddingModel !== embeddingModel) {
      throw new EmbeddingModelMismatchError(manifest.embeddingModel, embeddingModel);
    }

    let pending = documents;
    let unchangedCount = 0;
    if (this.options.skipUnchanged && manifest && documents.length > 0) {
      const stored = await this.vectorIndex.getMany(documents.map((doc) => doc.id));
      pending = documents.filter((doc) => stored.get(doc.id)?.payload.text !== doc.text);
      unchangedCount = documents.length - pending.length;
    }

    const batches = splitIntoBatches(pending, this.options.batchSize);
    log.info(
      {
        records: rows.length,
        pending: pending.length,
        unchanged: unchangedCount,
        skipped: skipped.length,
        batches: batches.length,
      },
      "Starting ingestion",
    );

    const outcomes = await mapWithConcurrency(batches, this.options.concurrency, (batch, index) =>
      this.processBatch(batch, index + 1, batches.length, signal),
    );

    let ingestedCount = 0;
    const failedBatches: FailedBatch[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        ingestedCount += outcome.count;
      } else {
        failedBatches.push(outcome.failure);
      }
    }

    const report: IngestionReport = {
      total_records: rows.length,
      ingested_count: ingestedCount,
      unchanged_count: unchangedCount,
      skipped,
      failed_batches: failedBatches,
      failed_ids: failedBatches.flatMap((failure) => failure.ids),
      embedding_model: embeddingModel,
      latency_ms: Date.now() - startedAt,
    };
    log.info(
      {
        ingested: report.ingested_count,
        unchanged: report.unchanged_count,
        skipped: report.skipped.length,
        failedBatches: report.failed_batches.length,
        latencyMs: report.latency_ms,
      },
      "Ingestion finished",
    );
    return report;
  }

  private prepareDocuments(rows: IngestionRow[]): {
    documents: TransactionDocument[];
    skipped: SkippedRecord[];
  } {
    const documents: TransactionDocument[] = [];
    const skipped: SkippedRecord[] = [];
    const seen = new Set<string>();

    for (const row of rows) {
      const base = { ...(row.source ? { source: row.source } : {}), line: row.line };
      if (row.error !== undefined) {
        skipped.push({ ...base, id: null, code: ErrorCodes.MALFORMED_RECORD, reason: row.error });
        continue;
      }
      let document: TransactionDocument;
      try {
        document = normalizeTransaction(
          parseTransaction(row.record, this.options.normalizer),
          this.options.normalizer,
        );
      } catch (error) {
        if (!(error instanceof MalformedRecordError)) {
          throw error;
        }
        skipped.push({ ...base, id: readRawId(row.record), code: error.code, reason: error.message });
        continue;
      }

      if (document.text.length > this.aiClient.maxInputChars) {
        const tooLong = new InputTooLongError(document.text.length, this.aiClient.maxInputChars);
        skipped.push({ ...base, id: document.id, code: tooLong.code, reason: tooLong.message });
        continue;
      }
      if (seen.has(document.id)) {
        skipped.push({
          ...base,
          id: document.id,
          code: "DUPLICATE_ID",
          reason: `Transaction id ${document.id} appears more than once; the first occurrence was kept.`,
        });
        continue;
      }

      seen.add(document.id);
      documents.push(document);
    }

    return { documents, skipped };
  }

  private async processBatch(
    batch: TransactionDocument[],
    batchNumber: number,
    batchCount: number,
    signal: AbortSignal | undefined,
  ): Promise<BatchOutcome> {
    throwIfCancelled(signal, "Ingestion");
    const ids = batch.map((doc) => doc.id);

    try {
      await withRetry(
        async () => {
          const vectors = await this.aiClient.embedTexts(
            batch.map((doc) => doc.text),
            { signal },
          );
          if (vectors.length !== batch.length) {
            throw new ServiceUnavailableError(
              "Embedding service",
              `returned ${vectors.length} vectors for ${batch.length} texts`,
            );
          }
          throwIfCancelled(signal, "Ingestion");

          await this.vectorIndex.bindManifest({
            embeddingModel: this.aiClient.embeddingModelId,
            dimension: vectors[0].length,
          });
          const entries: IndexEntry[] = batch.map((doc, index) => ({
            id: doc.id,
            vector: vectors[index],
            payload: { text: doc.text, transaction: doc.transaction },
          }));
          await this.vectorIndex.upsertMany(entries);
        },
        this.options.retry,
        { operation: `Embedding batch ${batchNumber}/${batchCount}`, signal },
      );
    } catch (error) {
      if (!isBatchLevelFailure(error)) {
        throw error;
      }
      log.warn(
        { batch: batchNumber, size: batch.length, code: error.code, error: errorMessage(error) },
        "Skipping batch",
      );
      return {
        ok: false,
        failure: { batch: batchNumber, ids, code: error.code, reason: error.message },
      };
    }

    log.info({ batch: batchNumber, of: batchCount, size: batch.length }, "Batch ingested");
    return { ok: true, count: batch.length };
  }
}

/**
 * Failures that only affect the batch at hand. Anything else (bad credentials,
 * dimension or model mismatch, cancellation) stops the run.
 */
function isBatchLevelFailure(error: unknown): error is FuelQaError {
  return (
    error instanceof UpstreamUnavailableError ||
    error instanceof IndexWriteFailedError ||
    (error instanceof FuelQaError && error.code === ErrorCodes.INPUT_TOO_LONG)
  );
}

export function splitIntoBatches<T>(items: T[], size: number): T[][] {
  const step = Math.max(1, Math.floor(size));
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += step) {
    batches.push(items.slice(start, start + step));
  }
  return batches;
}

function readRawId(record: unknown): string | null {
  if (typeof record !== "object" || record === null || !("id" in record)) {
    return null;
  }
  const { id } = record;
  if (typeof id === "string" && id.trim()) {
    return id.trim();
  }
  return typeof id === "number" ? String(id) : null;
}
