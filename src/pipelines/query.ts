import { AnswerMode } from "../config/env.js";
import {
  AnswerGenerationError,
  EmbeddingModelMismatchError,
  InputTooLongError,
  InvalidQuestionError,
  OperationCancelledError,
  RetrievalFailedError,
  ServiceUnavailableError,
  errorMessage,
} from "../domain/errors.js";
import { RetrievalHit, TransactionFilter } from "../domain/types.js";
import { VectorIndex } from "../domain/vectorIndex.js";
import { AiClient } from "../infra/ai/types.js";
import { throwIfCancelled } from "../utils/abort.js";
import { createComponentLogger } from "../utils/logger.js";
import { RetryPolicy, withRetry } from "../utils/retry.js";
import {
  Evidence,
  NO_RELEVANT_DATA_MESSAGE,
  assembleContext,
  buildExtractiveAnswer,
  buildGroundedPrompt,
  parseCitedTransactionIds,
  toEvidence,
} from "./answering.js";
import { NormalizerOptions, normalizeTransactionFilter } from "./normalizer.js";

const log = createComponentLogger("query");

export const MAX_TOP_K = 50;

export interface QueryOptions {
  topK: number;
  minScore: number;
  contextCharBudget: number;
  retry: RetryPolicy;
  normalizer: NormalizerOptions;
}

export interface QueryInput {
  question: string;
  topK?: number;
  filter?: TransactionFilter;
  signal?: AbortSignal;
}

export interface Answer {
  status: "answered" | "no_relevant_data";
  answer: string;
  evidence: Evidence[];
  cited_transaction_ids: string[];
  answer_generation_mode: AnswerMode;
  embedding_model: string;
  latency_ms: number;
}

/**
 * Question answering over the vector index. Each call runs its steps strictly in
 * sequence and keeps all intermediate state local.
 */
export class QueryPipeline {
  constructor(
    private readonly vectorIndex: VectorIndex,
    private readonly aiClient: AiClient,
    private readonly options: QueryOptions,
  ) {}

  /** Embeds the question and returns the hits above the score threshold. */
  async retrieve(input: QueryInput): Promise<RetrievalHit[]> {
    const { signal } = input;
    throwIfCancelled(signal, "Query");

    const question = input.question.trim();
    if (!question) {
      throw new InvalidQuestionError("Question must not be empty.");
    }
    if (question.length > this.aiClient.maxInputChars) {
      throw new InputTooLongError(question.length, this.aiClient.maxInputChars);
    }
    const k = resolveTopK(input.topK, this.options.topK);
    const filter = normalizeTransactionFilter(input.filter);

    const manifest = await this.fromIndex(() => this.vectorIndex.getManifest(), "Index manifest read", signal);
    if (!manifest) {
      return [];
    }
    if (manifest.embeddingModel !== this.aiClient.embeddingModelId) {
      throw new EmbeddingModelMismatchError(manifest.embeddingModel, this.aiClient.embeddingModelId);
    }

    const vector = await withRetry(
      () => this.aiClient.embedQuery(question, { signal }),
      this.options.retry,
      { operation: "Question embedding", signal },
    );
    throwIfCancelled(signal, "Query");

    const hits = await this.fromIndex(
      () => this.vectorIndex.query({ vector, k, filter }),
      "Vector search",
      signal,
    );
    throwIfCancelled(signal, "Query");

    return hits.filter((hit) => hit.score > this.options.minScore);
  }

  async ask(input: QueryInput): Promise<Answer> {
    try {
      return await this.answer(input);
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        log.info("Question cancelled");
      } else {
        log.error({ err: error }, "Question failed");
      }
      throw error;
    }
  }

  private async answer(input: QueryInput): Promise<Answer> {
    const startedAt = Date.now();
    const { signal } = input;
    const question = input.question.trim();
    const mode = this.aiClient.getAnswerMode();
    const embeddingModel = this.aiClient.embeddingModelId;

    const hits = await this.retrieve(input);
    if (hits.length === 0) {
      return {
        status: "no_relevant_data",
        answer: NO_RELEVANT_DATA_MESSAGE,
        evidence: [],
        cited_transaction_ids: [],
        answer_generation_mode: mode,
        embedding_model: embeddingModel,
        latency_ms: Date.now() - startedAt,
      };
    }

    const context = assembleContext(hits, this.options.contextCharBudget);
    let answer: string;
    if (mode === "extractive") {
      answer = buildExtractiveAnswer(question, context.entries, this.options.normalizer);
    } else {
      const prompt = buildGroundedPrompt(question, context);
      try {
        answer = await withRetry(
          async () => {
            const generated = await this.aiClient.generateGroundedAnswer(prompt, { signal });
            if (!generated.trim()) {
              throw new ServiceUnavailableError("Answer generator", "returned an empty response");
            }
            return generated.trim();
          },
          this.options.retry,
          { operation: "Answer generation", signal },
        );
      } catch (error) {
        if (error instanceof OperationCancelledError) {
          throw error;
        }
        log.warn(
          { error: errorMessage(error), evidence: context.entries.length },
          "Answer generation failed",
        );
        throw new AnswerGenerationError(error, {
          question,
          evidenceIds: context.entries.map((entry) => entry.id),
          context: context.block,
        });
      }
    }
    throwIfCancelled(signal, "Query");

    return {
      status: "answered",
      answer,
      evidence: toEvidence(context.entries),
      cited_transaction_ids: parseCitedTransactionIds(answer, context.entries),
      answer_generation_mode: mode,
      embedding_model: embeddingModel,
      latency_ms: Date.now() - startedAt,
    };
  }

  /** Index calls retry transient failures; whatever remains becomes RetrievalFailed. */
  private async fromIndex<T>(
    call: () => Promise<T>,
    operation: string,
    signal: AbortSignal | undefined,
  ): Promise<T> {
    try {
      return await withRetry(call, this.options.retry, { operation, signal });
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        throw error;
      }
      throw new RetrievalFailedError(error);
    }
  }
}

export function resolveTopK(requested: number | undefined, fallback: number): number {
  const value = requested ?? fallback;
  if (!Number.isFinite(value)) {
    return fallback;
  }
  return Math.min(MAX_TOP_K, Math.max(1, Math.floor(value)));
}
