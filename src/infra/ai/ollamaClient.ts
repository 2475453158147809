import { z } from "zod";
import { ServiceUnavailableError } from "../../domain/errors.js";
import { mapWithConcurrency } from "../../utils/concurrency.js";
import { postJson } from "./http.js";
import {
  CallOptions,
  ChatProviderClient,
  EmbeddingProviderClient,
  GroundedPrompt,
} from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  timeoutMs: number;
}

const embeddingsResponseSchema = z.object({
  embedding: z.array(z.number()).optional(),
});

const chatResponseSchema = z.object({
  message: z
    .object({
      content: z.string().optional(),
    })
    .optional(),
});

const EMBEDDING_CONCURRENCY = 4;

export class OllamaClient implements EmbeddingProviderClient, ChatProviderClient {
  constructor(private readonly options: OllamaClientOptions) {}

  get modelId(): string {
    return `ollama:${this.options.embeddingModel}`;
  }

  async embedTexts(texts: string[], options?: CallOptions): Promise<number[][]> {
    // The embeddings endpoint takes one prompt per call.
    return mapWithConcurrency(texts, EMBEDDING_CONCURRENCY, (text) =>
      this.embedOne(text, options),
    );
  }

  async generateGroundedAnswer(prompt: GroundedPrompt, options?: CallOptions): Promise<string> {
    const data = await postJson({
      service: "Ollama chat",
      url: `${this.options.baseUrl}/api/chat`,
      body: {
        model: this.options.chatModel,
        stream: false,
        keep_alive: "30m",
        options: {
          temperature: 0.1,
          num_predict: 400,
          top_p: 0.9,
        },
        messages: [
          { role: "system", content: prompt.system },
          { role: "user", content: prompt.user },
        ],
      },
      schema: chatResponseSchema,
      timeoutMs: this.options.timeoutMs,
      signal: options?.signal,
    });

    return data.message?.content?.trim() ?? "";
  }

  private async embedOne(text: string, options?: CallOptions): Promise<number[]> {
    const data = await postJson({
      service: "Ollama embeddings",
      url: `${this.options.baseUrl}/api/embeddings`,
      body: {
        model: this.options.embeddingModel,
        prompt: text,
      },
      schema: embeddingsResponseSchema,
      timeoutMs: this.options.timeoutMs,
      signal: options?.signal,
    });

    if (!data.embedding || data.embedding.length === 0) {
      throw new ServiceUnavailableError("Ollama embeddings", "returned an empty vector");
    }
    return data.embedding;
  }
}
