import { z } from "zod";
import { ContentFilteredError, ServiceUnavailableError } from "../../domain/errors.js";
import { postJson } from "./http.js";
import {
  CallOptions,
  ChatProviderClient,
  EmbeddingProviderClient,
  GroundedPrompt,
} from "./types.js";

interface OpenAiClientOptions {
  apiKey: string | null;
  baseUrl: string;
  embeddingModel: string;
  embeddingDimensions: number | null;
  chatModel: string;
  timeoutMs: number;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    }),
  ),
});

const chatResponseSchema = z.object({
  choices: z.array(
    z.object({
      finish_reason: z.string().nullish(),
      message: z.object({
        content: z.string().nullish(),
      }),
    }),
  ),
});

const SERVICE = "OpenAI";

export class OpenAiClient implements EmbeddingProviderClient, ChatProviderClient {
  constructor(private readonly options: OpenAiClientOptions) {}

  get modelId(): string {
    const dims = this.options.embeddingDimensions;
    return dims ? `openai:${this.options.embeddingModel}@${dims}` : `openai:${this.options.embeddingModel}`;
  }

  isConfigured(): boolean {
    return Boolean(this.options.apiKey);
  }

  async embedTexts(texts: string[], options?: CallOptions): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const data = await postJson({
      service: `${SERVICE} embeddings`,
      url: `${this.options.baseUrl}/embeddings`,
      headers: this.authHeaders(),
      body: {
        model: this.options.embeddingModel,
        input: texts,
        ...(this.options.embeddingDimensions
          ? { dimensions: this.options.embeddingDimensions }
          : {}),
      },
      schema: embeddingResponseSchema,
      timeoutMs: this.options.timeoutMs,
      signal: options?.signal,
    });

    if (data.data.length !== texts.length) {
      throw new ServiceUnavailableError(
        `${SERVICE} embeddings`,
        `expected ${texts.length} embeddings, received ${data.data.length}`,
      );
    }

    return [...data.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  async generateGroundedAnswer(prompt: GroundedPrompt, options?: CallOptions): Promise<string> {
    const data = await postJson({
      service: `${SERVICE} chat`,
      url: `${this.options.baseUrl}/chat/completions`,
      headers: this.authHeaders(),
      body: {
        model: this.options.chatModel,
        temperature: 0.2,
        max_tokens: 400,
        messages: [
          { role: "system", content: prompt.system },
          { role: "user", content: prompt.user },
        ],
      },
      schema: chatResponseSchema,
      timeoutMs: this.options.timeoutMs,
      signal: options?.signal,
    });

    const choice = data.choices[0];
    if (choice?.finish_reason === "content_filter") {
      throw new ContentFilteredError(`${SERVICE} chat`);
    }
    return choice?.message.content?.trim() ?? "";
  }

  private authHeaders(): Record<string, string> {
    if (!this.options.apiKey) {
      throw new Error("OPENAI_API_KEY is required for OpenAI operations.");
    }
    return { Authorization: `Bearer ${this.options.apiKey}` };
  }
}
