import { AnswerMode, AppConfig } from "../../config/env.js";
import { InputTooLongError } from "../../domain/errors.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";
import {
  AiClient,
  CallOptions,
  ChatProviderClient,
  EmbeddingProviderClient,
  GroundedPrompt,
} from "./types.js";

export class DefaultAiClient implements AiClient {
  private readonly embedder: EmbeddingProviderClient;

  private readonly chat: ChatProviderClient | null;

  private readonly answerMode: AnswerMode;

  readonly maxInputChars: number;

  constructor(config: AppConfig) {
    const openAi = new OpenAiClient({
      apiKey: config.openaiApiKey,
      baseUrl: config.openaiBaseUrl,
      embeddingModel: config.openaiEmbeddingModel,
      embeddingDimensions: config.openaiEmbeddingDimensions,
      chatModel: config.openaiChatModel,
      timeoutMs: config.requestTimeoutMs,
    });
    const ollama = new OllamaClient({
      baseUrl: config.ollamaBaseUrl,
      chatModel: config.ollamaChatModel,
      embeddingModel: config.ollamaEmbeddingModel,
      timeoutMs: config.requestTimeoutMs,
    });

    this.embedder = config.embeddingProvider === "openai" ? openAi : ollama;
    this.chat =
      config.answerMode === "openai" ? openAi : config.answerMode === "ollama" ? ollama : null;
    this.answerMode = config.answerMode;
    this.maxInputChars = config.embeddingMaxInputChars;
  }

  get embeddingModelId(): string {
    return this.embedder.modelId;
  }

  async embedTexts(texts: string[], options?: CallOptions): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    for (const text of texts) {
      this.assertEmbeddable(text);
    }
    return this.embedder.embedTexts(texts, options);
  }

  async embedQuery(text: string, options?: CallOptions): Promise<number[]> {
    this.assertEmbeddable(text);
    const [embedding] = await this.embedder.embedTexts([text], options);
    return embedding;
  }

  getAnswerMode(): AnswerMode {
    return this.answerMode;
  }

  async generateGroundedAnswer(prompt: GroundedPrompt, options?: CallOptions): Promise<string> {
    if (!this.chat) {
      throw new Error("Answer generation is disabled in extractive mode.");
    }
    return this.chat.generateGroundedAnswer(prompt, options);
  }

  private assertEmbeddable(text: string): void {
    if (!text.trim()) {
      throw new Error("Cannot embed empty text.");
    }
    if (text.length > this.maxInputChars) {
      throw new InputTooLongError(text.length, this.maxInputChars);
    }
  }
}
