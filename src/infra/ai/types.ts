import { AnswerMode } from "../../config/env.js";

export interface CallOptions {
  signal?: AbortSignal;
}

export interface GroundedPrompt {
  system: string;
  user: string;
}

export interface AiClient {
  /** Identifies the embedding model; stored in the index manifest. */
  readonly embeddingModelId: string;
  readonly maxInputChars: number;
  embedTexts(texts: string[], options?: CallOptions): Promise<number[][]>;
  embedQuery(text: string, options?: CallOptions): Promise<number[]>;
  getAnswerMode(): AnswerMode;
  generateGroundedAnswer(prompt: GroundedPrompt, options?: CallOptions): Promise<string>;
}

export interface EmbeddingProviderClient {
  readonly modelId: string;
  embedTexts(texts: string[], options?: CallOptions): Promise<number[][]>;
}

export interface ChatProviderClient {
  generateGroundedAnswer(prompt: GroundedPrompt, options?: CallOptions): Promise<string>;
}
