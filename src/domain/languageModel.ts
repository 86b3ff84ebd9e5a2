export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  json?: boolean; // ask the provider for a JSON object response
}

/**
 * Text completion capability. Implementations reject on provider errors
 * and timeouts; callers translate that into GenerationFailed.
 */
export interface LanguageModel {
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
}

export interface EmbeddingModel {
  embed(texts: string[]): Promise<number[][]>;
}
