import OpenAI from "openai";
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
import { ChatMessage, CompletionOptions, EmbeddingModel, LanguageModel } from "./languageModel";

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    default:
      return { role: "user", content: message.content };
  }
}

export interface OpenAIModelOptions {
  apiKey?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

/**
 * Chat completions through OpenAI.
 * The client timeout bounds every call so a stalled provider fails the turn
 * instead of hanging it.
 */
export class OpenAIChatModel implements LanguageModel {
  private client: OpenAI;
  private model: string;
  private temperature: number;
  private maxTokens: number;

  constructor(options: OpenAIModelOptions = {}) {
    this.client = new OpenAI({
      apiKey: options.apiKey || process.env.OPENAI_API_KEY,
      timeout: options.timeoutMs ?? 30000,
      maxRetries: 1,
    });
    this.model = options.model ?? "gpt-4o-mini";
    this.temperature = options.temperature ?? 0.7;
    this.maxTokens = options.maxTokens ?? 500;
  }

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const params: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: messages.map(toOpenAIMessage),
      temperature: options.temperature ?? this.temperature,
      max_tokens: options.maxTokens ?? this.maxTokens,
    };
    if (options.json) {
      params.response_format = { type: "json_object" };
    }

    const completion = await this.client.chat.completions.create(params);

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new Error("No response from LLM");
    }
    return content;
  }
}

export class OpenAIEmbeddingModel implements EmbeddingModel {
  private client: OpenAI;
  private model: string;

  constructor(options: OpenAIModelOptions = {}) {
    this.client = new OpenAI({
      apiKey: options.apiKey || process.env.OPENAI_API_KEY,
      timeout: options.timeoutMs ?? 30000,
      maxRetries: 1,
    });
    this.model = options.model ?? "text-embedding-3-small";
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await this.client.embeddings.create({
      model: this.model,
      input: texts,
    });

    // The API echoes an index per input; order by it rather than trusting array order
    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }
}
