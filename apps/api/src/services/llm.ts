import OpenAI from 'openai';
import type { ChatCompletionContentPart, ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { getConfig, type LLMConfig } from './config';

export type LLMContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string; detail?: 'auto' | 'low' | 'high' } };

export type LLMMessage =
  | { role: 'system'; content: string }
  | { role: 'assistant'; content: string }
  | { role: 'user'; content: string | LLMContentPart[] };

export interface LLMResponse {
  content: string | null;
  /** `stop` for a natural end, `length` when the provider cut the output at its token limit */
  finishReason: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

export interface ChatOptions {
  maxTokens?: number;
  temperature?: number;
}

/**
 * Minimal chat-completion surface the agents depend on.
 * `LLMClient` implements it; tests substitute scripted fakes.
 */
export interface ChatCompletionClient {
  chat(messages: LLMMessage[], options?: ChatOptions): Promise<LLMResponse>;
  getModel(): string;
}

function toProviderMessage(message: LLMMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user': {
      if (typeof message.content === 'string') {
        return { role: 'user', content: message.content };
      }
      const parts: ChatCompletionContentPart[] = message.content.map((part) =>
        part.type === 'text'
          ? { type: 'text', text: part.text }
          : { type: 'image_url', image_url: { url: part.image_url.url, detail: part.image_url.detail } }
      );
      return { role: 'user', content: parts };
    }
  }
}

/**
 * LLM Client for OpenAI-compatible APIs
 */
export class LLMClient implements ChatCompletionClient {
  private client: OpenAI;
  private config: LLMConfig;

  constructor(config: LLMConfig = getConfig().llm, apiKey = process.env.LLM_API_KEY) {
    this.config = config;
    const isTestEnv = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

    if (!apiKey && !isTestEnv) {
      throw new Error('LLM_API_KEY environment variable is required');
    }

    this.client = new OpenAI({
      apiKey: apiKey || 'test-key',
      baseURL: this.config.baseUrl,
      timeout: this.config.timeout,
    });
  }

  /**
   * Non-streaming chat completion
   */
  async chat(messages: LLMMessage[], options?: ChatOptions): Promise<LLMResponse> {
    const response = await this.client.chat.completions.create({
      model: this.config.model,
      messages: messages.map(toProviderMessage),
      max_tokens: options?.maxTokens ?? this.config.maxTokens,
      temperature: options?.temperature ?? this.config.temperature,
      stream: false,
    });

    const choice = response.choices[0];
    if (!choice) {
      throw new Error(`Model ${this.config.model} returned no choices`);
    }

    return {
      content: choice.message.content,
      finishReason: choice.finish_reason,
      usage: response.usage
        ? {
            promptTokens: response.usage.prompt_tokens,
            completionTokens: response.usage.completion_tokens,
            totalTokens: response.usage.total_tokens,
          }
        : undefined,
    };
  }

  /**
   * Get the current model name
   */
  getModel(): string {
    return this.config.model;
  }
}

// Singleton instance
let llmClientInstance: LLMClient | null = null;

/**
 * Get or create the LLM client singleton
 */
export function getLLMClient(): LLMClient {
  if (!llmClientInstance) {
    llmClientInstance = new LLMClient();
  }
  return llmClientInstance;
}

/**
 * Reset the LLM client (useful for testing)
 */
export function resetLLMClient(): void {
  llmClientInstance = null;
}
