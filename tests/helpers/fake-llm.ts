import type { ChatCompletionClient, ChatOptions, LLMMessage, LLMResponse } from '../../apps/api/src/services/llm';

export type ScriptedReply = string | Error | { content: string | null; finishReason?: string };
export type Responder = (messages: LLMMessage[]) => ScriptedReply;

export interface RecordedCall {
  messages: LLMMessage[];
  options?: ChatOptions;
}

/**
 * Scripted stand-in for the chat client. Replies come from the queue first,
 * then from the responder; running out of both fails the call.
 */
export class FakeLLM implements ChatCompletionClient {
  readonly calls: RecordedCall[] = [];
  private readonly queue: ScriptedReply[];

  constructor(
    replies: ScriptedReply[] = [],
    private readonly model = 'deepseek-chat',
    private readonly responder?: Responder
  ) {
    this.queue = [...replies];
  }

  static responding(responder: Responder, model = 'deepseek-chat'): FakeLLM {
    return new FakeLLM([], model, responder);
  }

  async chat(messages: LLMMessage[], options?: ChatOptions): Promise<LLMResponse> {
    this.calls.push({ messages, options });
    const next = this.queue.shift() ?? this.responder?.(messages);
    if (next === undefined) {
      throw new Error('FakeLLM has no scripted reply left');
    }
    if (next instanceof Error) {
      throw next;
    }
    if (typeof next === 'string') {
      return { content: next, finishReason: 'stop' };
    }
    return { content: next.content, finishReason: next.finishReason ?? 'stop' };
  }

  getModel(): string {
    return this.model;
  }

  systemPrompts(): string[] {
    return this.calls.map((call) => systemOf(call.messages));
  }

  userTexts(): string[] {
    return this.calls.map((call) => lastUserText(call.messages));
  }
}

export function systemOf(messages: readonly LLMMessage[]): string {
  const first = messages[0];
  return first?.role === 'system' ? first.content : '';
}

export function lastUserText(messages: readonly LLMMessage[]): string {
  for (let index = messages.length - 1; index >= 0; index -= 1) {
    const message = messages[index];
    if (message.role !== 'user') continue;
    if (typeof message.content === 'string') return message.content;
    return message.content.flatMap((part) => (part.type === 'text' ? [part.text] : [])).join('');
  }
  return '';
}
