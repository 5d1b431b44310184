import type { ImageReference } from '@radar/shared';
import type { ChatCompletionClient, LLMContentPart, LLMMessage } from '../llm';

/** Sent after a length-limited stop to ask the model for the remainder. */
export const CONTINUE_PROMPT = '请继续，从你上次停止的地方继续输出，不要重复已输出的内容。';

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_TEMPERATURE = 0.3;

export interface AskRequest {
  systemPrompt: string;
  userContent: string;
  /** Prior turns placed between the system turn and the new user turn. Never mutated. */
  history?: readonly LLMMessage[];
  images?: readonly ImageReference[];
  supportsVision: boolean;
  maxAttempts?: number;
  temperature?: number;
}

function buildUserMessage(request: AskRequest): LLMMessage {
  const images = request.images ?? [];
  if (images.length === 0 || !request.supportsVision) {
    return { role: 'user', content: request.userContent };
  }

  const parts: LLMContentPart[] = [{ type: 'text', text: request.userContent }];
  for (const image of images) {
    parts.push({ type: 'image_url', image_url: { url: image.url, detail: 'high' } });
  }
  return { role: 'user', content: parts };
}

/**
 * Issue one logical ask, resuming the answer while the provider reports a
 * length-limited stop. Returns every attempt's text joined with no separator.
 */
export async function askWithContinuation(llm: ChatCompletionClient, request: AskRequest): Promise<string> {
  const maxAttempts = Math.max(1, request.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const temperature = request.temperature ?? DEFAULT_TEMPERATURE;

  const messages: LLMMessage[] = [
    { role: 'system', content: request.systemPrompt },
    ...(request.history ?? []),
    buildUserMessage(request),
  ];

  let fullResponse = '';
  for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
    const response = await llm.chat([...messages], { temperature });
    const chunk = response.content ?? '';
    fullResponse += chunk;

    if (response.finishReason !== 'length') {
      break;
    }

    messages.push({ role: 'assistant', content: chunk });
    messages.push({ role: 'user', content: CONTINUE_PROMPT });
  }

  return fullResponse;
}
