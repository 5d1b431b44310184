import { describe, expect, it } from 'vitest';
import { CONTINUE_PROMPT, askWithContinuation } from '../../apps/api/src/services/agents/continuation';
import type { LLMMessage } from '../../apps/api/src/services/llm';
import { FakeLLM } from '../helpers/fake-llm';

const IMAGE = { url: 'data:image/png;base64,AAAA' };

describe('askWithContinuation', () => {
  it('should return a single complete answer from one call', async () => {
    const llm = new FakeLLM(['hello']);

    const text = await askWithContinuation(llm, { systemPrompt: 'sys', userContent: 'question', supportsVision: false });

    expect(text).toBe('hello');
    expect(llm.calls).toHaveLength(1);
    expect(llm.calls[0].messages).toEqual([
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'question' },
    ]);
    expect(llm.calls[0].options).toEqual({ temperature: 0.3 });
  });

  it('should continue after length-limited stops and join the chunks', async () => {
    const llm = new FakeLLM([
      { content: 'A', finishReason: 'length' },
      { content: 'B', finishReason: 'length' },
      'C',
    ]);

    const text = await askWithContinuation(llm, { systemPrompt: 'sys', userContent: 'q', supportsVision: false });

    expect(text).toBe('ABC');
    expect(llm.calls).toHaveLength(3);
    expect(llm.calls[1].messages).toHaveLength(4);
    expect(llm.calls[2].messages).toEqual([
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'q' },
      { role: 'assistant', content: 'A' },
      { role: 'user', content: CONTINUE_PROMPT },
      { role: 'assistant', content: 'B' },
      { role: 'user', content: CONTINUE_PROMPT },
    ]);
  });

  it('should stop at the attempt limit even when the output is still truncated', async () => {
    const llm = FakeLLM.responding(() => ({ content: 'x', finishReason: 'length' }));

    const text = await askWithContinuation(llm, {
      systemPrompt: 'sys',
      userContent: 'q',
      supportsVision: false,
      maxAttempts: 3,
    });

    expect(text).toBe('xxx');
    expect(llm.calls).toHaveLength(3);
  });

  it('should make at least one call when the attempt limit is below one', async () => {
    const llm = new FakeLLM([{ content: 'only', finishReason: 'length' }]);

    const text = await askWithContinuation(llm, {
      systemPrompt: 'sys',
      userContent: 'q',
      supportsVision: false,
      maxAttempts: 0,
    });

    expect(text).toBe('only');
    expect(llm.calls).toHaveLength(1);
  });

  it('should treat empty content as an empty chunk', async () => {
    const llm = new FakeLLM([{ content: null, finishReason: 'length' }, 'rest']);

    await expect(
      askWithContinuation(llm, { systemPrompt: 'sys', userContent: 'q', supportsVision: false })
    ).resolves.toBe('rest');
  });

  it('should attach images only when the model supports vision', async () => {
    const vision = new FakeLLM(['seen']);
    await askWithContinuation(vision, {
      systemPrompt: 'sys',
      userContent: 'describe',
      images: [IMAGE],
      supportsVision: true,
    });
    expect(vision.calls[0].messages[1]).toEqual({
      role: 'user',
      content: [
        { type: 'text', text: 'describe' },
        { type: 'image_url', image_url: { url: IMAGE.url, detail: 'high' } },
      ],
    });

    const textOnly = new FakeLLM(['plain']);
    await askWithContinuation(textOnly, {
      systemPrompt: 'sys',
      userContent: 'describe',
      images: [IMAGE],
      supportsVision: false,
    });
    expect(textOnly.calls[0].messages[1]).toEqual({ role: 'user', content: 'describe' });
  });

  it('should place history between the system turn and the new question without mutating it', async () => {
    const history: LLMMessage[] = [
      { role: 'user', content: 'earlier' },
      { role: 'assistant', content: 'reply' },
    ];
    const llm = new FakeLLM([{ content: 'part', finishReason: 'length' }, 'end']);

    await askWithContinuation(llm, {
      systemPrompt: 'sys',
      userContent: 'now',
      history,
      supportsVision: false,
      temperature: 0.7,
    });

    expect(llm.calls[0].messages).toEqual([
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'earlier' },
      { role: 'assistant', content: 'reply' },
      { role: 'user', content: 'now' },
    ]);
    expect(llm.calls[0].options).toEqual({ temperature: 0.7 });
    expect(history).toHaveLength(2);
  });

  it('should propagate provider errors', async () => {
    const llm = new FakeLLM([new Error('upstream unavailable')]);

    await expect(
      askWithContinuation(llm, { systemPrompt: 'sys', userContent: 'q', supportsVision: false })
    ).rejects.toThrow('upstream unavailable');
  });
});
