import { describe, it, expect, vi, beforeEach } from 'vitest';
import OpenAI from 'openai';
import { createOpenAICompletionSource } from '../completion.js';

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('openai', () => {
  class APIConnectionTimeoutError extends Error {}

  class OpenAIMock {
    static APIConnectionTimeoutError = APIConnectionTimeoutError;
    chat = { completions: { create } };
  }

  return { default: OpenAIMock };
});

describe('OpenAI completion source', () => {
  beforeEach(() => {
    create.mockReset();
  });

  it('returns the message text and request id', async () => {
    create.mockResolvedValue({
      id: 'chatcmpl-1',
      choices: [{ message: { content: 'ИСТИННЫЙ СМЫСЛ:\nтекст' } }],
      usage: { prompt_tokens: 10, completion_tokens: 5 },
    });
    const source = createOpenAICompletionSource({ apiKey: 'test-secret', model: 'test-model', temperature: 0.2 });

    const result = await source.complete('prompt');

    expect(result).toEqual({ ok: true, text: 'ИСТИННЫЙ СМЫСЛ:\nтекст', requestId: 'chatcmpl-1' });
    expect(create).toHaveBeenCalledWith({
      model: 'test-model',
      messages: [{ role: 'user', content: 'prompt' }],
      temperature: 0.2,
      max_tokens: 1000,
    });
  });

  it('reports blank content as empty', async () => {
    create.mockResolvedValue({ id: 'chatcmpl-2', choices: [{ message: { content: '   ' } }] });
    const source = createOpenAICompletionSource({ apiKey: 'test-secret' });

    expect(await source.complete('prompt')).toEqual({ ok: false, reason: 'empty' });
  });

  it('reports a missing choice as empty', async () => {
    create.mockResolvedValue({ id: 'chatcmpl-3', choices: [] });
    const source = createOpenAICompletionSource({ apiKey: 'test-secret' });

    expect(await source.complete('prompt')).toEqual({ ok: false, reason: 'empty' });
  });

  it('maps a connection timeout to timeout', async () => {
    const error = new OpenAI.APIConnectionTimeoutError();
    create.mockRejectedValue(error);
    const source = createOpenAICompletionSource({ apiKey: 'test-secret', timeoutMs: 10 });

    expect(await source.complete('prompt')).toEqual({ ok: false, reason: 'timeout', error });
  });

  it('maps other failures to error without throwing', async () => {
    const error = new Error('bad gateway');
    create.mockRejectedValue(error);
    const source = createOpenAICompletionSource({ apiKey: 'test-secret' });

    expect(await source.complete('prompt')).toEqual({ ok: false, reason: 'error', error });
  });
});
