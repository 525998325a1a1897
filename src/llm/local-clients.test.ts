import { describe, expect, it, vi } from 'vitest';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { LLMConfig } from '../config/types.js';
import { OllamaClient, OpenAICompatibleClient, type JsonPoster } from './local-clients.js';
import { LLMResponseError } from './types.js';

function config(overrides: Partial<LLMConfig> = {}): LLMConfig {
  return { ...DEFAULT_CONFIG.llm, model: 'test-model', ...overrides };
}

function poster(reply: unknown) {
  return vi.fn<JsonPoster>(async () => reply);
}

describe('OpenAICompatibleClient', () => {
  it('posts a chat completion and reads text and usage', async () => {
    const post = poster({
      choices: [{ message: { content: '[]' }, finish_reason: 'stop' }],
      usage: { prompt_tokens: 12, completion_tokens: 3 },
    });
    const client = new OpenAICompatibleClient(config({ apiUrl: 'http://llm.test/v1/' }), 'test-key', post);

    const response = await client.complete('system text', 'user text');

    expect(response).toEqual({ text: '[]', stopReason: 'stop', usage: { inputTokens: 12, outputTokens: 3 } });
    const [url, body, headers] = post.mock.calls[0];
    expect(url).toBe('http://llm.test/v1/chat/completions');
    expect(body.model).toBe('test-model');
    expect(body.messages).toEqual([
      { role: 'system', content: 'system text' },
      { role: 'user', content: 'user text' },
    ]);
    expect(headers).toEqual({ Authorization: 'Bearer test-key' });
  });

  it('sends no authorization header without a key', async () => {
    const post = poster({ choices: [{ message: { content: '{}' } }] });
    const client = new OpenAICompatibleClient(config({ apiUrl: 'http://llm.test/v1' }), undefined, post);

    const response = await client.complete('s', 'u');

    expect(post.mock.calls[0][2]).toEqual({});
    expect(response).toEqual({ text: '{}', stopReason: null, usage: undefined });
  });

  it('rejects a reply without content', async () => {
    const client = new OpenAICompatibleClient(config({ apiUrl: 'http://llm.test/v1' }), undefined, poster({ choices: [] }));

    await expect(client.complete('s', 'u')).rejects.toBeInstanceOf(LLMResponseError);
  });
});

describe('OllamaClient', () => {
  it('asks for a non-streamed JSON reply', async () => {
    const post = poster({
      message: { role: 'assistant', content: '{"accept": true}' },
      done_reason: 'stop',
      prompt_eval_count: 40,
      eval_count: 8,
    });
    const client = new OllamaClient(config({ apiUrl: 'http://ollama.test', maxTokens: 256, temperature: 0 }), post);

    const response = await client.complete('s', 'u');

    expect(response).toEqual({ text: '{"accept": true}', stopReason: 'stop', usage: { inputTokens: 40, outputTokens: 8 } });
    const [url, body] = post.mock.calls[0];
    expect(url).toBe('http://ollama.test/api/chat');
    expect(body).toMatchObject({ stream: false, format: 'json', options: { temperature: 0, num_predict: 256 } });
  });

  it('rejects a reply without a message', async () => {
    const client = new OllamaClient(config({ apiUrl: 'http://ollama.test' }), poster({ error: 'model not found' }));

    await expect(client.complete('s', 'u')).rejects.toThrow('Unusable LLM response: no text content');
  });
});
