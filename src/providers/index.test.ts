/**
 * @fileoverview Unit tests for model adapters
 */

import { describe, it, expect, vi } from 'vitest';
import { createModelAdapter, GeminiChatAdapter, OpenAIChatAdapter } from './index.js';
import type { FetchLike, FetchResponseLike } from './base.js';
import { ModelSettingsSchema } from '../config/settings.js';
import { ConfigurationError, ModelAdapterError } from '../types/errors.js';
import type { ChatMessage } from '../types/memory.types.js';

function respond(status: number, body: unknown): FetchResponseLike {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: () => Promise.resolve(body),
    text: () => Promise.resolve(typeof body === 'string' ? body : JSON.stringify(body)),
  };
}

const conversation: ChatMessage[] = [
  { role: 'system', content: 'Be brief.' },
  { role: 'user', content: 'hi' },
  { role: 'assistant', content: 'hello' },
  { role: 'user', content: 'how are you?' },
];

const baseConfig = {
  model: 'test-model',
  apiKey: 'test-secret',
  temperature: 0.2,
  maxTokens: 64,
  timeoutMs: 1_000,
};

describe('OpenAIChatAdapter', () => {
  it('posts a chat completion request and returns the content', async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(
      respond(200, { choices: [{ message: { content: 'fine, thanks' } }] }),
    );
    const adapter = new OpenAIChatAdapter({ ...baseConfig, fetch });

    expect(await adapter.generate(conversation)).toBe('fine, thanks');

    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe('https://api.openai.com/v1/chat/completions');
    expect(init.headers['Authorization']).toBe('Bearer test-secret');
    expect(JSON.parse(init.body)).toEqual({
      model: 'test-model',
      messages: conversation,
      temperature: 0.2,
      max_tokens: 64,
    });
  });

  it('uses a custom endpoint without a trailing slash', async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(respond(200, { choices: [{ message: { content: null } }] }));
    const adapter = new OpenAIChatAdapter({ ...baseConfig, endpoint: 'http://localhost:8080/v1/', fetch });

    expect(await adapter.generate(conversation)).toBe('');
    expect(fetch.mock.calls[0][0]).toBe('http://localhost:8080/v1/chat/completions');
  });

  it('marks credential failures unrecoverable', async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(respond(401, 'bad key'));
    const adapter = new OpenAIChatAdapter({ ...baseConfig, fetch });

    const error = await adapter.generate(conversation).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelAdapterError);
    expect(error).toMatchObject({ recoverable: false, status: 401 });
    expect(error).toHaveProperty('message', 'OpenAI: request failed with status 401: bad key');
  });

  it('marks rate limiting and server errors recoverable', async () => {
    for (const status of [429, 503]) {
      const fetch = vi.fn<FetchLike>().mockResolvedValue(respond(status, ''));
      const adapter = new OpenAIChatAdapter({ ...baseConfig, fetch });

      await expect(adapter.generate(conversation)).rejects.toMatchObject({ recoverable: true, status });
    }
  });

  it('wraps network failures', async () => {
    const fetch = vi.fn<FetchLike>().mockRejectedValue(new Error('ECONNREFUSED'));
    const adapter = new OpenAIChatAdapter({ ...baseConfig, fetch });

    await expect(adapter.generate(conversation)).rejects.toThrow('OpenAI: network error: ECONNREFUSED');
  });

  it('reports timeouts as recoverable', async () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    const fetch = vi.fn<FetchLike>().mockRejectedValue(timeout);
    const adapter = new OpenAIChatAdapter({ ...baseConfig, fetch });

    await expect(adapter.generate(conversation)).rejects.toMatchObject({
      message: 'OpenAI: request timed out after 1000ms',
      recoverable: true,
    });
  });

  it('rejects an unexpected response shape', async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(respond(200, { choices: [] }));
    const adapter = new OpenAIChatAdapter({ ...baseConfig, fetch });

    await expect(adapter.generate(conversation)).rejects.toThrow('OpenAI: unexpected response shape');
  });

  it('fails without an API key and never calls the network', async () => {
    const fetch = vi.fn<FetchLike>();
    const adapter = new OpenAIChatAdapter({ ...baseConfig, apiKey: undefined, fetch });

    await expect(adapter.generate(conversation)).rejects.toMatchObject({ recoverable: false });
    expect(fetch).not.toHaveBeenCalled();
  });
});

describe('GeminiChatAdapter', () => {
  it('maps roles and the system instruction', async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(
      respond(200, { candidates: [{ content: { parts: [{ text: 'doing ' }, { text: 'well' }] } }] }),
    );
    const adapter = new GeminiChatAdapter({ ...baseConfig, fetch });

    expect(await adapter.generate(conversation)).toBe('doing well');

    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe(
      'https://generativelanguage.googleapis.com/v1beta/models/test-model:generateContent',
    );
    expect(init.headers['x-goog-api-key']).toBe('test-secret');
    expect(JSON.parse(init.body)).toEqual({
      systemInstruction: { parts: [{ text: 'Be brief.' }] },
      contents: [
        { role: 'user', parts: [{ text: 'hi' }] },
        { role: 'model', parts: [{ text: 'hello' }] },
        { role: 'user', parts: [{ text: 'how are you?' }] },
      ],
      generationConfig: { temperature: 0.2, maxOutputTokens: 64 },
    });
  });

  it('omits the system instruction when there are no system messages', () => {
    const adapter = new GeminiChatAdapter({ ...baseConfig, fetch: vi.fn<FetchLike>() });

    expect(adapter.createRequest([{ role: 'user', content: 'hi' }])).not.toHaveProperty('systemInstruction');
  });
});

describe('createModelAdapter', () => {
  it('builds the configured provider with its default model', () => {
    const openai = createModelAdapter(ModelSettingsSchema.parse({ provider: 'openai' }));
    const gemini = createModelAdapter(ModelSettingsSchema.parse({ provider: 'gemini', temperature: 0.1 }));

    expect(openai.getModelInfo()).toEqual({ provider: 'openai', model: 'gpt-4', temperature: 0.7, maxTokens: 2000 });
    expect(gemini.getModelInfo()).toEqual({
      provider: 'gemini',
      model: 'gemini-1.5-flash',
      temperature: 0.1,
      maxTokens: 2000,
    });
  });

  it('rejects an unsupported provider', () => {
    expect(() => createModelAdapter(ModelSettingsSchema.parse({ provider: 'claude' }))).toThrow(
      ConfigurationError,
    );
  });
});
