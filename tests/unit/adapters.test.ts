import { describe, it, expect, vi } from 'vitest';
import { parseModelString, createAdapterFromString } from '../../src/adapters/index.js';
import { OllamaAdapter } from '../../src/adapters/ollama.js';
import { OpenAIAdapter } from '../../src/adapters/openai.js';
import { AnthropicAdapter } from '../../src/adapters/anthropic.js';
import type { FetchLike } from '../../src/adapters/types.js';
import { ModelError, ValidationError } from '../../src/errors.js';

function jsonFetch(body: unknown, status = 200) {
  return vi.fn<FetchLike>(async () => new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  }));
}

function sentBody(fetchMock: ReturnType<typeof jsonFetch>): unknown {
  const init = fetchMock.mock.calls[0][1];
  return JSON.parse(typeof init?.body === 'string' ? init.body : '{}');
}

describe('parseModelString', () => {
  it('parses provider:model format', () => {
    expect(parseModelString('ollama:llama3.2')).toEqual({ provider: 'ollama', model: 'llama3.2' });
    expect(parseModelString('openai:gpt-4o')).toEqual({ provider: 'openai', model: 'gpt-4o' });
  });

  it('defaults to ollama when no provider prefix', () => {
    expect(parseModelString('llama3.2')).toEqual({ provider: 'ollama', model: 'llama3.2' });
  });

  it('handles colons in model name', () => {
    expect(parseModelString('ollama:llama3.2:latest')).toEqual({
      provider: 'ollama', model: 'llama3.2:latest',
    });
  });
});

describe('createAdapterFromString', () => {
  it('creates OllamaAdapter', () => {
    const adapter = createAdapterFromString('ollama:llama3.2', {});
    expect(adapter).toBeInstanceOf(OllamaAdapter);
    expect(adapter.name).toBe('ollama:llama3.2');
  });

  it('creates OpenAIAdapter with API key', () => {
    const adapter = createAdapterFromString('openai:gpt-4o', { OPENAI_API_KEY: 'test-secret' });
    expect(adapter).toBeInstanceOf(OpenAIAdapter);
  });

  it('creates AnthropicAdapter with API key', () => {
    const adapter = createAdapterFromString('anthropic:claude-test', { ANTHROPIC_API_KEY: 'test-secret' });
    expect(adapter).toBeInstanceOf(AnthropicAdapter);
  });

  it('throws without API keys', () => {
    expect(() => createAdapterFromString('openai:gpt-4o', {})).toThrow('OPENAI_API_KEY');
    expect(() => createAdapterFromString('anthropic:claude-test', {})).toThrow('ANTHROPIC_API_KEY');
  });

  it('throws for unknown provider or missing model', () => {
    expect(() => createAdapterFromString('fake:model', {})).toThrow('Unknown provider');
    expect(() => createAdapterFromString('ollama:', {})).toThrow(ValidationError);
  });

  it('uses OLLAMA_HOST from env', async () => {
    const fetchMock = jsonFetch({ message: { content: 'hi' }, done: true });
    const adapter = createAdapterFromString('ollama:llama3', { OLLAMA_HOST: 'http://ollama.test:11434/' }, fetchMock);
    await adapter.complete({ messages: [{ role: 'user', content: 'hello' }] });
    expect(fetchMock.mock.calls[0][0]).toBe('http://ollama.test:11434/api/chat');
  });
});

describe('OllamaAdapter', () => {
  it('sends a non-streaming chat request and maps usage', async () => {
    const fetchMock = jsonFetch({ message: { content: '{"a":1}' }, done: true, prompt_eval_count: 7, eval_count: 3 });
    const adapter = new OllamaAdapter({ baseUrl: 'http://ollama.test', model: 'llama3.2' }, fetchMock);

    const response = await adapter.complete({
      messages: [{ role: 'user', content: 'hello' }],
      responseFormat: 'json',
      maxTokens: 64,
    });

    expect(response).toEqual({
      content: '{"a":1}',
      usage: { promptTokens: 7, completionTokens: 3, totalTokens: 10 },
      finishReason: 'stop',
    });
    expect(sentBody(fetchMock)).toEqual({
      model: 'llama3.2',
      messages: [{ role: 'user', content: 'hello' }],
      stream: false,
      format: 'json',
      options: { temperature: 0.7, num_predict: 64 },
    });
  });

  it('raises ModelError with the server message', async () => {
    const adapter = new OllamaAdapter(
      { baseUrl: 'http://ollama.test', model: 'missing' },
      jsonFetch({ error: 'model not found' }, 404)
    );
    await expect(adapter.complete({ messages: [] })).rejects.toThrow('ollama error: 404 model not found');
  });

  it('raises ModelError on an unexpected body', async () => {
    const adapter = new OllamaAdapter({ baseUrl: 'http://ollama.test', model: 'llama3.2' }, jsonFetch({ nope: true }));
    await expect(adapter.complete({ messages: [] })).rejects.toBeInstanceOf(ModelError);
  });

  it('reports health from the tags endpoint', async () => {
    const down = vi.fn<FetchLike>(async () => {
      throw new Error('ECONNREFUSED');
    });
    expect(await new OllamaAdapter({ baseUrl: 'http://ollama.test', model: 'x' }, down).healthCheck()).toBe(false);

    const up = jsonFetch({ models: [] });
    expect(await new OllamaAdapter({ baseUrl: 'http://ollama.test', model: 'x' }, up).healthCheck()).toBe(true);
    expect(up.mock.calls[0][0]).toBe('http://ollama.test/api/tags');
  });
});

describe('OpenAIAdapter', () => {
  it('requests JSON mode and maps the first choice', async () => {
    const fetchMock = jsonFetch({
      choices: [{ message: { content: 'ok' }, finish_reason: 'length' }],
      usage: { prompt_tokens: 5, completion_tokens: 2, total_tokens: 7 },
    });
    const adapter = new OpenAIAdapter({ apiKey: 'test-secret', model: 'gpt-4o-mini' }, fetchMock);

    const response = await adapter.complete({ messages: [{ role: 'user', content: 'hi' }], responseFormat: 'json' });

    expect(response.content).toBe('ok');
    expect(response.finishReason).toBe('length');
    expect(response.usage.totalTokens).toBe(7);
    expect(fetchMock.mock.calls[0][0]).toBe('https://api.openai.com/v1/chat/completions');
    expect(sentBody(fetchMock)).toMatchObject({ response_format: { type: 'json_object' }, stream: false });
  });

  it('rejects a reply without choices', async () => {
    const adapter = new OpenAIAdapter({ apiKey: 'test-secret', model: 'gpt-4o-mini' }, jsonFetch({ choices: [] }));
    await expect(adapter.complete({ messages: [] })).rejects.toThrow('openai error: response had no choices');
  });

  it('extracts nested error messages', async () => {
    const adapter = new OpenAIAdapter(
      { apiKey: 'test-secret', model: 'gpt-4o-mini' },
      jsonFetch({ error: { message: 'invalid key' } }, 401)
    );
    await expect(adapter.complete({ messages: [] })).rejects.toThrow('openai error: 401 invalid key');
  });
});

describe('AnthropicAdapter', () => {
  it('moves system messages out and adds the JSON instruction', async () => {
    const fetchMock = jsonFetch({
      content: [{ type: 'text', text: '{"ok":' }, { type: 'text', text: 'true}' }],
      stop_reason: 'max_tokens',
      usage: { input_tokens: 4, output_tokens: 6 },
    });
    const adapter = new AnthropicAdapter({ apiKey: 'test-secret', model: 'claude-test' }, fetchMock);

    const response = await adapter.complete({
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'hi' },
      ],
      responseFormat: 'json',
    });

    expect(response).toEqual({
      content: '{"ok":true}',
      usage: { promptTokens: 4, completionTokens: 6, totalTokens: 10 },
      finishReason: 'length',
    });
    expect(sentBody(fetchMock)).toEqual({
      model: 'claude-test',
      max_tokens: 1024,
      system: 'Be brief.\n\nRespond with a single JSON value and nothing else.',
      messages: [{ role: 'user', content: 'hi' }],
      temperature: 0.7,
    });
    const headers = fetchMock.mock.calls[0][1]?.headers;
    expect(headers).toMatchObject({ 'x-api-key': 'test-secret', 'anthropic-version': '2023-06-01' });
  });
});
