import { describe, it, expect, vi } from 'vitest';
import { AnthropicProvider } from '../src/server/providers/anthropic.js';
import { ProviderError } from '../src/server/providers/errors.js';
import { createProviderClient, type FetchLike } from '../src/server/providers/index.js';
import { OpenAICompatibleProvider } from '../src/server/providers/openai-compatible.js';

interface RecordedCall {
  url: string;
  headers: Headers;
  body: unknown;
}

function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  return input instanceof URL ? input.href : input.url;
}

function jsonResponse(status: number, body: unknown): Response {
  return new Response(typeof body === 'string' ? body : JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function recordingFetch(status: number, body: unknown) {
  const calls: RecordedCall[] = [];
  const fetch: FetchLike = async (input, init) => {
    calls.push({
      url: urlOf(input),
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    });
    return jsonResponse(status, body);
  };
  return { fetch, calls };
}

const anthropicMessage = {
  id: 'msg_test',
  type: 'message',
  role: 'assistant',
  model: 'claude-test',
  content: [{ type: 'text', text: '{"text":"hi","gdbCommands":[],"waitForOutput":false}' }],
  stop_reason: 'end_turn',
  stop_sequence: null,
  usage: { input_tokens: 12, output_tokens: 7 },
};

const completion = {
  id: 'chatcmpl-test',
  choices: [{ index: 0, message: { role: 'assistant', content: '{"text":"ok"}' }, finish_reason: 'stop' }],
  usage: { prompt_tokens: 20, completion_tokens: 4 },
};

describe('AnthropicProvider', () => {
  it('sends the messages request with key and version headers', async () => {
    const { fetch, calls } = recordingFetch(200, anthropicMessage);
    const provider = new AnthropicProvider({ apiKey: 'test-secret', baseUrl: 'https://api.anthropic.test', fetch });

    const reply = await provider.send({
      model: 'claude-test',
      messages: [
        { role: 'user', content: 'hello' },
        { role: 'assistant', content: 'hi' },
        { role: 'system', content: 'summary' },
        { role: 'user', content: 'break main' },
      ],
      systemPrompt: 'be json',
    });

    expect(reply).toEqual({
      text: '{"text":"hi","gdbCommands":[],"waitForOutput":false}',
      usage: { inputTokens: 12, outputTokens: 7 },
    });
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('https://api.anthropic.test/v1/messages');
    expect(calls[0].headers.get('x-api-key')).toBe('test-secret');
    expect(calls[0].headers.get('anthropic-version')).toBe('2023-06-01');
    expect(calls[0].body).toEqual({
      model: 'claude-test',
      max_tokens: 4096,
      system: 'be json',
      messages: [
        { role: 'user', content: 'hello' },
        { role: 'assistant', content: 'hi' },
        { role: 'user', content: '[Note] summary' },
        { role: 'user', content: 'break main' },
      ],
    });
  });

  it('maps an authentication failure to a non-retryable auth error', async () => {
    const { fetch, calls } = recordingFetch(401, {
      type: 'error',
      error: { type: 'authentication_error', message: 'invalid x-api-key' },
    });
    const provider = new AnthropicProvider({ apiKey: 'test-secret', baseUrl: 'https://api.anthropic.test', fetch });

    const error = await provider.send({ model: 'claude-test', messages: [{ role: 'user', content: 'hi' }] }).catch(e => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ kind: 'auth', status: 401, retryable: false, provider: 'anthropic' });
    expect(calls).toHaveLength(1);
  });

  it('maps an overloaded response to a retryable error', async () => {
    const { fetch } = recordingFetch(503, { type: 'error', error: { type: 'overloaded_error', message: 'Overloaded' } });
    const provider = new AnthropicProvider({ apiKey: 'test-secret', baseUrl: 'https://api.anthropic.test', fetch });

    await expect(
      provider.send({ model: 'claude-test', messages: [{ role: 'user', content: 'hi' }] })
    ).rejects.toMatchObject({ kind: 'network', status: 503, retryable: true });
  });
});

describe('OpenAICompatibleProvider', () => {
  it('posts chat completions with a bearer token and JSON mode, without max_tokens', async () => {
    const { fetch, calls } = recordingFetch(200, completion);
    const provider = new OpenAICompatibleProvider({
      id: 'openai',
      apiKey: 'test-secret',
      baseUrl: 'https://api.openai.test/',
      supportsJsonMode: true,
      fetch,
    });

    const reply = await provider.send({
      model: 'gpt-test',
      messages: [{ role: 'user', content: 'inspect main' }],
      systemPrompt: 'be json',
      maxTokens: 256,
      jsonMode: true,
    });

    expect(reply).toEqual({ text: '{"text":"ok"}', usage: { inputTokens: 20, outputTokens: 4 } });
    expect(calls[0].url).toBe('https://api.openai.test/v1/chat/completions');
    expect(calls[0].headers.get('authorization')).toBe('Bearer test-secret');
    expect(calls[0].headers.get('content-type')).toBe('application/json');
    expect(calls[0].body).toEqual({
      model: 'gpt-test',
      messages: [
        { role: 'system', content: 'be json' },
        { role: 'user', content: 'inspect main' },
      ],
      response_format: { type: 'json_object' },
    });
  });

  it('adds the OpenRouter attribution headers and skips JSON mode', async () => {
    const { fetch, calls } = recordingFetch(200, completion);
    const provider = createProviderClient({ provider: 'openrouter', apiKey: 'test-secret' }, { fetch });

    await provider.send({ model: 'router/model', messages: [{ role: 'user', content: 'hi' }], jsonMode: true });

    expect(provider.id).toBe('openrouter');
    expect(calls[0].url).toBe('https://openrouter.ai/api/v1/chat/completions');
    expect(calls[0].headers.get('authorization')).toBe('Bearer test-secret');
    expect(calls[0].headers.get('http-referer')).toBeTruthy();
    expect(calls[0].headers.get('x-title')).toBe('gdb-assist');
    expect(calls[0].body).toEqual({ model: 'router/model', messages: [{ role: 'user', content: 'hi' }] });
  });

  it.each([
    [429, 'rate_limit', true],
    [401, 'auth', false],
    [400, 'validation', false],
    [500, 'network', true],
  ])('maps status %i to %s', async (status, kind, retryable) => {
    const { fetch } = recordingFetch(status, '{"error":{"message":"nope"}}');
    const provider = createProviderClient({ provider: 'openai', apiKey: 'test-secret' }, { fetch });

    const error = await provider.send({ model: 'gpt-test', messages: [] }).catch(e => e);
    expect(error).toMatchObject({ kind, retryable, status });
    expect(error.message).toBe(`API error (status ${status}): {"error":{"message":"nope"}}`);
  });

  it('rejects a reply without content', async () => {
    const { fetch } = recordingFetch(200, { choices: [] });
    const provider = createProviderClient({ provider: 'openai', apiKey: 'test-secret' }, { fetch });

    await expect(provider.send({ model: 'gpt-test', messages: [] })).rejects.toMatchObject({ kind: 'model' });
  });

  it('rejects a non-JSON body', async () => {
    const { fetch } = recordingFetch(200, '<html>gateway</html>');
    const provider = createProviderClient({ provider: 'openai', apiKey: 'test-secret' }, { fetch });

    await expect(provider.send({ model: 'gpt-test', messages: [] })).rejects.toMatchObject({ kind: 'model' });
  });

  it('reports a network failure as retryable', async () => {
    const fetch: FetchLike = async () => { throw new TypeError('fetch failed'); };
    const provider = createProviderClient({ provider: 'openai', apiKey: 'test-secret' }, { fetch });

    await expect(provider.send({ model: 'gpt-test', messages: [] })).rejects.toMatchObject({
      kind: 'network',
      retryable: true,
    });
  });

  it('reports a body that breaks off as a retryable network error', async () => {
    const fetch: FetchLike = async () => new Response(new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('{"choices":'));
        controller.error(new TypeError('terminated'));
      },
    }));
    const provider = createProviderClient({ provider: 'openai', apiKey: 'test-secret' }, { fetch });

    await expect(provider.send({ model: 'gpt-test', messages: [] })).rejects.toMatchObject({
      kind: 'network',
      retryable: true,
      message: 'openai network error: terminated',
    });
  });

  it('times out while the body is still arriving', async () => {
    const fetch: FetchLike = async (_input, init) => new Response(new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('{"choices":'));
        init?.signal?.addEventListener('abort', () => controller.error(new DOMException('aborted', 'AbortError')));
      },
    }));
    const provider = createProviderClient({ provider: 'openai', apiKey: 'test-secret' }, { fetch, timeoutMs: 20 });

    await expect(provider.send({ model: 'gpt-test', messages: [] })).rejects.toMatchObject({
      kind: 'timeout',
      retryable: true,
    });
  });

  it('times out a hung request', async () => {
    const fetch: FetchLike = (_input, init) => new Promise((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')));
    });
    const provider = createProviderClient({ provider: 'openai', apiKey: 'test-secret' }, { fetch, timeoutMs: 20 });

    await expect(provider.send({ model: 'gpt-test', messages: [] })).rejects.toMatchObject({
      kind: 'timeout',
      retryable: true,
    });
  });

  it('reports a caller abort as a cancellation', async () => {
    const fetch = vi.fn<FetchLike>((_input, init) => new Promise((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')));
    }));
    const provider = createProviderClient({ provider: 'openai', apiKey: 'test-secret' }, { fetch });
    const controller = new AbortController();

    const pending = provider.send({ model: 'gpt-test', messages: [], signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toMatchObject({ kind: 'cancelled', retryable: false });
    expect(fetch).toHaveBeenCalledTimes(1);
  });
});

describe('createProviderClient', () => {
  it('refuses to build a client without an API key', () => {
    expect(() => createProviderClient({ provider: 'anthropic', apiKey: '' })).toThrow('API key is not configured');
  });
});
