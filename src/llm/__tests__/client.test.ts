import { describe, it, expect, vi } from 'vitest';
import { LlmClient, createOracle } from '../client.js';
import { ConfigSchema } from '../../shared/config.js';
import { LlmError, LlmUnavailableError } from '../../shared/errors.js';

function llmConfig(overrides: Record<string, unknown> = {}) {
  return ConfigSchema.parse({ llm: { api_key: 'test-secret', ...overrides } }).llm;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function timeoutError(): Error {
  const err = new Error('The operation was aborted due to timeout');
  err.name = 'TimeoutError';
  return err;
}

describe('LlmClient (openai)', () => {
  it('sends system instructions and user text', async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      jsonResponse({ choices: [{ message: { content: 'YES' } }] }),
    );
    const client = new LlmClient(llmConfig({ base_url: 'http://llm.test/v1/' }), {
      fetch: fetchMock,
      sleep: async () => {},
    });

    await expect(client.classify('PhD in ecology', 'Is this a job?')).resolves.toBe('YES');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://llm.test/v1/chat/completions');
    const body = JSON.parse(String(init.body));
    expect(body.messages).toEqual([
      { role: 'system', content: 'Is this a job?' },
      { role: 'user', content: 'PhD in ecology' },
    ]);
    expect(body.max_tokens).toBe(256);
    expect(init.headers.Authorization).toBe('Bearer test-secret');
  });

  it('returns an empty string for null content', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ choices: [{ message: { content: null } }] }));
    const client = new LlmClient(llmConfig(), { fetch: fetchMock, sleep: async () => {} });
    await expect(client.classify('x', 'y')).resolves.toBe('');
  });

  it('backs off on 429 with doubling delays', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(jsonResponse({}, 429))
      .mockResolvedValueOnce(jsonResponse({}, 429))
      .mockResolvedValueOnce(jsonResponse({ choices: [{ message: { content: 'NO' } }] }));
    const client = new LlmClient(llmConfig(), { fetch: fetchMock, sleep });

    await expect(client.classify('x', 'y')).resolves.toBe('NO');
    expect(sleep.mock.calls.map((c) => c[0])).toEqual([10000, 20000]);
  });

  it('gives up with LlmError after max attempts of rate limiting', async () => {
    const fetchMock = vi.fn().mockImplementation(async () => jsonResponse({}, 429));
    const client = new LlmClient(llmConfig({ retry: { max_attempts: 3 } }), {
      fetch: fetchMock,
      sleep: async () => {},
    });

    const err = await client.classify('x', 'y').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(LlmError);
    expect(err).not.toBeInstanceOf(LlmUnavailableError);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('escalates repeated timeouts to LlmUnavailableError', async () => {
    const fetchMock = vi.fn().mockRejectedValue(timeoutError());
    const client = new LlmClient(llmConfig(), { fetch: fetchMock, sleep: async () => {} });

    await expect(client.classify('x', 'y')).rejects.toBeInstanceOf(LlmUnavailableError);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('counts connect timeouts from fetch towards the timeout budget', async () => {
    const connectTimeout = new TypeError('fetch failed', {
      cause: Object.assign(new Error('Connect Timeout Error'), { code: 'UND_ERR_CONNECT_TIMEOUT' }),
    });
    const fetchMock = vi.fn().mockRejectedValue(connectTimeout);
    const client = new LlmClient(llmConfig(), { fetch: fetchMock, sleep: async () => {} });

    await expect(client.classify('x', 'y')).rejects.toBeInstanceOf(LlmUnavailableError);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('retries other network failures as ordinary errors', async () => {
    const refused = new TypeError('fetch failed', {
      cause: Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }),
    });
    const fetchMock = vi.fn().mockRejectedValue(refused);
    const client = new LlmClient(llmConfig(), { fetch: fetchMock, sleep: async () => {} });

    const err = await client.classify('x', 'y').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(LlmError);
    expect(err).not.toBeInstanceOf(LlmUnavailableError);
    expect(fetchMock).toHaveBeenCalledTimes(5);
  });

  it('does not retry client errors', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ error: 'bad key' }, 401));
    const client = new LlmClient(llmConfig(), { fetch: fetchMock, sleep: async () => {} });

    await expect(client.classify('x', 'y')).rejects.toThrow('LLM API error: 401');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe('LlmClient (gemini)', () => {
  it('folds instructions into a single prompt and joins parts', async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      jsonResponse({ candidates: [{ content: { parts: [{ text: 'YE' }, { text: 'S' }] } }] }),
    );
    const client = new LlmClient(llmConfig({ provider: 'gemini', model: 'gemini-2.0-flash' }), {
      fetch: fetchMock,
      sleep: async () => {},
    });

    await expect(client.classify('the text', 'the prompt')).resolves.toBe('YES');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(
      'https://generativelanguage.googleapis.com/v1beta/models/gemini-2.0-flash:generateContent',
    );
    const body = JSON.parse(String(init.body));
    expect(body.contents[0].parts[0].text).toBe('the prompt\n\nText: the text');
  });
});

describe('createOracle', () => {
  it('returns null without an api key', () => {
    expect(createOracle(ConfigSchema.parse({}).llm)).toBeNull();
  });

  it('returns a client when configured', () => {
    expect(createOracle(llmConfig())?.name).toBe('openai:meta/llama-3.3-70b-instruct');
  });
});
