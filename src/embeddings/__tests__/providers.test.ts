/**
 * Embedding provider tests
 *
 * Each backend runs against an in-process fetch or client stand-in.
 */

import { describe, it, expect } from 'vitest';
import OpenAI from 'openai';

import {
  CancelledError,
  EmptyInputError,
  InvalidResponseError,
  ProviderUnavailableError,
  RateLimitError,
} from '../../errors/index.js';
import { CloudflareEmbeddingProvider } from '../cloudflare.js';
import { OllamaEmbeddingProvider } from '../ollama.js';
import {
  OpenAIEmbeddingProvider,
  toEmbeddingError,
  type OpenAIEmbeddingsClient,
} from '../openai.js';
import type { FetchFn } from '../types.js';

interface RecordedRequest {
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

function recordingFetch(reply: unknown, status = 200) {
  const requests: RecordedRequest[] = [];
  const fetchFn: FetchFn = async (input, init) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    requests.push({
      url: String(input),
      headers,
      body: init?.body ? JSON.parse(String(init.body)) : undefined,
    });
    return new Response(JSON.stringify(reply), { status });
  };
  return { fetchFn, requests };
}

describe('OllamaEmbeddingProvider', () => {
  it('posts model and prompt to /api/embeddings', async () => {
    const { fetchFn, requests } = recordingFetch({ embedding: [0.1, 0.2, 0.3] });
    const provider = new OllamaEmbeddingProvider({
      model: 'bge-large',
      host: 'http://gpu-box:11434/',
      fetchFn,
    });

    const vector = await provider.embed('The cat sat.');

    expect(vector).toEqual([0.1, 0.2, 0.3]);
    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe('http://gpu-box:11434/api/embeddings');
    expect(requests[0]?.body).toEqual({ model: 'bge-large', prompt: 'The cat sat.' });
  });

  it('defaults to bge-large on localhost', () => {
    const provider = new OllamaEmbeddingProvider();

    expect(provider.model).toBe('bge-large');
    expect(provider.host).toBe('http://localhost:11434');
  });

  it('rejects blank text without a request', async () => {
    const { fetchFn, requests } = recordingFetch({ embedding: [1] });
    const provider = new OllamaEmbeddingProvider({ fetchFn });

    await expect(provider.embed('   ')).rejects.toBeInstanceOf(EmptyInputError);
    expect(requests).toHaveLength(0);
  });

  it('rejects replies without an embedding', async () => {
    const { fetchFn } = recordingFetch({ error: 'model not loaded' });
    const provider = new OllamaEmbeddingProvider({ fetchFn });

    await expect(provider.embed('text')).rejects.toBeInstanceOf(InvalidResponseError);
  });

  it('maps a missing model (404) to ProviderUnavailableError', async () => {
    const { fetchFn } = recordingFetch({ error: 'model "nope" not found' }, 404);
    const provider = new OllamaEmbeddingProvider({ model: 'nope', fetchFn });

    await expect(provider.embed('text')).rejects.toBeInstanceOf(ProviderUnavailableError);
  });

  it('reports availability from /api/tags', async () => {
    const up = new OllamaEmbeddingProvider({ fetchFn: recordingFetch({ models: [] }).fetchFn });
    const down = new OllamaEmbeddingProvider({
      fetchFn: async () => {
        throw new TypeError('fetch failed');
      },
    });

    expect(await up.isAvailable()).toBe(true);
    expect(await down.isAvailable()).toBe(false);
  });
});

describe('CloudflareEmbeddingProvider', () => {
  it('calls the account model endpoint with a bearer token', async () => {
    const { fetchFn, requests } = recordingFetch({ result: { data: [[0.5, 0.5]] }, success: true });
    const provider = new CloudflareEmbeddingProvider({
      apiToken: 'test-secret',
      accountId: 'acct-1',
      fetchFn,
    });

    const vector = await provider.embed('on the mat.');

    expect(vector).toEqual([0.5, 0.5]);
    expect(requests[0]?.url).toBe(
      'https://api.cloudflare.com/client/v4/accounts/acct-1/ai/run/@cf/baai/bge-base-en-v1.5'
    );
    expect(requests[0]?.headers.authorization).toBe('Bearer test-secret');
    expect(requests[0]?.body).toEqual({ text: 'on the mat.' });
  });

  it('rejects replies without vectors', async () => {
    const { fetchFn } = recordingFetch({ result: { data: [] } });
    const provider = new CloudflareEmbeddingProvider({
      apiToken: 'test-secret',
      accountId: 'acct-1',
      fetchFn,
    });

    await expect(provider.embed('text')).rejects.toBeInstanceOf(InvalidResponseError);
  });

  it('probes availability through token verification', async () => {
    const { fetchFn, requests } = recordingFetch({ success: true });
    const provider = new CloudflareEmbeddingProvider({
      apiToken: 'test-secret',
      accountId: 'acct-1',
      fetchFn,
    });

    expect(await provider.isAvailable()).toBe(true);
    expect(requests[0]?.url).toBe('https://api.cloudflare.com/client/v4/user/tokens/verify');
  });

  it('maps throttling to RateLimitError', async () => {
    const { fetchFn } = recordingFetch({ errors: [{ message: 'Too many requests' }] }, 429);
    const provider = new CloudflareEmbeddingProvider({
      apiToken: 'test-secret',
      accountId: 'acct-1',
      fetchFn,
    });

    await expect(provider.embed('text')).rejects.toBeInstanceOf(RateLimitError);
  });
});

describe('OpenAIEmbeddingProvider', () => {
  function fakeClient(
    create: OpenAIEmbeddingsClient['embeddings']['create']
  ): OpenAIEmbeddingsClient {
    return {
      embeddings: { create },
      models: { list: async () => ({ data: [] }) },
    };
  }

  it('sends model and input through the client', async () => {
    const bodies: Array<{ model: string; input: string }> = [];
    const provider = new OpenAIEmbeddingProvider({
      client: fakeClient(async (body) => {
        bodies.push(body);
        return { data: [{ embedding: [0, 1] }] };
      }),
    });

    const vector = await provider.embed('Stocks fell 3% today.');

    expect(vector).toEqual([0, 1]);
    expect(bodies).toEqual([{ model: 'text-embedding-3-small', input: 'Stocks fell 3% today.' }]);
  });

  it('rejects an empty data array', async () => {
    const provider = new OpenAIEmbeddingProvider({
      client: fakeClient(async () => ({ data: [] })),
    });

    await expect(provider.embed('text')).rejects.toBeInstanceOf(InvalidResponseError);
  });

  it('translates SDK errors', async () => {
    const provider = new OpenAIEmbeddingProvider({
      client: fakeClient(async () => {
        throw new OpenAI.APIError(429, undefined, 'slow down', undefined);
      }),
    });

    await expect(provider.embed('text')).rejects.toBeInstanceOf(RateLimitError);
  });

  it('never calls the client for blank text', async () => {
    let calls = 0;
    const provider = new OpenAIEmbeddingProvider({
      client: fakeClient(async () => {
        calls++;
        return { data: [{ embedding: [1] }] };
      }),
    });

    await expect(provider.embed('')).rejects.toBeInstanceOf(EmptyInputError);
    expect(calls).toBe(0);
  });
});

describe('toEmbeddingError', () => {
  it('maps connection failures to ProviderUnavailableError', () => {
    const error = toEmbeddingError(new OpenAI.APIConnectionError({ message: 'socket hang up' }));

    expect(error).toBeInstanceOf(ProviderUnavailableError);
  });

  it('maps user aborts to CancelledError', () => {
    expect(toEmbeddingError(new OpenAI.APIUserAbortError())).toBeInstanceOf(CancelledError);
  });

  it('maps 401 to ProviderUnavailableError and 400 to InvalidResponseError', () => {
    expect(toEmbeddingError(new OpenAI.APIError(401, undefined, 'bad key', undefined))).toBeInstanceOf(
      ProviderUnavailableError
    );
    expect(toEmbeddingError(new OpenAI.APIError(400, undefined, 'bad input', undefined))).toBeInstanceOf(
      InvalidResponseError
    );
  });

  it('passes embedding errors through unchanged', () => {
    const original = new RateLimitError('openai');

    expect(toEmbeddingError(original)).toBe(original);
  });
});
