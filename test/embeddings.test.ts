import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { loadConfig } from '../src/config';
import { EmbeddingServiceError } from '../src/errors';
import { OllamaEmbeddingClient, OpenAiEmbeddingClient, createEmbeddingClient } from '../src/rag/embeddings';
import { createRequestError } from '../src/util/http';

const mocks = vi.hoisted(() => ({
  construct: vi.fn(),
  createEmbedding: vi.fn(),
}));

vi.mock('openai', () => ({
  default: class {
    embeddings = { create: mocks.createEmbedding };

    constructor(options: unknown) {
      mocks.construct(options);
    }
  },
}));

type FakeReply = { status: number; body: unknown } | Error;

/** Serves queued replies in order; once the queue is empty every prompt gets its fallback vector. */
const createFakeOllama = (replies: FakeReply[] = [], fallback = (prompt: string) => [prompt.length, 1]) => {
  const prompts: string[] = [];
  const queue = [...replies];

  const fetchImpl: typeof fetch = async (_input, init) => {
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : {};
    const prompt =
      body && typeof body === 'object' && 'prompt' in body && typeof body.prompt === 'string' ? body.prompt : '';
    prompts.push(prompt);

    const reply = queue.shift() ?? { status: 200, body: { embedding: fallback(prompt) } };

    if (reply instanceof Error) {
      throw reply;
    }

    const payload = typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body);
    return new Response(payload, { status: reply.status });
  };

  return { fetchImpl, prompts };
};

const noSleep = vi.fn(async () => undefined);

describe('OllamaEmbeddingClient', () => {
  beforeEach(() => {
    noSleep.mockClear();
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const createClient = (fetchImpl: typeof fetch, overrides: { batchSize?: number; maxAttempts?: number } = {}) =>
    new OllamaEmbeddingClient({
      baseUrl: 'http://localhost:11434',
      model: 'nomic-embed-text',
      batchSize: overrides.batchSize,
      retry: { maxAttempts: overrides.maxAttempts ?? 5, initialDelayMs: 10 },
      sleep: noSleep,
      fetchImpl,
    });

  it('retries rate-limited requests and then succeeds', async () => {
    const fake = createFakeOllama([
      { status: 429, body: 'rate limited' },
      { status: 429, body: 'rate limited' },
    ]);

    const vectors = await createClient(fake.fetchImpl).embedMany(['hello']);

    expect(vectors).toEqual([[5, 1]]);
    expect(fake.prompts).toEqual(['hello', 'hello', 'hello']);
    expect(noSleep).toHaveBeenCalledTimes(2);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it('retries network failures', async () => {
    const fake = createFakeOllama([new TypeError('fetch failed')]);

    await expect(createClient(fake.fetchImpl).embed('abc')).resolves.toEqual([3, 1]);
    expect(fake.prompts).toHaveLength(2);
  });

  it('does not retry client errors', async () => {
    const fake = createFakeOllama([{ status: 401, body: 'unauthorized' }]);

    const error = await createClient(fake.fetchImpl)
      .embedMany(['hello'])
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(EmbeddingServiceError);
    expect(error).toMatchObject({ status: 401, message: 'Embedding request failed (status 401: unauthorized)' });
    expect(fake.prompts).toHaveLength(1);
    expect(noSleep).not.toHaveBeenCalled();
  });

  it('gives up after the configured number of attempts', async () => {
    const fake = createFakeOllama([
      { status: 500, body: 'boom' },
      { status: 500, body: 'boom' },
      { status: 500, body: 'boom' },
    ]);

    await expect(createClient(fake.fetchImpl, { maxAttempts: 3 }).embedMany(['hello'])).rejects.toMatchObject({
      name: 'EmbeddingServiceError',
      status: 500,
    });
    expect(fake.prompts).toHaveLength(3);
  });

  it('returns vectors in input order across batches', async () => {
    const fake = createFakeOllama([], (prompt) => [prompt.length, prompt.charCodeAt(0)]);

    const vectors = await createClient(fake.fetchImpl, { batchSize: 2 }).embedMany(['a', 'bb', 'ccc']);

    expect(vectors).toEqual([
      [1, 97],
      [2, 98],
      [3, 99],
    ]);
    expect(fake.prompts).toEqual(['a', 'bb', 'ccc']);
  });

  it('accepts numeric strings in the embedding array', async () => {
    const fake = createFakeOllama([{ status: 200, body: { embedding: ['0.5', 1] } }]);

    await expect(createClient(fake.fetchImpl).embed('x')).resolves.toEqual([0.5, 1]);
  });

  it('rejects a response without an embedding and does not retry it', async () => {
    const fake = createFakeOllama([{ status: 200, body: { error: 'model not found' } }]);

    await expect(createClient(fake.fetchImpl).embed('x')).rejects.toThrow(
      'Embedding response did not include an embedding array.',
    );
    expect(fake.prompts).toHaveLength(1);
  });

  it('rejects vectors whose dimension changes', async () => {
    const fake = createFakeOllama([
      { status: 200, body: { embedding: [1, 2] } },
      { status: 200, body: { embedding: [1, 2, 3] } },
    ]);
    const client = createClient(fake.fetchImpl);

    await expect(client.embedMany(['first', 'second'])).rejects.toThrow(
      'Embedding model nomic-embed-text returned a vector of dimension 3; expected 2.',
    );
    expect(client.dimension).toBe(2);
  });

  it('returns an empty list without calling the service', async () => {
    const fake = createFakeOllama();

    await expect(createClient(fake.fetchImpl).embedMany([])).resolves.toEqual([]);
    expect(fake.prompts).toEqual([]);
  });

  it('rejects an invalid base URL', () => {
    expect(() => new OllamaEmbeddingClient({ baseUrl: 'not a url', model: 'nomic-embed-text' })).toThrow(
      'Invalid embedding service URL "not a url".',
    );
  });
});

describe('OpenAiEmbeddingClient', () => {
  beforeEach(() => {
    mocks.construct.mockReset();
    mocks.createEmbedding.mockReset();
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('orders vectors by their index in the response', async () => {
    mocks.createEmbedding.mockResolvedValue({
      data: [
        { index: 1, embedding: [0, 1] },
        { index: 0, embedding: [1, 0] },
      ],
    });
    const client = new OpenAiEmbeddingClient({ apiKey: 'test-secret', model: 'text-embedding-3-small' });

    const vectors = await client.embedMany(['first', 'second']);

    expect(vectors).toEqual([
      [1, 0],
      [0, 1],
    ]);
    expect(client.dimension).toBe(2);
    expect(mocks.construct).toHaveBeenCalledWith({
      apiKey: 'test-secret',
      baseURL: undefined,
      timeout: 60_000,
      maxRetries: 0,
    });
    expect(mocks.createEmbedding).toHaveBeenCalledWith({
      model: 'text-embedding-3-small',
      input: ['first', 'second'],
    });
  });

  it('passes requested dimensions through', async () => {
    mocks.createEmbedding.mockResolvedValue({ data: [{ index: 0, embedding: [1, 0, 0] }] });
    const client = new OpenAiEmbeddingClient({ apiKey: 'test-secret', model: 'text-embedding-3-small', dimensions: 3 });

    await client.embed('hello');

    expect(mocks.createEmbedding).toHaveBeenCalledWith({
      model: 'text-embedding-3-small',
      input: ['hello'],
      dimensions: 3,
    });
  });

  it('retries a rate-limited batch', async () => {
    mocks.createEmbedding
      .mockRejectedValueOnce(createRequestError(429, 'slow down'))
      .mockResolvedValueOnce({ data: [{ index: 0, embedding: [1, 0] }] });
    const client = new OpenAiEmbeddingClient({
      apiKey: 'test-secret',
      model: 'text-embedding-3-small',
      sleep: noSleep,
    });

    await expect(client.embed('hello')).resolves.toEqual([1, 0]);
    expect(mocks.createEmbedding).toHaveBeenCalledTimes(2);
  });

  it('fails without an API key before creating a client', async () => {
    const client = new OpenAiEmbeddingClient({ model: 'text-embedding-3-small' });

    await expect(client.embed('hello')).rejects.toThrow(
      'Embedding API key not configured. Set EMBEDDING_API_KEY (or OPENAI_API_KEY).',
    );
    expect(mocks.construct).not.toHaveBeenCalled();
  });
});

describe('createEmbeddingClient', () => {
  it('builds the client for the configured provider', () => {
    const config = loadConfig({ EMBEDDING_PROVIDER: 'ollama' });

    const client = createEmbeddingClient(config.embedding, {
      requestTimeoutMs: config.requestTimeoutMs,
      retry: config.retry,
    });

    expect(client).toBeInstanceOf(OllamaEmbeddingClient);
    expect(client.model).toBe('nomic-embed-text');
  });

  it('defaults to the OpenAI embeddings API', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-secret' });

    const client = createEmbeddingClient(config.embedding, {
      requestTimeoutMs: config.requestTimeoutMs,
      retry: config.retry,
    });

    expect(client).toBeInstanceOf(OpenAiEmbeddingClient);
    expect(client.model).toBe('text-embedding-3-small');
    expect(client.dimension).toBeUndefined();
  });
});
