import OpenAI from 'openai';
import { z } from 'zod';

import type { EmbeddingConfig } from '../config';
import { EmbeddingServiceError } from '../errors';
import { createRequestError, describeFailure, getStatus, shouldRetryRequest } from '../util/http';
import { exponentialBackoff } from '../util/retry';
import type { RetryPolicy } from '../util/retry';

export interface EmbeddingClient {
  readonly model: string;
  /** Vector length, known once configured or after the first response. */
  readonly dimension: number | undefined;
  embed(text: string): Promise<number[]>;
  embedMany(texts: string[]): Promise<number[][]>;
}

type BatchedClientOptions = {
  model: string;
  batchSize?: number;
  dimensions?: number;
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  sleep?: (ms: number) => Promise<void>;
};

const DEFAULT_BATCH_SIZE = 64;
const DEFAULT_TIMEOUT_MS = 60_000;

const ollamaResponseSchema = z.object({
  embedding: z.array(z.union([z.number(), z.string()])),
});

const normalizeEmbeddingVector = (values: unknown): number[] => {
  if (!Array.isArray(values)) {
    throw new Error('Embedding response did not include an array of numbers.');
  }

  return values.map((value, index) => {
    const numeric = typeof value === 'number' ? value : Number(value);
    if (!Number.isFinite(numeric)) {
      throw new Error(`Embedding value at index ${index} is not a valid number.`);
    }
    return numeric;
  });
};

/**
 * Batches texts, retries each batch with exponential backoff and keeps the
 * vector dimension fixed for the lifetime of the client.
 */
abstract class BatchedEmbeddingClient implements EmbeddingClient {
  readonly model: string;

  protected readonly timeoutMs: number;

  private readonly batchSize: number;

  private readonly retry: RetryPolicy;

  private readonly sleep?: (ms: number) => Promise<void>;

  private dimensionValue: number | undefined;

  protected constructor({ model, batchSize, dimensions, timeoutMs, retry, sleep }: BatchedClientOptions) {
    this.model = model;
    this.batchSize = Math.max(1, batchSize ?? DEFAULT_BATCH_SIZE);
    this.timeoutMs = timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retry = { maxAttempts: retry?.maxAttempts ?? 5, initialDelayMs: retry?.initialDelayMs ?? 500 };
    this.sleep = sleep;
    this.dimensionValue = dimensions;
  }

  get dimension(): number | undefined {
    return this.dimensionValue;
  }

  protected abstract requestBatch(batch: string[]): Promise<number[][]>;

  private chunkTexts(texts: string[]): string[][] {
    const batches: string[][] = [];

    for (let index = 0; index < texts.length; index += this.batchSize) {
      batches.push(texts.slice(index, index + this.batchSize));
    }

    return batches;
  }

  private logRetry(error: unknown, attempt: number, delay: number): void {
    console.warn(
      `[EMBED] Request attempt ${attempt}/${this.retry.maxAttempts} failed (${describeFailure(error)}). Retrying in ${delay}ms.`,
    );
  }

  private checkDimensions(vectors: number[][]): void {
    vectors.forEach((vector) => {
      if (this.dimensionValue === undefined) {
        this.dimensionValue = vector.length;
        return;
      }

      if (vector.length !== this.dimensionValue) {
        throw new EmbeddingServiceError(
          `Embedding model ${this.model} returned a vector of dimension ${vector.length}; expected ${this.dimensionValue}.`,
        );
      }
    });
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedMany([text]);
    return vector;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    if (!texts.length) {
      return [];
    }

    const embeddings: number[][] = [];

    for (const batch of this.chunkTexts(texts)) {
      let batchEmbeddings: number[][];

      try {
        batchEmbeddings = await exponentialBackoff(() => this.requestBatch(batch), {
          maxAttempts: this.retry.maxAttempts,
          initialDelayMs: this.retry.initialDelayMs,
          sleep: this.sleep,
          onRetry: (error, attempt, delay) => this.logRetry(error, attempt, delay),
          shouldRetry: (error) => !(error instanceof EmbeddingServiceError) && shouldRetryRequest(error),
        });
      } catch (error) {
        if (error instanceof EmbeddingServiceError) {
          throw error;
        }
        throw new EmbeddingServiceError(`Embedding request failed (${describeFailure(error)})`, {
          cause: error,
          status: getStatus(error),
        });
      }

      if (batchEmbeddings.length !== batch.length) {
        throw new EmbeddingServiceError(
          `Embedding service returned ${batchEmbeddings.length} vector(s) for ${batch.length} text(s).`,
        );
      }

      this.checkDimensions(batchEmbeddings);
      embeddings.push(...batchEmbeddings);
    }

    return embeddings;
  }
}

type OllamaClientOptions = BatchedClientOptions & {
  baseUrl: string;
  fetchImpl?: typeof fetch;
};

const buildOllamaEndpoint = (baseUrl: string): string => {
  try {
    const url = new URL(baseUrl);
    url.pathname = '/api/embeddings';
    url.search = '';
    return url.toString();
  } catch (error) {
    throw new EmbeddingServiceError(`Invalid embedding service URL "${baseUrl}".`, { cause: error });
  }
};

/** Ollama's embeddings endpoint takes one prompt per request. */
export class OllamaEmbeddingClient extends BatchedEmbeddingClient {
  private readonly endpoint: string;

  private readonly fetchImpl: typeof fetch;

  constructor({ baseUrl, fetchImpl, ...options }: OllamaClientOptions) {
    super(options);
    this.endpoint = buildOllamaEndpoint(baseUrl);
    this.fetchImpl = fetchImpl ?? fetch;
  }

  protected async requestBatch(batch: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];

    for (const text of batch) {
      const response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.model,
          prompt: text,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        const detailText = await response.text();
        throw createRequestError(response.status, detailText || response.statusText);
      }

      let data: unknown;

      try {
        data = await response.json();
      } catch (error) {
        throw new EmbeddingServiceError('Failed to parse embedding response JSON.', { cause: error });
      }

      const parsed = ollamaResponseSchema.safeParse(data);

      if (!parsed.success) {
        throw new EmbeddingServiceError('Embedding response did not include an embedding array.');
      }

      try {
        embeddings.push(normalizeEmbeddingVector(parsed.data.embedding));
      } catch (error) {
        throw new EmbeddingServiceError(`Invalid embedding response: ${describeFailure(error)}`, { cause: error });
      }
    }

    return embeddings;
  }
}

type OpenAiClientOptions = BatchedClientOptions & {
  apiKey?: string;
  baseUrl?: string;
};

export class OpenAiEmbeddingClient extends BatchedEmbeddingClient {
  private client: OpenAI | null = null;

  private readonly apiKey?: string;

  private readonly baseUrl?: string;

  private readonly requestedDimensions?: number;

  constructor({ apiKey, baseUrl, ...options }: OpenAiClientOptions) {
    super(options);
    this.apiKey = apiKey;
    this.baseUrl = baseUrl;
    this.requestedDimensions = options.dimensions;
  }

  private getClient(): OpenAI {
    if (this.client) {
      return this.client;
    }

    if (!this.apiKey) {
      throw new EmbeddingServiceError(
        'Embedding API key not configured. Set EMBEDDING_API_KEY (or OPENAI_API_KEY).',
      );
    }

    this.client = new OpenAI({
      apiKey: this.apiKey,
      baseURL: this.baseUrl,
      timeout: this.timeoutMs,
      maxRetries: 0,
    });

    return this.client;
  }

  protected async requestBatch(batch: string[]): Promise<number[][]> {
    const client = this.getClient();

    const response = await client.embeddings.create({
      model: this.model,
      input: batch,
      ...(this.requestedDimensions ? { dimensions: this.requestedDimensions } : {}),
    });

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => normalizeEmbeddingVector(item.embedding));
  }
}

type ClientSettings = {
  requestTimeoutMs: number;
  retry: RetryPolicy;
};

export const createEmbeddingClient = (config: EmbeddingConfig, settings: ClientSettings): EmbeddingClient => {
  const shared = {
    model: config.model,
    batchSize: config.batchSize,
    dimensions: config.dimensions,
    timeoutMs: settings.requestTimeoutMs,
    retry: settings.retry,
  };

  if (config.provider === 'ollama') {
    return new OllamaEmbeddingClient({ ...shared, baseUrl: config.baseUrl ?? 'http://localhost:11434' });
  }

  return new OpenAiEmbeddingClient({ ...shared, apiKey: config.apiKey, baseUrl: config.baseUrl });
};
