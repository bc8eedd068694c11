import type { AppConfig } from '../config';
import { ConfigError } from '../errors';
import { createLlmClient } from '../llm/client';
import type { LlmClient } from '../llm/client';
import type { PdfTextExtractor } from '../loader/types';
import { createEmbeddingClient } from '../rag/embeddings';
import type { EmbeddingClient } from '../rag/embeddings';

type Env = Record<string, string | undefined>;

/** Collaborators a command builds from its configuration; tests swap in fakes. */
export type CommandDeps = {
  env?: Env;
  extractor?: PdfTextExtractor;
  embeddingClientFactory?: (config: AppConfig) => EmbeddingClient;
  llmClientFactory?: (config: AppConfig) => LlmClient;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
};

export const defaultEmbeddingClient = (config: AppConfig): EmbeddingClient =>
  createEmbeddingClient(config.embedding, { requestTimeoutMs: config.requestTimeoutMs, retry: config.retry });

export const defaultLlmClient = (config: AppConfig): LlmClient =>
  createLlmClient(config.llm, { requestTimeoutMs: config.requestTimeoutMs, retry: config.retry });

export const parseIntegerFlag = (value: string | undefined, flag: string): number | undefined => {
  if (value === undefined) {
    return undefined;
  }

  const parsed = Number(value);

  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`--${flag} expects an integer, received "${value}".`);
  }

  return parsed;
};
