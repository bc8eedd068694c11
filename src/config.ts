import { z } from 'zod';

import { ConfigError } from './errors';

type Env = Record<string, string | undefined>;

export const EMBEDDING_PROVIDERS = ['openai', 'ollama'] as const;
export const LLM_PROVIDERS = ['openrouter', 'openai', 'mistral'] as const;

export type EmbeddingProvider = (typeof EMBEDDING_PROVIDERS)[number];
export type LlmProvider = (typeof LLM_PROVIDERS)[number];

const EMBEDDING_DEFAULTS: Record<EmbeddingProvider, { model: string; baseUrl?: string }> = {
  openai: { model: 'text-embedding-3-small' },
  ollama: { model: 'nomic-embed-text', baseUrl: 'http://localhost:11434' },
};

const LLM_DEFAULTS: Record<LlmProvider, { model: string; baseUrl?: string; apiKeyVar: string }> = {
  openrouter: {
    model: 'mistralai/mistral-small-3.2-24b-instruct:free',
    baseUrl: 'https://openrouter.ai/api/v1',
    apiKeyVar: 'OPENROUTER_API_KEY',
  },
  openai: { model: 'gpt-4o-mini', apiKeyVar: 'OPENAI_API_KEY' },
  mistral: {
    model: 'mistral-large-latest',
    baseUrl: 'https://api.mistral.ai/v1',
    apiKeyVar: 'MISTRAL_API_KEY',
  },
};

/** Provider-specific variable that holds the LLM API key when `LLM_API_KEY` is unset. */
export const llmApiKeyVariable = (provider: LlmProvider): string => LLM_DEFAULTS[provider].apiKeyVar;

const flag = z
  .union([z.boolean(), z.string()])
  .transform((value) => (typeof value === 'boolean' ? value : ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase())));

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();
const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const configSchema = z
  .object({
    dataDir: z.string().min(1).default('data'),
    indexPath: z.string().min(1).default('vectordb/index.json'),
    chunkSize: positiveInt.default(1000),
    chunkOverlap: nonNegativeInt.default(200),
    topK: positiveInt.default(4),
    recursive: flag.default(false),
    strict: flag.default(false),
    historyTurns: nonNegativeInt.default(3),
    requestTimeoutMs: positiveInt.default(60_000),
    retry: z.object({
      maxAttempts: positiveInt.default(5),
      initialDelayMs: nonNegativeInt.default(500),
    }),
    embedding: z.object({
      provider: z.enum(EMBEDDING_PROVIDERS).default('openai'),
      apiKey: optionalText,
      model: optionalText,
      baseUrl: optionalText,
      dimensions: positiveInt.optional(),
      batchSize: positiveInt.default(64),
    }),
    llm: z.object({
      provider: z.enum(LLM_PROVIDERS).default('openrouter'),
      apiKey: optionalText,
      model: optionalText,
      baseUrl: optionalText,
      temperature: z.coerce.number().min(0).max(2).default(0.2),
      maxInputChars: positiveInt.default(24_000),
    }),
  })
  .refine((config) => config.chunkOverlap < config.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  });

type ParsedConfig = z.infer<typeof configSchema>;

export type EmbeddingConfig = Omit<ParsedConfig['embedding'], 'model'> & { model: string };

export type LlmConfig = Omit<ParsedConfig['llm'], 'model'> & { model: string };

export type AppConfig = Omit<ParsedConfig, 'embedding' | 'llm'> & {
  embedding: EmbeddingConfig;
  llm: LlmConfig;
};

/** Values coming from CLI flags; anything left undefined falls back to the environment. */
export type ConfigOverrides = {
  dataDir?: string;
  indexPath?: string;
  chunkSize?: number;
  chunkOverlap?: number;
  topK?: number;
  recursive?: boolean;
  strict?: boolean;
};

const definedOnly = (values: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));

const pick = (env: Env, ...keys: string[]): string | undefined => {
  for (const key of keys) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      return value;
    }
  }
  return undefined;
};

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`).join('; ');

export const loadConfig = (env: Env = process.env, overrides: ConfigOverrides = {}): AppConfig => {
  const llmProviderValue = pick(env, 'LLM_PROVIDER')?.toLowerCase();
  const llmProvider = LLM_PROVIDERS.find((provider) => provider === llmProviderValue) ?? 'openrouter';

  const raw = {
    ...definedOnly({
      dataDir: pick(env, 'DATA_DIR'),
      indexPath: pick(env, 'INDEX_PATH'),
      chunkSize: pick(env, 'CHUNK_SIZE'),
      chunkOverlap: pick(env, 'CHUNK_OVERLAP'),
      topK: pick(env, 'TOP_K'),
      recursive: pick(env, 'INGEST_RECURSIVE'),
      strict: pick(env, 'INGEST_STRICT'),
      historyTurns: pick(env, 'HISTORY_TURNS'),
      requestTimeoutMs: pick(env, 'REQUEST_TIMEOUT_MS'),
    }),
    ...definedOnly(overrides),
    retry: definedOnly({
      maxAttempts: pick(env, 'RETRY_MAX_ATTEMPTS'),
      initialDelayMs: pick(env, 'RETRY_INITIAL_DELAY_MS'),
    }),
    embedding: definedOnly({
      provider: pick(env, 'EMBEDDING_PROVIDER')?.toLowerCase(),
      apiKey: pick(env, 'EMBEDDING_API_KEY', 'OPENAI_API_KEY'),
      model: pick(env, 'EMBEDDING_MODEL'),
      baseUrl: pick(env, 'EMBEDDING_BASE_URL'),
      dimensions: pick(env, 'EMBEDDING_DIMENSIONS'),
      batchSize: pick(env, 'EMBEDDING_BATCH_SIZE'),
    }),
    llm: definedOnly({
      provider: pick(env, 'LLM_PROVIDER')?.toLowerCase(),
      apiKey: pick(env, 'LLM_API_KEY', LLM_DEFAULTS[llmProvider].apiKeyVar),
      model: pick(env, 'LLM_MODEL'),
      baseUrl: pick(env, 'LLM_BASE_URL'),
      temperature: pick(env, 'LLM_TEMPERATURE'),
      maxInputChars: pick(env, 'LLM_MAX_INPUT_CHARS'),
    }),
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }

  const parsed = result.data;
  const embeddingDefaults = EMBEDDING_DEFAULTS[parsed.embedding.provider];
  const llmDefaults = LLM_DEFAULTS[parsed.llm.provider];

  return {
    ...parsed,
    embedding: {
      ...parsed.embedding,
      model: parsed.embedding.model ?? embeddingDefaults.model,
      baseUrl: parsed.embedding.baseUrl ?? embeddingDefaults.baseUrl,
    },
    llm: {
      ...parsed.llm,
      model: parsed.llm.model ?? llmDefaults.model,
      baseUrl: parsed.llm.baseUrl ?? llmDefaults.baseUrl,
    },
  };
};
