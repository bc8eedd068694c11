import OpenAI from 'openai';
import type { ChatCompletion, ChatCompletionMessageParam } from 'openai/resources/chat/completions';

import type { LlmConfig } from '../config';
import { GenerationError } from '../errors';
import type { ConversationTurn, RetrievedChunk } from '../rag/schema';
import { describeFailure, getStatus, shouldRetryRequest } from '../util/http';
import { exponentialBackoff } from '../util/retry';
import type { RetryPolicy } from '../util/retry';
import { buildPrompt } from './prompts';
import type { ChatMessage } from './prompts';

export type GenerationRequest = {
  question: string;
  context: RetrievedChunk[];
  history?: ConversationTurn[];
};

export interface LlmClient {
  readonly model: string;
  generate(request: GenerationRequest): Promise<string>;
}

type ChatClientOptions = {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  temperature?: number;
  maxInputChars?: number;
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  sleep?: (ms: number) => Promise<void>;
};

const toMessageParam = (message: ChatMessage): ChatCompletionMessageParam => {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    default:
      return { role: 'user', content: message.content };
  }
};

/** Chat completions against any OpenAI-compatible endpoint (OpenRouter, OpenAI, Mistral). */
export class ChatCompletionLlmClient implements LlmClient {
  readonly model: string;

  private client: OpenAI | null = null;

  private readonly options: ChatClientOptions;

  constructor(options: ChatClientOptions) {
    this.model = options.model;
    this.options = options;
  }

  private getClient(): OpenAI {
    if (this.client) {
      return this.client;
    }

    const { apiKey, baseUrl, timeoutMs } = this.options;

    if (!apiKey) {
      throw new GenerationError('LLM API key not configured. Set LLM_API_KEY or the provider API key.');
    }

    this.client = new OpenAI({
      apiKey,
      baseURL: baseUrl,
      timeout: timeoutMs ?? 60_000,
      maxRetries: 0,
    });

    return this.client;
  }

  async generate({ question, context, history = [] }: GenerationRequest): Promise<string> {
    const client = this.getClient();
    const prompt = buildPrompt({
      question,
      context,
      history,
      maxInputChars: this.options.maxInputChars ?? 24_000,
    });

    if (prompt.droppedChunks || prompt.droppedTurns) {
      console.warn(
        `[LLM] Prompt over limit: dropped ${prompt.droppedTurns} history turn(s) and ${prompt.droppedChunks} chunk(s).`,
      );
    }

    const maxAttempts = this.options.retry?.maxAttempts ?? 5;
    let response: ChatCompletion;

    try {
      response = await exponentialBackoff(
        () =>
          client.chat.completions.create({
            model: this.model,
            temperature: this.options.temperature ?? 0.2,
            messages: prompt.messages.map(toMessageParam),
          }),
        {
          maxAttempts,
          initialDelayMs: this.options.retry?.initialDelayMs,
          sleep: this.options.sleep,
          shouldRetry: (error) => shouldRetryRequest(error),
          onRetry: (error, attempt, delay) => {
            console.warn(
              `[LLM] Request attempt ${attempt}/${maxAttempts} failed (${describeFailure(error)}). Retrying in ${delay}ms.`,
            );
          },
        },
      );
    } catch (error) {
      throw new GenerationError(`LLM request failed (${describeFailure(error)})`, {
        cause: error,
        status: getStatus(error),
      });
    }

    const content = response.choices?.[0]?.message?.content;

    if (!content || !content.trim()) {
      throw new GenerationError('LLM response did not contain any content.');
    }

    return content.trim();
  }
}

type ClientSettings = {
  requestTimeoutMs: number;
  retry: RetryPolicy;
};

export const createLlmClient = (config: LlmConfig, settings: ClientSettings): LlmClient =>
  new ChatCompletionLlmClient({
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    model: config.model,
    temperature: config.temperature,
    maxInputChars: config.maxInputChars,
    timeoutMs: settings.requestTimeoutMs,
    retry: settings.retry,
  });
