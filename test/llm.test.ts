import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { GenerationError } from '../src/errors';
import { ChatCompletionLlmClient } from '../src/llm/client';
import {
  DOCUMENT_ASSISTANT_PROMPT,
  buildPrompt,
  buildUserMessage,
  formatContext,
  measureMessages,
} from '../src/llm/prompts';
import type { ConversationTurn, RetrievedChunk } from '../src/rag/schema';
import { createRequestError } from '../src/util/http';

const mocks = vi.hoisted(() => ({
  construct: vi.fn(),
  createCompletion: vi.fn(),
}));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create: mocks.createCompletion } };

    constructor(options: unknown) {
      mocks.construct(options);
    }
  },
}));

const chunk = (id: string, content: string, page = 1): RetrievedChunk => ({
  id,
  content,
  metadata: { source: 'manual.pdf', page, chunkIndex: 0, start: 0, end: content.length },
  score: 1,
});

const context = [
  chunk('c1', 'The pump runs at 40 bar.', 3),
  chunk('c2', 'Maintenance is due every 500 hours of operation.', 7),
  chunk('c3', 'The warranty covers two years from the date of purchase.', 9),
];

const history: ConversationTurn[] = [
  { question: 'What is the pump?', answer: 'A high-pressure water pump.' },
  { question: 'Who makes it?', answer: 'The manual does not say.' },
];

const question = 'What pressure does it run at?';

const sizeOf = (input: { context: RetrievedChunk[]; history?: ConversationTurn[] }): number =>
  measureMessages(buildPrompt({ question, ...input, maxInputChars: Number.MAX_SAFE_INTEGER }).messages);

describe('prompt assembly', () => {
  it('numbers the excerpts with their source and page', () => {
    expect(formatContext(context.slice(0, 2))).toBe(
      '[1] (manual.pdf, page 3)\nThe pump runs at 40 bar.\n\n' +
        '[2] (manual.pdf, page 7)\nMaintenance is due every 500 hours of operation.',
    );
  });

  it('marks an empty context', () => {
    expect(buildUserMessage(' Why? ', [])).toBe(
      '**Document Context:**\n(none)\n\n**Question:** Why?\n\n' +
        'Please provide a comprehensive answer based on the document content above.',
    );
  });

  it('puts the system prompt first and the question last', () => {
    const prompt = buildPrompt({ question, context, history, maxInputChars: Number.MAX_SAFE_INTEGER });

    expect(prompt.messages.map((message) => message.role)).toEqual([
      'system',
      'user',
      'assistant',
      'user',
      'assistant',
      'user',
    ]);
    expect(prompt.messages[0].content).toBe(DOCUMENT_ASSISTANT_PROMPT);
    expect(prompt.messages[1].content).toBe('What is the pump?');
    expect(prompt.messages[5].content).toBe(buildUserMessage(question, context));
    expect(prompt.droppedChunks).toBe(0);
    expect(prompt.droppedTurns).toBe(0);
  });

  it('drops the oldest turn first', () => {
    const prompt = buildPrompt({ question, context, history, maxInputChars: sizeOf({ context, history }) - 1 });

    expect(prompt.droppedTurns).toBe(1);
    expect(prompt.droppedChunks).toBe(0);
    expect(prompt.messages[1].content).toBe('Who makes it?');
  });

  it('drops the lowest-ranked chunks once the history is gone', () => {
    const limit = sizeOf({ context: context.slice(0, 1) });

    const prompt = buildPrompt({ question, context, history, maxInputChars: limit });

    expect(prompt.droppedTurns).toBe(2);
    expect(prompt.droppedChunks).toBe(2);
    expect(prompt.context.map((item) => item.id)).toEqual(['c1']);
    expect(measureMessages(prompt.messages)).toBe(limit);
  });

  it('never cuts the question', () => {
    const prompt = buildPrompt({ question, context, history, maxInputChars: 1 });

    expect(prompt.messages).toHaveLength(2);
    expect(prompt.messages[1].content).toBe(buildUserMessage(question, []));
    expect(prompt.context).toEqual([]);
  });
});

describe('ChatCompletionLlmClient', () => {
  const sleep = vi.fn(async () => undefined);

  const createClient = (overrides: { apiKey?: string; maxInputChars?: number } = {}) =>
    new ChatCompletionLlmClient({
      apiKey: 'apiKey' in overrides ? overrides.apiKey : 'test-secret',
      baseUrl: 'https://llm.example.test/v1',
      model: 'test-model',
      maxInputChars: overrides.maxInputChars,
      retry: { maxAttempts: 3, initialDelayMs: 10 },
      sleep,
    });

  const reply = (content: string | null) => ({ choices: [{ message: { role: 'assistant', content } }] });

  beforeEach(() => {
    mocks.construct.mockReset();
    mocks.createCompletion.mockReset();
    sleep.mockClear();
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends the assembled messages and returns the trimmed answer', async () => {
    mocks.createCompletion.mockResolvedValue(reply('  It runs at 40 bar [1].  '));

    const answer = await createClient().generate({ question, context: context.slice(0, 1) });

    expect(answer).toBe('It runs at 40 bar [1].');
    expect(mocks.construct).toHaveBeenCalledWith({
      apiKey: 'test-secret',
      baseURL: 'https://llm.example.test/v1',
      timeout: 60_000,
      maxRetries: 0,
    });
    expect(mocks.createCompletion).toHaveBeenCalledWith({
      model: 'test-model',
      temperature: 0.2,
      messages: [
        { role: 'system', content: DOCUMENT_ASSISTANT_PROMPT },
        { role: 'user', content: buildUserMessage(question, context.slice(0, 1)) },
      ],
    });
  });

  it('retries a rate-limited request', async () => {
    mocks.createCompletion
      .mockRejectedValueOnce(createRequestError(429, 'rate limited'))
      .mockResolvedValueOnce(reply('Forty bar.'));

    await expect(createClient().generate({ question, context })).resolves.toBe('Forty bar.');
    expect(mocks.createCompletion).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('does not retry a rejected request', async () => {
    mocks.createCompletion.mockRejectedValue(createRequestError(400, 'bad request'));

    const error = await createClient()
      .generate({ question, context })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toMatchObject({ status: 400, message: 'LLM request failed (status 400: bad request)' });
    expect(mocks.createCompletion).toHaveBeenCalledTimes(1);
  });

  it('fails when the response has no content', async () => {
    mocks.createCompletion.mockResolvedValue(reply('   '));

    await expect(createClient().generate({ question, context })).rejects.toThrow(
      'LLM response did not contain any content.',
    );
  });

  it('fails without an API key', async () => {
    await expect(createClient({ apiKey: undefined }).generate({ question, context })).rejects.toThrow(
      'LLM API key not configured. Set LLM_API_KEY or the provider API key.',
    );
    expect(mocks.construct).not.toHaveBeenCalled();
  });

  it('warns when the prompt had to be truncated', async () => {
    mocks.createCompletion.mockResolvedValue(reply('Forty bar.'));

    await createClient({ maxInputChars: 1 }).generate({ question, context: context.slice(0, 1) });

    expect(console.warn).toHaveBeenCalledWith(
      '[LLM] Prompt over limit: dropped 0 history turn(s) and 1 chunk(s).',
    );
  });
});
