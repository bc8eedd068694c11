import readline from 'node:readline';
import { parseArgs } from 'node:util';

import { llmApiKeyVariable, loadConfig } from '../config';
import { ConfigError, StorageError, describeError } from '../errors';
import { ChatSession } from '../pipeline/chatSession';
import type { RetrievedChunk } from '../rag/schema';
import { VectorIndex } from '../rag/vectorIndex';
import { defaultEmbeddingClient, defaultLlmClient, parseIntegerFlag } from './shared';
import type { CommandDeps } from './shared';

export const CHAT_USAGE = `Usage: pdf-qa-chat [options]

Answers questions about the ingested PDFs.

Options:
  --index-path <file>     Index file to load (INDEX_PATH, default: vectordb/index.json)
  --top-k <n>             Chunks retrieved per question (TOP_K, default: 4)
  -h, --help              Show this message
`;

export const CHAT_BANNER = `Ask a question about your documents.
Commands: "help" shows this message, "clear" forgets the conversation, "exit", "quit" or "bye" ends the session.
`;

export const QUESTION_PROMPT = '> ';

const EXIT_COMMANDS = new Set(['exit', 'quit', 'bye']);

export const formatSources = (sources: RetrievedChunk[]): string => {
  const labels = sources.map((chunk) => `${chunk.metadata.source} p.${chunk.metadata.page}`);
  return Array.from(new Set(labels)).join(', ');
};

type ChatLoopOptions = {
  session: Pick<ChatSession, 'ask' | 'reset'>;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
};

/**
 * Reads one question per line until an exit command or the end of input.
 * A failed turn is reported and the loop keeps going.
 */
export const runChatLoop = async ({ session, input, output }: ChatLoopOptions): Promise<void> => {
  const write = (text: string): void => {
    output.write(text);
  };
  const rl = readline.createInterface({ input, terminal: false });
  // Readline only emits its own SIGINT in terminal mode.
  const onInterrupt = (): void => rl.close();

  process.once('SIGINT', onInterrupt);

  write(CHAT_BANNER);
  write(QUESTION_PROMPT);

  try {
    for await (const line of rl) {
      const question = line.trim();
      const command = question.toLowerCase();

      if (EXIT_COMMANDS.has(command)) {
        break;
      }

      if (command === 'help') {
        write(CHAT_BANNER);
      } else if (command === 'clear') {
        session.reset();
        write('Conversation history cleared.\n');
      } else if (question) {
        try {
          const { answer, sources } = await session.ask(question);
          write(`\n${answer}\n`);
          if (sources.length) {
            write(`\nSources: ${formatSources(sources)}\n`);
          }
        } catch (error) {
          write(`Error: ${describeError(error)}\n`);
        }
        write('\n');
      }

      write(QUESTION_PROMPT);
    }
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    rl.close();
  }

  write('\nGoodbye!\n');
};

const parseChatArgs = (argv: string[]) => {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: false,
      options: {
        'index-path': { type: 'string' },
        'top-k': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    }).values;
  } catch (error) {
    throw new ConfigError(describeError(error), { cause: error });
  }
};

/** Loads the index and runs the interactive loop; returns the process exit code. */
export const runChatCommand = async (argv: string[], deps: CommandDeps = {}): Promise<number> => {
  const output = deps.output ?? process.stdout;

  try {
    const args = parseChatArgs(argv);

    if (args.help) {
      output.write(CHAT_USAGE);
      return 0;
    }

    const config = loadConfig(deps.env ?? process.env, {
      indexPath: args['index-path'],
      topK: parseIntegerFlag(args['top-k'], 'top-k'),
    });

    const index = await VectorIndex.load(config.indexPath);
    const embeddingClient = (deps.embeddingClientFactory ?? defaultEmbeddingClient)(config);

    if (index.model !== embeddingClient.model) {
      throw new StorageError(
        `Index ${config.indexPath} was built with embedding model ${index.model}, but ${embeddingClient.model} is configured.`,
        { path: config.indexPath, reason: 'mismatch' },
      );
    }

    const session = new ChatSession({
      index,
      embeddingClient,
      llmClient: (deps.llmClientFactory ?? defaultLlmClient)(config),
      topK: config.topK,
      historyTurns: config.historyTurns,
    });

    if (!config.llm.apiKey) {
      console.warn(
        `[CHAT] No API key configured for LLM provider ${config.llm.provider}. ` +
          `Set LLM_API_KEY or ${llmApiKeyVariable(config.llm.provider)}; questions will fail until then.`,
      );
    }

    console.info(`[CHAT] Loaded ${index.size} chunk(s) from ${config.indexPath} (${index.metric}, top-k ${config.topK}).`);

    await runChatLoop({ session, input: deps.input ?? process.stdin, output });

    return 0;
  } catch (error) {
    console.error(`Error: ${describeError(error)}`);

    if (error instanceof ConfigError) {
      console.error(CHAT_USAGE);
    }

    return 1;
  }
};
