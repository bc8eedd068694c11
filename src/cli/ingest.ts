import { parseArgs } from 'node:util';

import { loadConfig } from '../config';
import { ConfigError, describeError } from '../errors';
import type { PdfTextExtractor } from '../loader/types';
import { IngestionPipeline } from '../pipeline/ingest';
import { defaultEmbeddingClient, parseIntegerFlag } from './shared';
import type { CommandDeps } from './shared';

export const INGEST_USAGE = `Usage: pdf-qa-ingest [options]

Extracts text from every PDF in the data directory (or from a single PDF), embeds it and writes
the vector index.

Options:
  --data-dir <path>       Directory with PDF files, or one PDF file (DATA_DIR, default: data)
  --index-path <file>     Index file to write (INDEX_PATH, default: vectordb/index.json)
  --chunk-size <n>        Maximum characters per chunk (CHUNK_SIZE, default: 1000)
  --chunk-overlap <n>     Characters shared by consecutive chunks (CHUNK_OVERLAP, default: 200)
  --recursive             Include PDFs in sub-directories
  --strict                Stop at the first PDF that cannot be parsed
  --append                Add to the existing index instead of rebuilding it
  -h, --help              Show this message
`;

const parseIngestArgs = (argv: string[]) => {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: false,
      options: {
        'data-dir': { type: 'string' },
        'index-path': { type: 'string' },
        'chunk-size': { type: 'string' },
        'chunk-overlap': { type: 'string' },
        recursive: { type: 'boolean' },
        strict: { type: 'boolean' },
        append: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    }).values;
  } catch (error) {
    throw new ConfigError(describeError(error), { cause: error });
  }
};

const defaultExtractor = async (): Promise<PdfTextExtractor> => {
  const { PdfjsTextExtractor } = await import('../loader/pdfjsExtractor');
  return new PdfjsTextExtractor();
};

/** Runs one ingestion and returns the process exit code. */
export const runIngestCommand = async (argv: string[], deps: CommandDeps = {}): Promise<number> => {
  try {
    const args = parseIngestArgs(argv);

    if (args.help) {
      console.info(INGEST_USAGE);
      return 0;
    }

    const config = loadConfig(deps.env ?? process.env, {
      dataDir: args['data-dir'],
      indexPath: args['index-path'],
      chunkSize: parseIntegerFlag(args['chunk-size'], 'chunk-size'),
      chunkOverlap: parseIntegerFlag(args['chunk-overlap'], 'chunk-overlap'),
      recursive: args.recursive,
      strict: args.strict,
    });

    const embeddingClient = (deps.embeddingClientFactory ?? defaultEmbeddingClient)(config);

    console.info(
      `[INGEST] DATA_DIR=${config.dataDir} INDEX_PATH=${config.indexPath} EMBEDDING=${config.embedding.provider}:${embeddingClient.model}`,
    );

    const pipeline = new IngestionPipeline({
      dataDir: config.dataDir,
      indexPath: config.indexPath,
      chunking: { chunkSize: config.chunkSize, chunkOverlap: config.chunkOverlap },
      extractor: deps.extractor ?? (await defaultExtractor()),
      embeddingClient,
      recursive: config.recursive,
      strict: config.strict,
      append: args.append ?? false,
    });

    const report = await pipeline.run();

    console.info(
      `[INGEST] Done: ${report.documents} document(s), ${report.pages} page(s), ${report.chunks} chunk(s), ` +
        `index holds ${report.indexSize} entries of dimension ${report.dimension ?? 'n/a'}.`,
    );

    if (report.skipped.length) {
      console.warn(`[INGEST] Skipped ${report.skipped.length} file(s): ${report.skipped.join(', ')}`);
    }

    return 0;
  } catch (error) {
    console.error(`Error: ${describeError(error)}`);

    if (error instanceof ConfigError) {
      console.error(INGEST_USAGE);
    }

    return 1;
  }
};
