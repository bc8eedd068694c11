import { LoadError, StorageError } from '../errors';
import { loadPdfPages } from '../loader/pdfLoader';
import type { PdfTextExtractor } from '../loader/types';
import { chunkPage } from '../rag/chunker';
import type { ChunkingOptions } from '../rag/chunker';
import type { EmbeddingClient } from '../rag/embeddings';
import type { DocChunk, IndexEntry, PageText, SimilarityMetric } from '../rag/schema';
import { VectorIndex } from '../rag/vectorIndex';

export type IngestionState = 'idle' | 'loading' | 'chunking' | 'embedding' | 'persisting' | 'done' | 'failed';

export type IngestionOptions = {
  dataDir: string;
  indexPath: string;
  chunking: ChunkingOptions;
  extractor: PdfTextExtractor;
  embeddingClient: EmbeddingClient;
  metric?: SimilarityMetric;
  recursive?: boolean;
  strict?: boolean;
  /** Merge into the existing index instead of replacing it. */
  append?: boolean;
  onStateChange?: (state: IngestionState, previous: IngestionState) => void;
};

export type IngestionReport = {
  documents: number;
  pages: number;
  skipped: string[];
  chunks: number;
  added: number;
  indexSize: number;
  dimension: number | undefined;
  indexPath: string;
};

const TERMINAL_STATES: IngestionState[] = ['done', 'failed'];

/**
 * Loads, chunks, embeds and persists a PDF corpus. Nothing is written until the
 * final persist, which replaces the index file atomically.
 */
export class IngestionPipeline {
  private stateValue: IngestionState = 'idle';

  private failure: unknown;

  constructor(private readonly options: IngestionOptions) {}

  get state(): IngestionState {
    return this.stateValue;
  }

  get error(): unknown {
    return this.failure;
  }

  private transition(next: IngestionState): void {
    const previous = this.stateValue;
    this.stateValue = next;
    this.options.onStateChange?.(next, previous);
  }

  async run(): Promise<IngestionReport> {
    if (this.stateValue !== 'idle') {
      throw new Error(`Ingestion pipeline already ran (state: ${this.stateValue}).`);
    }

    try {
      const report = await this.execute();
      this.transition('done');
      return report;
    } catch (error) {
      if (!TERMINAL_STATES.includes(this.stateValue)) {
        this.failure = error;
        this.transition('failed');
      }
      throw error;
    }
  }

  private async loadPages(): Promise<{ pages: PageText[]; documents: number; skipped: string[] }> {
    const { dataDir, extractor, recursive, strict } = this.options;
    const pages: PageText[] = [];
    const skipped: string[] = [];
    let documents = 0;

    for await (const page of loadPdfPages(dataDir, {
      extractor,
      recursive,
      strict,
      onDocument: (source, pageCount) => {
        documents += 1;
        console.info(`[INGEST] Loaded ${source} (${pageCount} page(s)).`);
      },
      onSkip: (source) => {
        skipped.push(source);
      },
    })) {
      pages.push(page);
    }

    if (!documents) {
      throw new LoadError(
        skipped.length
          ? `None of the ${skipped.length} PDF file(s) in ${dataDir} could be parsed.`
          : `No PDF files found in ${dataDir}.`,
      );
    }

    return { pages, documents, skipped };
  }

  private async openIndex(dimension: number | undefined): Promise<VectorIndex> {
    const { append, indexPath, metric = 'cosine', embeddingClient } = this.options;

    if (!append) {
      return new VectorIndex({ metric, model: embeddingClient.model, dimension });
    }

    let existing: VectorIndex;

    try {
      existing = await VectorIndex.load(indexPath);
    } catch (error) {
      if (error instanceof StorageError && error.reason === 'missing') {
        console.info(`[INGEST] No index at ${indexPath} yet; starting a new one.`);
        return new VectorIndex({ metric, model: embeddingClient.model, dimension });
      }
      throw error;
    }

    if (existing.model !== embeddingClient.model || existing.metric !== metric) {
      throw new StorageError(
        `Cannot append to ${indexPath}: it was built with ${existing.model}/${existing.metric}, not ${embeddingClient.model}/${metric}.`,
        { path: indexPath, reason: 'mismatch' },
      );
    }

    return existing;
  }

  private async execute(): Promise<IngestionReport> {
    const { indexPath, chunking, embeddingClient, dataDir } = this.options;

    this.transition('loading');
    console.info(`[INGEST] Reading PDFs from ${dataDir}...`);
    const { pages, documents, skipped } = await this.loadPages();

    this.transition('chunking');
    const chunks: DocChunk[] = pages
      .filter((page) => page.text.trim().length > 0)
      .flatMap((page) => chunkPage(page, chunking));
    console.info(
      `[INGEST] Split ${pages.length} page(s) from ${documents} document(s) into ${chunks.length} chunk(s) ` +
        `(size=${chunking.chunkSize}, overlap=${chunking.chunkOverlap}).`,
    );

    if (!chunks.length) {
      throw new LoadError(`No text could be extracted from the PDFs in ${dataDir}.`);
    }

    this.transition('embedding');
    console.info(`[INGEST] Embedding ${chunks.length} chunk(s) with ${embeddingClient.model}...`);
    const vectors = await embeddingClient.embedMany(chunks.map((chunk) => chunk.content));
    const entries = chunks.map<IndexEntry>((chunk, index) => ({ ...chunk, embedding: vectors[index] }));

    this.transition('persisting');
    const index = await this.openIndex(embeddingClient.dimension);
    const added = index.add(entries);
    await index.persist(indexPath);
    console.info(`[INGEST] Wrote ${index.size} entries to ${indexPath} (${added} new).`);

    return {
      documents,
      pages: pages.length,
      skipped,
      chunks: chunks.length,
      added,
      indexSize: index.size,
      dimension: index.dimension,
      indexPath,
    };
  }
}
