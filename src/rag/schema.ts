export type SimilarityMetric = 'cosine' | 'l2';

export interface ChunkMetadata {
  /** Path of the PDF relative to the data directory. */
  source: string;
  page: number;
  chunkIndex: number;
  /** Offsets of the chunk inside the page text. */
  start: number;
  end: number;
}

export interface DocChunk {
  id: string;
  content: string;
  metadata: ChunkMetadata;
}

export interface IndexEntry extends DocChunk {
  embedding: number[];
}

export interface RetrievedChunk extends DocChunk {
  score: number;
}

export interface PageText {
  source: string;
  page: number;
  pageCount: number;
  text: string;
}

export interface ConversationTurn {
  question: string;
  answer: string;
}
