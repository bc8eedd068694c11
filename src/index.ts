export { loadConfig } from './config';
export type { AppConfig, ConfigOverrides, EmbeddingConfig, LlmConfig } from './config';
export {
  ConfigError,
  DimensionMismatchError,
  EmbeddingServiceError,
  GenerationError,
  LoadError,
  PdfQaError,
  StorageError,
} from './errors';
export { listPdfFiles, loadPdfPages } from './loader/pdfLoader';
export { PdfjsTextExtractor } from './loader/pdfjsExtractor';
export type { ExtractedPdf, PdfTextExtractor } from './loader/types';
export { chunkPage, joinSpans, splitText } from './rag/chunker';
export type { ChunkingOptions, TextSpan } from './rag/chunker';
export { OllamaEmbeddingClient, OpenAiEmbeddingClient, createEmbeddingClient } from './rag/embeddings';
export type { EmbeddingClient } from './rag/embeddings';
export { VectorIndex } from './rag/vectorIndex';
export type {
  ChunkMetadata,
  ConversationTurn,
  DocChunk,
  IndexEntry,
  PageText,
  RetrievedChunk,
  SimilarityMetric,
} from './rag/schema';
export { ChatCompletionLlmClient, createLlmClient } from './llm/client';
export type { GenerationRequest, LlmClient } from './llm/client';
export { buildPrompt } from './llm/prompts';
export { IngestionPipeline } from './pipeline/ingest';
export type { IngestionReport, IngestionState } from './pipeline/ingest';
export { ChatSession } from './pipeline/chatSession';
export { runChatCommand, runChatLoop } from './cli/chat';
export { runIngestCommand } from './cli/ingest';
