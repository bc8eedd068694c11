import type { EmbeddingClient } from '../rag/embeddings';
import type { RetrievedChunk } from '../rag/schema';
import type { VectorIndex } from '../rag/vectorIndex';

export const retrieveTopChunks = async (
  index: VectorIndex,
  embeddingClient: EmbeddingClient,
  query: string,
  topK = 4,
): Promise<RetrievedChunk[]> => {
  if (!query.trim()) {
    return [];
  }

  const vector = await embeddingClient.embed(query);
  return index.query(vector, topK);
};
