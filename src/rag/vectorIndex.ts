import { DimensionMismatchError, StorageError, describeError } from '../errors';
import { INDEX_FORMAT, INDEX_VERSION, readIndexSnapshot, writeIndexSnapshot } from '../store/indexStore';
import type { IndexSnapshot } from '../store/indexStore';
import type { IndexEntry, RetrievedChunk, SimilarityMetric } from './schema';

type VectorIndexOptions = {
  metric?: SimilarityMetric;
  /** Embedding model that produced the vectors. */
  model: string;
  dimension?: number;
};

const dot = (a: number[], b: number[]): number => {
  let sum = 0;
  for (let index = 0; index < a.length; index += 1) {
    sum += a[index] * b[index];
  }
  return sum;
};

export const cosineSimilarity = (a: number[], b: number[]): number => {
  const denominator = Math.sqrt(dot(a, a)) * Math.sqrt(dot(b, b));
  return denominator > 0 ? dot(a, b) / denominator : 0;
};

export const euclideanDistance = (a: number[], b: number[]): number => {
  let sum = 0;
  for (let index = 0; index < a.length; index += 1) {
    const delta = a[index] - b[index];
    sum += delta * delta;
  }
  return Math.sqrt(sum);
};

const scoreFor = (metric: SimilarityMetric, query: number[], vector: number[]): number =>
  metric === 'cosine' ? cosineSimilarity(query, vector) : 1 / (1 + euclideanDistance(query, vector));

/**
 * Brute-force nearest-neighbour index over chunk embeddings.
 *
 * Re-adding an id overwrites the stored entry in place, so an index never
 * holds duplicates and the original insertion position is kept for tie-breaks.
 */
export class VectorIndex {
  readonly metric: SimilarityMetric;

  readonly model: string;

  private dimensionValue: number | undefined;

  private readonly entriesById = new Map<string, IndexEntry>();

  constructor({ metric = 'cosine', model, dimension }: VectorIndexOptions) {
    this.metric = metric;
    this.model = model;
    this.dimensionValue = dimension;
  }

  get size(): number {
    return this.entriesById.size;
  }

  get dimension(): number | undefined {
    return this.dimensionValue;
  }

  has(id: string): boolean {
    return this.entriesById.has(id);
  }

  entries(): IndexEntry[] {
    return Array.from(this.entriesById.values());
  }

  private checkVector(vector: number[], context: string): void {
    if (!vector.length || vector.some((value) => !Number.isFinite(value))) {
      throw new DimensionMismatchError(this.dimensionValue ?? 0, vector.length, `finite ${context}`);
    }

    if (this.dimensionValue !== undefined && vector.length !== this.dimensionValue) {
      throw new DimensionMismatchError(this.dimensionValue, vector.length, context);
    }
  }

  /** Returns how many of the entries were new ids. */
  add(entries: IndexEntry[]): number {
    const expected = this.dimensionValue ?? entries[0]?.embedding.length;

    // Validate the whole batch first so a bad entry leaves the index unchanged.
    entries.forEach((entry) => {
      if (expected !== undefined && entry.embedding.length !== expected) {
        throw new DimensionMismatchError(expected, entry.embedding.length, `embedding for chunk ${entry.id}`);
      }
      this.checkVector(entry.embedding, `embedding for chunk ${entry.id}`);
    });

    if (this.dimensionValue === undefined && expected !== undefined) {
      this.dimensionValue = expected;
    }

    let added = 0;

    entries.forEach((entry) => {
      if (!this.entriesById.has(entry.id)) {
        added += 1;
      }

      this.entriesById.set(entry.id, {
        id: entry.id,
        content: entry.content,
        metadata: { ...entry.metadata },
        embedding: [...entry.embedding],
      });
    });

    return added;
  }

  query(vector: number[], k: number): RetrievedChunk[] {
    if (k <= 0 || this.entriesById.size === 0) {
      return [];
    }

    this.checkVector(vector, 'query vector');

    const scored = this.entries().map<RetrievedChunk>((entry) => ({
      id: entry.id,
      content: entry.content,
      metadata: { ...entry.metadata },
      score: scoreFor(this.metric, vector, entry.embedding),
    }));

    // Array.prototype.sort is stable, so equal scores keep insertion order.
    scored.sort((a, b) => b.score - a.score);

    return scored.slice(0, Math.floor(k));
  }

  toSnapshot(): IndexSnapshot {
    return {
      format: INDEX_FORMAT,
      version: INDEX_VERSION,
      createdAt: new Date().toISOString(),
      metric: this.metric,
      model: this.model,
      dimension: this.dimensionValue ?? 0,
      entries: this.entries(),
    };
  }

  static fromSnapshot(snapshot: IndexSnapshot): VectorIndex {
    const index = new VectorIndex({
      metric: snapshot.metric,
      model: snapshot.model,
      dimension: snapshot.dimension > 0 ? snapshot.dimension : undefined,
    });

    index.add(snapshot.entries);

    return index;
  }

  async persist(filePath: string): Promise<void> {
    await writeIndexSnapshot(filePath, this.toSnapshot());
  }

  static async load(filePath: string): Promise<VectorIndex> {
    const snapshot = await readIndexSnapshot(filePath);

    try {
      return VectorIndex.fromSnapshot(snapshot);
    } catch (error) {
      throw new StorageError(`Vector index at ${filePath} is corrupt: ${describeError(error)}`, {
        cause: error,
        path: filePath,
      });
    }
  }
}
