/**
 * Flat vector index and similarity search for ragtalk
 */

import type {
  ChunkRecord,
  IndexedChunk,
  SearchOptions,
  SearchResult,
  SerializedIndex,
} from './types.js';

export const INDEX_VERSION = 1;

/**
 * Compute cosine similarity between two vectors
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  if (magnitude === 0) return 0;

  return dotProduct / magnitude;
}

/**
 * Vector store with flat index (brute force search)
 * Suitable for small to medium datasets (< 10k vectors)
 *
 * Chunks are keyed by id: adding an id that is already present replaces it.
 */
export class VectorStore {
  private chunks = new Map<string, IndexedChunk>();
  private readonly model: string;
  private readonly dimensions: number;

  constructor(model: string = 'unknown', dimensions: number = 384) {
    this.model = model;
    this.dimensions = dimensions;
  }

  /** Number of chunks in the store */
  get size(): number {
    return this.chunks.size;
  }

  /** Model used for embeddings */
  get embeddingModel(): string {
    return this.model;
  }

  /** Embedding dimensions */
  get embeddingDimensions(): number {
    return this.dimensions;
  }

  /**
   * Add (or replace) a single indexed chunk
   */
  add(chunk: IndexedChunk): void {
    this.validateDimensions(chunk.embedding);
    this.chunks.set(chunk.id, chunk);
  }

  /**
   * Add multiple indexed chunks
   */
  addAll(chunks: IndexedChunk[]): void {
    for (const chunk of chunks) {
      this.validateDimensions(chunk.embedding);
    }
    for (const chunk of chunks) {
      this.chunks.set(chunk.id, chunk);
    }
  }

  /**
   * Remove every chunk whose metadata matches the predicate
   */
  removeWhere(predicate: (metadata: Record<string, unknown>) => boolean): number {
    let removed = 0;
    for (const [id, chunk] of this.chunks) {
      if (predicate(chunk.metadata)) {
        this.chunks.delete(id);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Search for similar chunks
   */
  search(
    queryEmbedding: number[],
    options: SearchOptions = {}
  ): SearchResult[] {
    const { topK = 5, threshold = -1, filter } = options;

    this.validateDimensions(queryEmbedding);

    const results: SearchResult[] = [];

    for (const chunk of this.chunks.values()) {
      if (filter && !filter(chunk.metadata)) {
        continue;
      }

      const score = cosineSimilarity(queryEmbedding, chunk.embedding);

      if (score >= threshold) {
        const record: ChunkRecord = {
          id: chunk.id,
          text: chunk.text,
          metadata: chunk.metadata,
        };
        results.push({ chunk: record, score });
      }
    }

    // Ties keep insertion order (Array.prototype.sort is stable)
    results.sort((a, b) => b.score - a.score);
    return results.slice(0, topK);
  }

  /**
   * Serialize the index for storage
   */
  serialize(): SerializedIndex {
    return {
      version: INDEX_VERSION,
      model: this.model,
      dimensions: this.dimensions,
      chunks: [...this.chunks.values()],
    };
  }

  /**
   * Export to JSON string
   */
  toJSON(): string {
    return JSON.stringify(this.serialize());
  }

  /**
   * Load from serialized index
   */
  static fromSerialized(data: SerializedIndex): VectorStore {
    if (data.version !== INDEX_VERSION) {
      throw new Error(`Unsupported index version: ${data.version}`);
    }

    const store = new VectorStore(data.model, data.dimensions);
    store.addAll(data.chunks);
    return store;
  }

  private validateDimensions(embedding: number[]): void {
    if (embedding.length !== this.dimensions) {
      throw new Error(
        `Embedding dimension mismatch: expected ${this.dimensions}, got ${embedding.length}`
      );
    }
  }

  /**
   * Iterate over all chunks
   */
  [Symbol.iterator](): Iterator<IndexedChunk> {
    return this.chunks.values();
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseIndexedChunk(value: unknown, position: number): IndexedChunk {
  if (
    !isRecord(value) ||
    typeof value.id !== 'string' ||
    typeof value.text !== 'string' ||
    !Array.isArray(value.embedding) ||
    !value.embedding.every((v: unknown) => typeof v === 'number')
  ) {
    throw new Error(`Invalid chunk at position ${position} in index`);
  }

  const embedding: number[] = value.embedding.filter((v: unknown): v is number => typeof v === 'number');
  return {
    id: value.id,
    text: value.text,
    metadata: isRecord(value.metadata) ? value.metadata : {},
    embedding,
  };
}

/**
 * Validate parsed JSON as a serialized index
 */
export function parseSerializedIndex(value: unknown): SerializedIndex {
  if (
    !isRecord(value) ||
    typeof value.version !== 'number' ||
    typeof value.model !== 'string' ||
    typeof value.dimensions !== 'number' ||
    !Array.isArray(value.chunks)
  ) {
    throw new Error('Invalid index format');
  }

  return {
    version: value.version,
    model: value.model,
    dimensions: value.dimensions,
    chunks: value.chunks.map((chunk: unknown, i: number) => parseIndexedChunk(chunk, i)),
  };
}
