/**
 * Local vector store client for ragtalk
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type {
  ChunkRecord,
  EmbeddingProvider,
  IndexedChunk,
  RetrievalResult,
  SerializedIndex,
  VectorStoreClient,
} from './types.js';
import { VectorStore, parseSerializedIndex } from './vector-store.js';

function documentIdOf(chunk: ChunkRecord): string {
  const { documentId } = chunk.metadata;
  return typeof documentId === 'string' ? documentId : chunk.id;
}

/**
 * VectorStoreClient over the flat in-memory index.
 *
 * Texts are embedded on add and on query; the index can be saved to and
 * loaded from a JSON file.
 *
 * @example
 * ```typescript
 * const store = await LocalVectorStore.load('.ragtalk/index.json', new OpenAIEmbedding());
 * await store.add([{ id: 'doc-0', text: 'JSON is a format.', metadata: { documentId: 'doc' } }]);
 * const results = await store.query('what format?', 2);
 * await store.save('.ragtalk/index.json');
 * ```
 */
export class LocalVectorStore implements VectorStoreClient {
  private readonly embedding: EmbeddingProvider;
  private readonly index: VectorStore;

  constructor(embedding: EmbeddingProvider, index?: VectorStore) {
    this.embedding = embedding;
    this.index = index ?? new VectorStore(embedding.model, embedding.dimensions);
  }

  /** Number of chunks indexed */
  get size(): number {
    return this.index.size;
  }

  /** The embedding model the index was built with */
  get model(): string {
    return this.index.embeddingModel;
  }

  async add(chunks: ChunkRecord[]): Promise<void> {
    if (chunks.length === 0) return;

    const embeddings = await this.embedding.embed(chunks.map(c => c.text));
    if (embeddings.length !== chunks.length) {
      throw new Error(`Expected ${chunks.length} embeddings, got ${embeddings.length}`);
    }

    const dimensions = this.index.embeddingDimensions;
    const mismatched = embeddings.find(e => e.length !== dimensions);
    if (mismatched) {
      throw new Error(
        `Embedding dimension mismatch: expected ${dimensions}, got ${mismatched.length}`
      );
    }

    const indexed: IndexedChunk[] = chunks.map((chunk, i) => ({
      id: chunk.id,
      text: chunk.text,
      metadata: chunk.metadata,
      embedding: embeddings[i],
    }));

    // A re-ingested document replaces all of its earlier chunks
    for (const documentId of new Set(chunks.map(c => c.metadata.documentId))) {
      if (typeof documentId === 'string') this.removeDocument(documentId);
    }

    this.index.addAll(indexed);
  }

  async query(text: string, topK: number): Promise<RetrievalResult[]> {
    if (this.index.size === 0) return [];

    const [queryEmbedding] = await this.embedding.embed([text]);

    return this.index.search(queryEmbedding, { topK }).map(({ chunk, score }) => ({
      chunkText: chunk.text,
      score,
      sourceDocumentId: documentIdOf(chunk),
      chunkId: chunk.id,
      metadata: chunk.metadata,
    }));
  }

  /**
   * Remove every chunk of a document
   */
  removeDocument(documentId: string): number {
    return this.index.removeWhere(metadata => metadata.documentId === documentId);
  }

  /**
   * Source paths of every ingested document
   */
  sources(): Set<string> {
    const sources = new Set<string>();
    for (const chunk of this.index) {
      const { sourcePath } = chunk.metadata;
      if (typeof sourcePath === 'string') sources.add(sourcePath);
    }
    return sources;
  }

  /**
   * Ids of every ingested document
   */
  documents(): Set<string> {
    const ids = new Set<string>();
    for (const chunk of this.index) {
      ids.add(documentIdOf(chunk));
    }
    return ids;
  }

  serialize(): SerializedIndex {
    return this.index.serialize();
  }

  /**
   * Write the index as JSON, creating parent directories
   */
  async save(path: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, this.index.toJSON(), 'utf-8');
  }

  /**
   * Load a saved index, or start an empty one when `path` does not exist
   */
  static async load(path: string, embedding: EmbeddingProvider): Promise<LocalVectorStore> {
    let json: string;
    try {
      json = await readFile(path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return new LocalVectorStore(embedding);
      }
      throw error;
    }

    const data = parseSerializedIndex(JSON.parse(json));
    if (data.model !== embedding.model) {
      throw new Error(
        `Index at ${path} was built with model "${data.model}", not "${embedding.model}"`
      );
    }

    return new LocalVectorStore(embedding, VectorStore.fromSerialized(data));
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
