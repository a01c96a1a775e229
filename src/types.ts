/**
 * Core types for ragtalk
 */

/** A loaded document, ready for ingestion */
export interface Document {
  /** Unique identifier for this document */
  id: string;
  /** Where the text came from (file path, URL, ...) */
  sourcePath: string;
  /** The extracted text */
  rawText: string;
}

/** Document as accepted by the ingestion boundary (id defaults to sourcePath) */
export type DocumentInput = Omit<Document, 'id'> & { id?: string };

/** Unit chunk sizes and offsets are measured in */
export type ChunkUnit = 'characters';

/** A bounded, contiguous slice of a document's text */
export interface Chunk {
  /** `${documentId}-${sequenceIndex}` */
  id: string;
  documentId: string;
  /** The exact slice `rawText.slice(startOffset, endOffset)` */
  text: string;
  startOffset: number;
  endOffset: number;
  /** Position of the chunk within its document, from 0 */
  sequenceIndex: number;
  unit: ChunkUnit;
}

/** Chunk record handed to a vector store for indexing */
export interface ChunkRecord {
  id: string;
  text: string;
  metadata: Record<string, unknown>;
}

/** A chunk record with its computed embedding vector */
export interface IndexedChunk extends ChunkRecord {
  embedding: number[];
}

/** A chunk returned by similarity search */
export interface RetrievalResult {
  chunkText: string;
  /** Relevance score (higher is more relevant) */
  score: number;
  sourceDocumentId: string;
  chunkId?: string;
  metadata?: Record<string, unknown>;
}

export type TurnRole = 'user' | 'assistant';

/** One message of a conversation */
export interface ConversationTurn {
  role: TurnRole;
  content: string;
}

/** A message sent to the completion service */
export interface ChatMessage {
  role: 'system' | TurnRole;
  content: string;
}

/** Prompt assembled for a single question */
export interface Prompt {
  messages: ChatMessage[];
}

/** Everything produced while answering one question */
export interface Answer {
  question: string;
  response: string;
  sources: RetrievalResult[];
  prompt: Prompt;
}

/** Abbreviation → expansion */
export type AbbreviationMap = Readonly<Record<string, string>>;

/** Options for splitting text */
export interface ChunkOptions {
  /** Maximum characters per chunk */
  chunkSize: number;
  /** Characters shared by consecutive chunks (must be less than chunkSize) */
  overlap: number;
  /** How far back from the hard cutoff to look for a boundary (default: 50) */
  boundaryTolerance?: number;
}

/** Pipeline settings, validated at construction */
export interface PipelineConfig extends ChunkOptions {
  /** Number of chunks retrieved per question */
  topK: number;
  /** Number of most recent turns included in each prompt */
  historyWindow: number;
  abbreviations?: AbbreviationMap;
  /** Replaces the default system preamble */
  systemPrompt?: string;
  /** Rewrite follow-up questions into standalone ones before retrieval */
  contextualizeQuestions?: boolean;
}

/** Lifecycle of the current turn */
export type PipelineState = 'idle' | 'retrieving' | 'generating' | 'failed';

/** Vector store capability consumed by the pipeline */
export interface VectorStoreClient {
  add(chunks: ChunkRecord[]): Promise<void>;
  /** Top `topK` results, most relevant first */
  query(text: string, topK: number): Promise<RetrievalResult[]>;
}

/** Completion capability consumed by the pipeline */
export interface CompletionClient {
  complete(messages: ChatMessage[]): Promise<string>;
}

/** Embedding provider interface */
export interface EmbeddingProvider {
  /** Model name */
  readonly model: string;
  /** Embedding dimensions */
  readonly dimensions: number;
  /** Generate embeddings for texts */
  embed(texts: string[]): Promise<number[][]>;
}

/** Options for vector search */
export interface SearchOptions {
  /** Maximum number of results (default: 5) */
  topK?: number;
  /** Minimum similarity threshold (default: -1, i.e. everything) */
  threshold?: number;
  /** Filter by metadata */
  filter?: (metadata: Record<string, unknown>) => boolean;
}

/** Search hit from the flat index */
export interface SearchResult {
  chunk: ChunkRecord;
  /** Cosine similarity (-1 to 1, higher is more similar) */
  score: number;
}

/** Serialized index format */
export interface SerializedIndex {
  /** Version for compatibility checking */
  version: number;
  /** Embedding model used */
  model: string;
  /** Embedding dimensions */
  dimensions: number;
  /** All indexed chunks */
  chunks: IndexedChunk[];
}
