/**
 * ragtalk - conversational retrieval-augmented generation over local documents
 *
 * @example
 * ```typescript
 * import { LocalVectorStore, OpenAICompletionClient, OpenAIEmbedding, RAGPipeline } from 'ragtalk';
 *
 * const store = new LocalVectorStore(new OpenAIEmbedding());
 * const pipeline = new RAGPipeline(
 *   { chunkSize: 500, overlap: 50, topK: 2, historyWindow: 5 },
 *   { store, completion: new OpenAICompletionClient() }
 * );
 *
 * await pipeline.ingest({ sourcePath: 'notes.txt', rawText: 'The API uses JSON.' });
 * const reply = await pipeline.ask('What format does the API use?');
 * ```
 *
 * @packageDocumentation
 */

// Pipeline
export { RAGPipeline, createPipeline } from './pipeline.js';
export type { PipelineDeps } from './pipeline.js';

// Text processing
export { AbbreviationExpander, expandAbbreviations, parseAbbreviationMap } from './abbreviations.js';
export {
  DEFAULT_BOUNDARY_TOLERANCE,
  TextSplitter,
  chunkText,
  reconstructText,
  validateChunkOptions,
} from './chunker.js';
export type { Span } from './chunker.js';

// Conversation and prompts
export { ConversationHistory } from './conversation.js';
export {
  CONTEXTUALIZE_PROMPT,
  DEFAULT_SYSTEM_PROMPT,
  NO_CONTEXT_MARKER,
  buildContextualizePrompt,
  buildPrompt,
  formatContext,
  formatSources,
} from './prompt.js';

// Embedding providers
export {
  CustomEmbedding,
  DEFAULT_MODEL,
  MockEmbedding,
  OpenAIEmbedding,
  createEmbeddingProvider,
} from './embeddings.js';

// Completion
export { DEFAULT_COMPLETION_MODEL, OpenAICompletionClient } from './completion.js';
export type { OpenAICompletionOptions } from './completion.js';

// Vector store
export { INDEX_VERSION, VectorStore, cosineSimilarity, parseSerializedIndex } from './vector-store.js';
export { LocalVectorStore } from './local-store.js';

// Documents
export {
  DocumentReaderRegistry,
  DocxReader,
  PdfReader,
  TextReader,
  fileToDocId,
  findDocuments,
} from './documents.js';
export type { DocumentReader } from './documents.js';
export { ingestDirectory } from './ingest.js';
export type { IngestDirectoryOptions, IngestSummary } from './ingest.js';
export { answerAndSave, csvField, resultsFilePath, saveResults } from './results.js';
export type { SavedTurn } from './results.js';

// Configuration and logging
export {
  BUNDLED_ABBREVIATIONS_PATH,
  CONFIG_FILE_NAME,
  loadAbbreviations,
  loadConfig,
  toPipelineConfig,
} from './config.js';
export type { RagConfig } from './config.js';
export { ConsoleLogger, LOG_LEVELS, NullLogger } from './logger.js';
export type { LogLevel, Logger } from './logger.js';

// Errors
export {
  ConfigurationError,
  DocumentError,
  GenerationError,
  IngestionError,
  PipelineBusyError,
  RagError,
  RetrievalError,
  TurnError,
} from './errors.js';
export type { TurnPhase } from './errors.js';

// Types
export type {
  AbbreviationMap,
  Answer,
  ChatMessage,
  Chunk,
  ChunkOptions,
  ChunkRecord,
  ChunkUnit,
  CompletionClient,
  ConversationTurn,
  Document,
  DocumentInput,
  EmbeddingProvider,
  IndexedChunk,
  PipelineConfig,
  PipelineState,
  Prompt,
  RetrievalResult,
  SearchOptions,
  SearchResult,
  SerializedIndex,
  TurnRole,
  VectorStoreClient,
} from './types.js';
