/**
 * Retrieval-augmented conversation pipeline
 */

import type {
  Answer,
  Chunk,
  CompletionClient,
  ConversationTurn,
  DocumentInput,
  PipelineConfig,
  PipelineState,
  Prompt,
  RetrievalResult,
  VectorStoreClient,
} from './types.js';
import type { Logger } from './logger.js';
import { AbbreviationExpander } from './abbreviations.js';
import { TextSplitter } from './chunker.js';
import { ConversationHistory } from './conversation.js';
import {
  ConfigurationError,
  GenerationError,
  IngestionError,
  PipelineBusyError,
  RetrievalError,
} from './errors.js';
import { NullLogger } from './logger.js';
import { buildContextualizePrompt, buildPrompt } from './prompt.js';

/** Collaborators a pipeline talks to */
export interface PipelineDeps {
  store: VectorStoreClient;
  completion: CompletionClient;
  logger?: Logger;
}

/**
 * Validate the settings the pipeline consumes directly
 */
function validatePipelineConfig(config: PipelineConfig): void {
  if (!Number.isInteger(config.topK) || config.topK < 1) {
    throw new ConfigurationError('topK must be a positive integer');
  }
  if (!Number.isInteger(config.historyWindow) || config.historyWindow < 0) {
    throw new ConfigurationError('historyWindow must be a non-negative integer');
  }
}

/**
 * RAGPipeline - one conversation session over an indexed corpus
 *
 * Ingestion runs expand → split → index. Each question runs retrieve →
 * prompt → complete, and only a successful turn is appended to the
 * history, so a failed turn leaves the conversation exactly as it was.
 *
 * @example
 * ```typescript
 * const pipeline = new RAGPipeline(
 *   { chunkSize: 500, overlap: 50, topK: 2, historyWindow: 5 },
 *   { store, completion }
 * );
 * await pipeline.ingest({ sourcePath: 'notes.txt', rawText });
 * const reply = await pipeline.ask('What format does the API use?');
 * ```
 */
export class RAGPipeline {
  readonly config: Readonly<PipelineConfig>;

  private readonly expander: AbbreviationExpander;
  private readonly splitter: TextSplitter;
  private readonly store: VectorStoreClient;
  private readonly completion: CompletionClient;
  private readonly logger: Logger;
  private conversation = new ConversationHistory();
  private currentState: PipelineState = 'idle';

  constructor(config: PipelineConfig, deps: PipelineDeps) {
    validatePipelineConfig(config);

    this.config = { ...config };
    this.splitter = new TextSplitter(config);
    this.expander = new AbbreviationExpander(config.abbreviations);
    this.store = deps.store;
    this.completion = deps.completion;
    this.logger = deps.logger ?? new NullLogger();
  }

  /** State of the current (or last) turn */
  get state(): PipelineState {
    return this.currentState;
  }

  /** Conversation so far, oldest first */
  get history(): readonly ConversationTurn[] {
    return this.conversation.turns;
  }

  /**
   * Chunk a document and index its chunks
   */
  async ingest(document: DocumentInput): Promise<Chunk[]> {
    const documentId = document.id ?? document.sourcePath;

    if (document.rawText.trim() === '') {
      throw new IngestionError(`Document "${documentId}" has no text to index`, documentId);
    }

    const normalized = this.expander.expand(document.rawText);
    const chunks = this.splitter.split(normalized, documentId);

    if (chunks.length === 0) {
      throw new IngestionError(`Document "${documentId}" produced no chunks`, documentId);
    }

    try {
      await this.store.add(
        chunks.map(chunk => ({
          id: chunk.id,
          text: chunk.text,
          metadata: {
            documentId,
            sourcePath: document.sourcePath,
            sequenceIndex: chunk.sequenceIndex,
            startOffset: chunk.startOffset,
            endOffset: chunk.endOffset,
            unit: chunk.unit,
          },
        }))
      );
    } catch (error) {
      this.logger.error(`Failed to index document "${documentId}"`, { error });
      throw new IngestionError(`Vector store rejected document "${documentId}"`, documentId, {
        cause: error,
      });
    }

    this.logger.info(`Indexed document "${documentId}"`, { chunks: chunks.length });
    return chunks;
  }

  /**
   * Answer a question, returning only the response text
   */
  async ask(question: string): Promise<string> {
    const { response } = await this.answer(question);
    return response;
  }

  /**
   * Answer a question, returning the response with its sources and prompt
   */
  async answer(question: string): Promise<Answer> {
    if (this.currentState === 'retrieving' || this.currentState === 'generating') {
      throw new PipelineBusyError();
    }

    try {
      this.currentState = 'retrieving';
      const query = await this.contextualize(question);
      const sources = await this.retrieve(query);

      this.currentState = 'generating';
      const prompt = this.buildPrompt(question, sources);
      const response = await this.generate(prompt);

      this.conversation.append(
        { role: 'user', content: question },
        { role: 'assistant', content: response }
      );
      this.currentState = 'idle';

      return { question, response, sources, prompt };
    } catch (error) {
      this.currentState = 'failed';
      throw error;
    }
  }

  /**
   * Assemble the prompt for `question` from the current history window
   */
  buildPrompt(question: string, results: readonly RetrievalResult[]): Prompt {
    return buildPrompt({
      question,
      results,
      history: this.conversation.window(this.config.historyWindow),
      systemPrompt: this.config.systemPrompt,
    });
  }

  /**
   * Start a new conversation; the index is kept
   */
  resetConversation(): void {
    if (this.currentState === 'retrieving' || this.currentState === 'generating') {
      throw new PipelineBusyError('Cannot reset the conversation while a question is being answered');
    }
    this.conversation = new ConversationHistory();
    this.currentState = 'idle';
  }

  private async contextualize(question: string): Promise<string> {
    if (!this.config.contextualizeQuestions || this.conversation.length === 0) {
      return question;
    }

    const transcript = this.conversation.format(this.config.historyWindow);
    const prompt = buildContextualizePrompt(question, transcript);

    let rewritten: string;
    try {
      rewritten = await this.completion.complete(prompt.messages);
    } catch (error) {
      this.logger.error('Failed to contextualize question', { error });
      throw new GenerationError('Completion service failed while contextualizing the question', {
        cause: error,
      });
    }

    const standalone = rewritten.trim() || question;
    this.logger.debug('Contextualized question', { question, standalone });
    return standalone;
  }

  private async retrieve(query: string): Promise<RetrievalResult[]> {
    let results: RetrievalResult[];
    try {
      results = await this.store.query(query, this.config.topK);
    } catch (error) {
      this.logger.error('Retrieval failed', { error });
      throw new RetrievalError('Vector store query failed', { cause: error });
    }

    if (results.length === 0) {
      this.logger.warn('No context found for question', { query });
    } else {
      this.logger.debug(`Retrieved ${results.length} chunk(s)`);
    }

    return results.slice(0, this.config.topK);
  }

  private async generate(prompt: Prompt): Promise<string> {
    try {
      return await this.completion.complete(prompt.messages);
    } catch (error) {
      this.logger.error('Generation failed', { error });
      throw new GenerationError('Completion service failed', { cause: error });
    }
  }
}

/**
 * Create a new pipeline (convenience function)
 */
export function createPipeline(config: PipelineConfig, deps: PipelineDeps): RAGPipeline {
  return new RAGPipeline(config, deps);
}
