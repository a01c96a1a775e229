import { describe, it, expect, beforeEach } from 'vitest';
import { RAGPipeline, createPipeline } from '../src/pipeline.js';
import {
  ConfigurationError,
  GenerationError,
  IngestionError,
  PipelineBusyError,
  RetrievalError,
} from '../src/errors.js';
import { CONTEXTUALIZE_PROMPT, DEFAULT_SYSTEM_PROMPT, NO_CONTEXT_MARKER } from '../src/prompt.js';
import type {
  ChatMessage,
  ChunkRecord,
  CompletionClient,
  PipelineConfig,
  PipelineState,
  RetrievalResult,
  VectorStoreClient,
} from '../src/types.js';

class StubStore implements VectorStoreClient {
  added: ChunkRecord[] = [];
  queries: Array<{ text: string; topK: number }> = [];
  results: RetrievalResult[] = [];
  failAdd = false;
  failQuery = false;
  onQuery?: () => Promise<void> | void;

  async add(chunks: ChunkRecord[]): Promise<void> {
    if (this.failAdd) throw new Error('disk full');
    this.added.push(...chunks);
  }

  async query(text: string, topK: number): Promise<RetrievalResult[]> {
    this.queries.push({ text, topK });
    await this.onQuery?.();
    if (this.failQuery) throw new Error('index offline');
    return this.results;
  }
}

/** Replies with every message it receives, joined by newlines */
class EchoCompletion implements CompletionClient {
  calls: ChatMessage[][] = [];
  fail = false;
  reply?: (messages: ChatMessage[]) => string;
  onComplete?: () => void;

  async complete(messages: ChatMessage[]): Promise<string> {
    this.calls.push(messages);
    this.onComplete?.();
    if (this.fail) throw new Error('rate limited');
    return this.reply ? this.reply(messages) : messages.map(m => m.content).join('\n');
  }
}

const SAMPLE = 'The API uses JSON. JSON is a format.';

const baseConfig: PipelineConfig = {
  chunkSize: 20,
  overlap: 5,
  topK: 2,
  historyWindow: 5,
};

function userMessage(messages: ChatMessage[]): string {
  return messages[messages.length - 1].content;
}

describe('RAGPipeline', () => {
  let store: StubStore;
  let completion: EchoCompletion;
  let pipeline: RAGPipeline;

  beforeEach(() => {
    store = new StubStore();
    completion = new EchoCompletion();
    pipeline = new RAGPipeline(baseConfig, { store, completion });
  });

  describe('configuration', () => {
    it('should reject a topK below 1', () => {
      expect(() => new RAGPipeline({ ...baseConfig, topK: 0 }, { store, completion })).toThrow(
        'topK must be a positive integer'
      );
    });

    it('should reject a negative history window', () => {
      expect(
        () => new RAGPipeline({ ...baseConfig, historyWindow: -1 }, { store, completion })
      ).toThrow('historyWindow must be a non-negative integer');
    });

    it('should reject overlap not smaller than chunkSize', () => {
      expect(
        () => new RAGPipeline({ ...baseConfig, overlap: 20 }, { store, completion })
      ).toThrow(ConfigurationError);
    });

    it('should reject empty abbreviation keys', () => {
      expect(
        () => new RAGPipeline({ ...baseConfig, abbreviations: { '': 'x' } }, { store, completion })
      ).toThrow(ConfigurationError);
    });

    it('should start idle with an empty history', () => {
      expect(pipeline.state).toBe('idle');
      expect(pipeline.history).toEqual([]);
    });
  });

  describe('ingest', () => {
    it('should split a document into overlapping bounded chunks', async () => {
      const chunks = await pipeline.ingest({ sourcePath: 'notes.txt', rawText: SAMPLE });

      expect(chunks.length).toBeGreaterThanOrEqual(2);
      chunks.forEach(chunk => {
        expect(chunk.text.length).toBeLessThanOrEqual(20);
      });
      expect(chunks[1].startOffset).toBeLessThanOrEqual(chunks[0].endOffset);
    });

    it('should index every chunk with its metadata', async () => {
      await pipeline.ingest({ sourcePath: 'notes.txt', rawText: SAMPLE });

      expect(store.added.map(r => r.id)).toEqual(['notes.txt-0', 'notes.txt-1', 'notes.txt-2']);
      expect(store.added[0]).toEqual({
        id: 'notes.txt-0',
        text: 'The API uses JSON.',
        metadata: {
          documentId: 'notes.txt',
          sourcePath: 'notes.txt',
          sequenceIndex: 0,
          startOffset: 0,
          endOffset: 18,
          unit: 'characters',
        },
      });
    });

    it('should prefer an explicit document id', async () => {
      await pipeline.ingest({ id: 'notes', sourcePath: 'docs/notes.txt', rawText: SAMPLE });
      expect(store.added[0].id).toBe('notes-0');
      expect(store.added[0].metadata.sourcePath).toBe('docs/notes.txt');
    });

    it('should expand abbreviations before splitting', async () => {
      const expanding = new RAGPipeline(
        { ...baseConfig, chunkSize: 500, overlap: 50, abbreviations: { API: 'application programming interface' } },
        { store, completion }
      );

      await expanding.ingest({ sourcePath: 'notes.txt', rawText: SAMPLE });

      expect(store.added).toHaveLength(1);
      expect(store.added[0].text).toBe(
        'The application programming interface uses JSON. JSON is a format.'
      );
    });

    it('should reject a document without text', async () => {
      await expect(
        pipeline.ingest({ sourcePath: 'blank.txt', rawText: ' \n\t ' })
      ).rejects.toThrow(IngestionError);
      expect(store.added).toEqual([]);
    });

    it('should wrap vector store failures', async () => {
      store.failAdd = true;

      const error = await pipeline.ingest({ id: 'doc', sourcePath: 'doc.txt', rawText: SAMPLE }).catch(e => e);

      expect(error).toBeInstanceOf(IngestionError);
      expect(error.message).toBe('Vector store rejected document "doc": disk full');
      expect(error.documentId).toBe('doc');
    });
  });

  describe('answer', () => {
    it('should put retrieved text into the prompt', async () => {
      store.results = [{ chunkText: 'JSON is a format.', score: 0.9, sourceDocumentId: 'guide' }];

      const response = await pipeline.ask('what format?');

      expect(response).toContain('JSON is a format.');
      expect(userMessage(completion.calls[0])).toContain('JSON is a format.');
    });

    it('should query the store with the question and topK', async () => {
      await pipeline.ask('what format?');
      expect(store.queries).toEqual([{ text: 'what format?', topK: 2 }]);
    });

    it('should send the no-context marker when nothing is retrieved', async () => {
      store.results = [];

      const answer = await pipeline.answer('anything?');

      expect(completion.calls).toHaveLength(1);
      expect(userMessage(completion.calls[0])).toContain(NO_CONTEXT_MARKER);
      expect(answer.sources).toEqual([]);
    });

    it('should return the response with its sources and prompt', async () => {
      store.results = [{ chunkText: 'JSON is a format.', score: 0.9, sourceDocumentId: 'guide' }];
      completion.reply = () => 'A data format.';

      const answer = await pipeline.answer('what format?');

      expect(answer.question).toBe('what format?');
      expect(answer.response).toBe('A data format.');
      expect(answer.sources).toEqual(store.results);
      expect(answer.prompt.messages).toEqual(completion.calls[0]);
    });

    it('should keep at most topK results', async () => {
      store.results = ['a', 'b', 'c'].map((text, i) => ({
        chunkText: text,
        score: 1 - i / 10,
        sourceDocumentId: text,
      }));

      const answer = await pipeline.answer('q');

      expect(answer.sources.map(s => s.chunkText)).toEqual(['a', 'b']);
    });

    it('should append exactly one user and one assistant turn', async () => {
      completion.reply = () => 'It is JSON.';

      await pipeline.ask('what format?');

      expect(pipeline.history).toEqual([
        { role: 'user', content: 'what format?' },
        { role: 'assistant', content: 'It is JSON.' },
      ]);
    });

    it('should drop the oldest turns outside the history window', async () => {
      const windowed = new RAGPipeline({ ...baseConfig, historyWindow: 2 }, { store, completion });
      let n = 0;
      completion.reply = () => `answer ${++n}`;

      await windowed.ask('q1');
      await windowed.ask('q2');
      await windowed.ask('q3');

      const messages = completion.calls[2];
      expect(messages[0]).toEqual({ role: 'system', content: DEFAULT_SYSTEM_PROMPT });
      expect(messages.slice(1, -1)).toEqual([
        { role: 'user', content: 'q2' },
        { role: 'assistant', content: 'answer 2' },
      ]);
      expect(windowed.history).toHaveLength(6);
    });

    it('should send no history with a window of 0', async () => {
      const forgetful = new RAGPipeline({ ...baseConfig, historyWindow: 0 }, { store, completion });

      await forgetful.ask('q1');
      await forgetful.ask('q2');

      expect(completion.calls[1]).toHaveLength(2);
    });
  });

  describe('failures', () => {
    it('should raise GenerationError and leave history unchanged', async () => {
      await pipeline.ask('first');
      completion.fail = true;

      const error = await pipeline.ask('second').catch(e => e);

      expect(error).toBeInstanceOf(GenerationError);
      expect(error.phase).toBe('generation');
      expect(error.message).toBe('Completion service failed: rate limited');
      expect(pipeline.history).toHaveLength(2);
      expect(pipeline.state).toBe('failed');
    });

    it('should raise RetrievalError without calling the completion service', async () => {
      store.failQuery = true;

      const error = await pipeline.ask('q').catch(e => e);

      expect(error).toBeInstanceOf(RetrievalError);
      expect(error.phase).toBe('retrieval');
      expect(completion.calls).toEqual([]);
      expect(pipeline.history).toEqual([]);
    });

    it('should stay usable after a failed turn', async () => {
      completion.fail = true;
      await expect(pipeline.ask('q1')).rejects.toThrow(GenerationError);

      completion.fail = false;
      completion.reply = () => 'ok';
      await expect(pipeline.ask('q2')).resolves.toBe('ok');

      expect(pipeline.state).toBe('idle');
      expect(pipeline.history).toEqual([
        { role: 'user', content: 'q2' },
        { role: 'assistant', content: 'ok' },
      ]);
    });
  });

  describe('state', () => {
    it('should move through retrieving and generating back to idle', async () => {
      const seen: PipelineState[] = [];
      store.onQuery = () => {
        seen.push(pipeline.state);
      };
      completion.onComplete = () => {
        seen.push(pipeline.state);
      };

      await pipeline.ask('q');

      expect(seen).toEqual(['retrieving', 'generating']);
      expect(pipeline.state).toBe('idle');
    });

    it('should reject a second question while one is in flight', async () => {
      let release = (): void => {};
      const gate = new Promise<void>(resolve => {
        release = resolve;
      });
      store.onQuery = () => gate;

      const first = pipeline.ask('first');

      await expect(pipeline.ask('second')).rejects.toThrow(PipelineBusyError);
      expect(() => pipeline.resetConversation()).toThrow(PipelineBusyError);

      release();
      await first;
      expect(pipeline.history).toHaveLength(2);
      expect(store.queries.map(q => q.text)).toEqual(['first']);
    });
  });

  describe('resetConversation', () => {
    it('should clear the history and return to idle', async () => {
      await pipeline.ask('q');
      pipeline.resetConversation();

      expect(pipeline.history).toEqual([]);
      expect(pipeline.state).toBe('idle');
    });
  });

  describe('contextualizeQuestions', () => {
    let contextual: RAGPipeline;

    beforeEach(() => {
      contextual = createPipeline(
        { ...baseConfig, contextualizeQuestions: true },
        { store, completion }
      );
      completion.reply = messages =>
        messages[0].content === CONTEXTUALIZE_PROMPT ? 'What is the size of JSON?' : 'reply';
    });

    it('should not rewrite the first question', async () => {
      await contextual.ask('What is JSON?');

      expect(completion.calls).toHaveLength(1);
      expect(store.queries[0].text).toBe('What is JSON?');
    });

    it('should retrieve with the rewritten follow-up', async () => {
      await contextual.ask('What is JSON?');
      await contextual.ask('And its size?');

      expect(completion.calls).toHaveLength(3);
      expect(completion.calls[1][1].content).toBe(
        'Chat history:\nHuman: What is JSON?\n\nAssistant: reply\n\nQuestion:\nAnd its size?'
      );
      expect(store.queries[1].text).toBe('What is the size of JSON?');
      expect(userMessage(completion.calls[2])).toContain('Question: And its size?');
      expect(contextual.history[2]).toEqual({ role: 'user', content: 'And its size?' });
    });

    it('should raise GenerationError when the rewrite fails', async () => {
      await contextual.ask('What is JSON?');
      completion.fail = true;

      await expect(contextual.ask('And its size?')).rejects.toThrow(GenerationError);
      expect(store.queries).toHaveLength(1);
      expect(contextual.history).toHaveLength(2);
    });
  });

  describe('sessions', () => {
    it('should keep separate histories over a shared store', async () => {
      const other = new RAGPipeline(baseConfig, { store, completion });

      await pipeline.ask('mine');

      expect(pipeline.history).toHaveLength(2);
      expect(other.history).toEqual([]);
    });
  });
});
