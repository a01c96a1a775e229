/**
 * Embedding providers for ragtalk
 */

import OpenAI from 'openai';
import type { EmbeddingProvider } from './types.js';

/** Default embedding model */
export const DEFAULT_MODEL = 'text-embedding-3-small';

/** Common embedding dimensions by model */
const MODEL_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

/**
 * Embedding provider using the OpenAI embeddings API
 */
export class OpenAIEmbedding implements EmbeddingProvider {
  readonly model: string;
  readonly dimensions: number;

  private client?: OpenAI;
  private readonly apiKey?: string;

  constructor(options: { apiKey?: string; model?: string; client?: OpenAI } = {}) {
    this.model = options.model ?? DEFAULT_MODEL;
    this.dimensions = MODEL_DIMENSIONS[this.model] ?? 1536;
    this.apiKey = options.apiKey;
    this.client = options.client;
  }

  // Created on first request, so an index can be opened without credentials
  private getClient(): OpenAI {
    this.client ??= new OpenAI({ apiKey: this.apiKey });
    return this.client;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const response = await this.getClient().embeddings.create({
      model: this.model,
      input: texts.map(text => text.replace(/\n/g, ' ')),
    });

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map(item => item.embedding);
  }
}

/**
 * Custom embedding provider for user-provided embeddings
 */
export class CustomEmbedding implements EmbeddingProvider {
  readonly model: string;
  readonly dimensions: number;

  private embedFn: (texts: string[]) => Promise<number[][]>;

  constructor(
    embedFn: (texts: string[]) => Promise<number[][]>,
    options: { model?: string; dimensions: number }
  ) {
    this.embedFn = embedFn;
    this.model = options.model ?? 'custom';
    this.dimensions = options.dimensions;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return this.embedFn(texts);
  }
}

/**
 * Mock embedding provider for testing (deterministic pseudo-random vectors)
 */
export class MockEmbedding implements EmbeddingProvider {
  readonly model = 'mock';
  readonly dimensions: number;

  private vectors: Map<string, number[]> = new Map();

  constructor(dimensions: number = 384) {
    this.dimensions = dimensions;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map(text => {
      const cached = this.vectors.get(text);
      if (cached) return cached;

      const vector = this.generateVector(text);
      this.vectors.set(text, vector);
      return vector;
    });
  }

  private generateVector(text: string): number[] {
    const vector: number[] = [];
    let seed = this.hashCode(text);

    for (let i = 0; i < this.dimensions; i++) {
      seed = (seed * 1103515245 + 12345) & 0x7fffffff;
      vector.push((seed / 0x7fffffff) * 2 - 1);
    }

    // Normalize
    const magnitude = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return vector.map(v => v / magnitude);
  }

  private hashCode(str: string): number {
    let hash = 0;
    for (let i = 0; i < str.length; i++) {
      hash = ((hash << 5) - hash + str.charCodeAt(i)) | 0;
    }
    return Math.abs(hash);
  }
}

/**
 * Create an embedding provider
 */
export function createEmbeddingProvider(
  modelOrProvider?: string | EmbeddingProvider,
  options: { apiKey?: string } = {}
): EmbeddingProvider {
  if (!modelOrProvider) {
    return new OpenAIEmbedding({ apiKey: options.apiKey });
  }

  if (typeof modelOrProvider === 'string') {
    return new OpenAIEmbedding({ apiKey: options.apiKey, model: modelOrProvider });
  }

  return modelOrProvider;
}
