/**
 * Chat completion client for ragtalk
 */

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { ChatMessage, CompletionClient } from './types.js';

export const DEFAULT_COMPLETION_MODEL = 'gpt-4o-mini';

export interface OpenAICompletionOptions {
  apiKey?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Use an existing client instead of creating one */
  client?: OpenAI;
}

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

/**
 * Completion client backed by the OpenAI Chat Completions API
 */
export class OpenAICompletionClient implements CompletionClient {
  readonly model: string;
  readonly temperature: number;
  readonly maxTokens: number;

  private client: OpenAI;

  constructor(options: OpenAICompletionOptions = {}) {
    this.model = options.model ?? DEFAULT_COMPLETION_MODEL;
    this.temperature = options.temperature ?? 0.1;
    this.maxTokens = options.maxTokens ?? 1000;
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey });
  }

  async complete(messages: ChatMessage[]): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: messages.map(toOpenAIMessage),
      temperature: this.temperature,
      max_tokens: this.maxTokens,
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error(`Model "${this.model}" returned an empty completion`);
    }
    return content;
  }
}
