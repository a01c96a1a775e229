/**
 * Prompt assembly for ragtalk
 */

import type { ChatMessage, ConversationTurn, Prompt, RetrievalResult } from './types.js';

export const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful assistant that answers questions using only the context ' +
  'supplied from the user\'s documents and the previous conversation. If the ' +
  'answer cannot be derived from them, say "I cannot answer this based on the ' +
  'provided information."';

/** Stands in for the context section when retrieval found nothing */
export const NO_CONTEXT_MARKER = 'No context found: no indexed document matched this question.';

export const CONTEXTUALIZE_PROMPT =
  'Given a chat history and the latest user question, which might reference ' +
  'context in the chat history, formulate a standalone question which can be ' +
  'understood without the chat history. Do NOT answer the question, just ' +
  'reformulate it if needed and otherwise return it as is.';

/**
 * Render retrieved chunks, each tagged with its source
 */
export function formatContext(results: readonly RetrievalResult[]): string {
  if (results.length === 0) return NO_CONTEXT_MARKER;

  return results
    .map((result, i) =>
      `[${i + 1}] source: ${result.sourceDocumentId} (score ${result.score.toFixed(3)})\n${result.chunkText}`
    )
    .join('\n\n');
}

/**
 * Render retrieved chunks as one-line source references
 */
export function formatSources(results: readonly RetrievalResult[]): string[] {
  return results.map(result => {
    const index = result.metadata?.sequenceIndex;
    const chunk = typeof index === 'number' ? `chunk ${index}, ` : '';
    return `${result.sourceDocumentId} (${chunk}score ${result.score.toFixed(4)})`;
  });
}

/**
 * Assemble the messages for one question
 */
export function buildPrompt(input: {
  question: string;
  results: readonly RetrievalResult[];
  history: readonly ConversationTurn[];
  systemPrompt?: string;
}): Prompt {
  const { question, results, history, systemPrompt = DEFAULT_SYSTEM_PROMPT } = input;

  const messages: ChatMessage[] = [
    { role: 'system', content: systemPrompt },
    ...history.map(turn => ({ role: turn.role, content: turn.content })),
    {
      role: 'user',
      content: `Context from documents:\n${formatContext(results)}\n\nQuestion: ${question}`,
    },
  ];

  return { messages };
}

/**
 * Messages asking the model to turn a follow-up into a standalone question
 */
export function buildContextualizePrompt(question: string, transcript: string): Prompt {
  return {
    messages: [
      { role: 'system', content: CONTEXTUALIZE_PROMPT },
      { role: 'user', content: `Chat history:\n${transcript}\n\nQuestion:\n${question}` },
    ],
  };
}
