/**
 * Conversation state for ragtalk
 */

import type { ConversationTurn } from './types.js';

/**
 * Append-only log of conversation turns.
 *
 * Turns are never edited or removed; prompts read the most recent ones
 * through `window`.
 */
export class ConversationHistory {
  private readonly entries: ConversationTurn[] = [];

  /** Number of turns recorded */
  get length(): number {
    return this.entries.length;
  }

  /** All turns, oldest first */
  get turns(): readonly ConversationTurn[] {
    return this.entries;
  }

  /**
   * Record turns at the newest end
   */
  append(...turns: ConversationTurn[]): void {
    for (const turn of turns) {
      this.entries.push({ role: turn.role, content: turn.content });
    }
  }

  /**
   * The `size` most recent turns, oldest first
   */
  window(size: number): ConversationTurn[] {
    if (size <= 0) return [];
    return this.entries.slice(-size);
  }

  /**
   * Render turns as a transcript, e.g. for query rewriting
   */
  format(size: number): string {
    return this.window(size)
      .map(turn => `${turn.role === 'user' ? 'Human' : 'Assistant'}: ${turn.content}`)
      .join('\n\n');
  }
}
