/**
 * Abbreviation expansion for ragtalk
 */

import type { AbbreviationMap } from './types.js';
import { ConfigurationError } from './errors.js';

// A token boundary is anything that is not a letter, digit or underscore
const TOKEN_START = '(?<![\\p{L}\\p{N}_])';
const TOKEN_END = '(?![\\p{L}\\p{N}_])';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Rewrites known abbreviations to their expanded form.
 *
 * Matching is whole-token and case-sensitive, so `ID` expands in
 * "the ID field" but not inside "SIDE" or "IDs". Replacement is a single
 * pass: an expansion is never expanded again.
 *
 * @example
 * ```typescript
 * const expander = new AbbreviationExpander({ API: 'application programming interface' });
 * expander.expand('The API uses JSON.');
 * // 'The application programming interface uses JSON.'
 * ```
 */
export class AbbreviationExpander {
  private readonly mapping: Map<string, string>;
  private readonly pattern: RegExp | null;

  constructor(mapping: AbbreviationMap = {}) {
    this.mapping = new Map(Object.entries(mapping));

    for (const key of this.mapping.keys()) {
      if (key.trim() === '') {
        throw new ConfigurationError('Abbreviation keys must not be empty');
      }
    }

    if (this.mapping.size === 0) {
      this.pattern = null;
      return;
    }

    // Longest first, so "U.S.A." wins over "U.S."
    const alternatives = [...this.mapping.keys()]
      .sort((a, b) => b.length - a.length || a.localeCompare(b))
      .map(escapeRegExp);

    this.pattern = new RegExp(`${TOKEN_START}(?:${alternatives.join('|')})${TOKEN_END}`, 'gu');
  }

  /** Number of known abbreviations */
  get size(): number {
    return this.mapping.size;
  }

  /** Expand every known abbreviation in `text` */
  expand(text: string): string {
    if (!this.pattern) return text;
    return text.replace(this.pattern, match => this.mapping.get(match) ?? match);
  }
}

/**
 * Expand abbreviations in text (convenience function)
 */
export function expandAbbreviations(text: string, mapping: AbbreviationMap): string {
  return new AbbreviationExpander(mapping).expand(text);
}

/**
 * Validate an untrusted value (e.g. parsed JSON) as an abbreviation mapping
 */
export function parseAbbreviationMap(value: unknown): AbbreviationMap {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ConfigurationError('Abbreviation mapping must be an object of strings');
  }

  const mapping: Record<string, string> = {};
  for (const [key, expansion] of Object.entries(value)) {
    if (typeof expansion !== 'string') {
      throw new ConfigurationError(`Expansion for abbreviation "${key}" must be a string`);
    }
    mapping[key] = expansion;
  }
  return mapping;
}
