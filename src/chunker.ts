/**
 * Text chunking for ragtalk
 */

import type { Chunk, ChunkOptions } from './types.js';
import { ConfigurationError } from './errors.js';

export const DEFAULT_BOUNDARY_TOLERANCE = 50;

const SENTENCE_END = /[.!?]/;
const WHITESPACE = /\s/;

/** Tokens whose trailing period does not end a sentence (compared lowercased) */
const NON_TERMINAL_ABBREVIATIONS = new Set([
  'mr.',
  'mrs.',
  'ms.',
  'dr.',
  'prof.',
  'sr.',
  'jr.',
  'st.',
  'vs.',
  'etc.',
  'e.g.',
  'i.e.',
  'inc.',
  'ltd.',
  'co.',
  'no.',
  'fig.',
  'approx.',
]);

/** A half-open `[start, end)` range of the input */
export interface Span {
  start: number;
  end: number;
}

/**
 * Validate chunk options, throwing ConfigurationError on bad values
 */
export function validateChunkOptions(options: ChunkOptions): void {
  const { chunkSize, overlap, boundaryTolerance } = options;

  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError('chunkSize must be a positive integer');
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigurationError('overlap must be a non-negative integer');
  }
  if (overlap >= chunkSize) {
    throw new ConfigurationError('overlap must be less than chunkSize');
  }
  if (
    boundaryTolerance !== undefined &&
    (!Number.isInteger(boundaryTolerance) || boundaryTolerance < 0)
  ) {
    throw new ConfigurationError('boundaryTolerance must be a non-negative integer');
  }
}

/**
 * Splits text into overlapping chunks of at most `chunkSize` characters.
 *
 * Each window is cut after the nearest sentence terminator, or else before
 * the nearest whitespace, found within `boundaryTolerance` characters of
 * the hard cutoff; with neither, the cut is the hard cutoff. The next
 * window starts `overlap` characters before the cut. Chunks are exact
 * slices of the input, so dropping the first `overlap` characters of every
 * chunk after the first and concatenating gives back the original text.
 */
export class TextSplitter {
  readonly chunkSize: number;
  readonly overlap: number;
  /** Effective tolerance, clamped so every window moves forward */
  readonly boundaryTolerance: number;

  constructor(options: ChunkOptions) {
    validateChunkOptions(options);

    this.chunkSize = options.chunkSize;
    this.overlap = options.overlap;
    this.boundaryTolerance = Math.min(
      options.boundaryTolerance ?? DEFAULT_BOUNDARY_TOLERANCE,
      options.chunkSize - options.overlap - 1
    );
  }

  /**
   * Compute chunk ranges for `text`
   */
  spans(text: string): Span[] {
    if (text.length === 0) return [];
    if (text.length <= this.chunkSize) return [{ start: 0, end: text.length }];

    const spans: Span[] = [];
    let start = 0;

    for (;;) {
      const hardEnd = start + this.chunkSize;
      if (hardEnd >= text.length) {
        spans.push({ start, end: text.length });
        return spans;
      }

      const end = this.findCut(text, start, hardEnd);
      spans.push({ start, end });
      start = end - this.overlap;
    }
  }

  /**
   * Split `text` into raw chunk strings
   */
  splitText(text: string): string[] {
    return this.spans(text).map(({ start, end }) => text.slice(start, end));
  }

  /**
   * Split a document into chunks with ids and offsets
   */
  split(text: string, documentId: string): Chunk[] {
    return this.spans(text).map(({ start, end }, index) => ({
      id: `${documentId}-${index}`,
      documentId,
      text: text.slice(start, end),
      startOffset: start,
      endOffset: end,
      sequenceIndex: index,
      unit: 'characters',
    }));
  }

  /**
   * Find the cut for a window ending at `hardEnd`
   */
  private findCut(text: string, start: number, hardEnd: number): number {
    const lowest = Math.max(start + 1, hardEnd - this.boundaryTolerance);

    // Just after a sentence terminator that is followed by whitespace
    for (let cut = hardEnd; cut >= lowest; cut--) {
      if (
        SENTENCE_END.test(text[cut - 1]) &&
        WHITESPACE.test(text[cut]) &&
        !endsWithAbbreviation(text, start, cut)
      ) {
        return cut;
      }
    }

    // Just before whitespace, so no word is severed
    for (let cut = hardEnd; cut >= lowest; cut--) {
      if (WHITESPACE.test(text[cut]) && !WHITESPACE.test(text[cut - 1])) {
        return cut;
      }
    }

    // Never leave half of a surrogate pair on either side
    if (splitsSurrogatePair(text, hardEnd) && hardEnd - 1 >= lowest) {
      return hardEnd - 1;
    }
    return hardEnd;
  }
}

function endsWithAbbreviation(text: string, start: number, cut: number): boolean {
  let tokenStart = cut;
  while (tokenStart > start && !WHITESPACE.test(text[tokenStart - 1])) tokenStart--;
  return NON_TERMINAL_ABBREVIATIONS.has(text.slice(tokenStart, cut).toLowerCase());
}

function splitsSurrogatePair(text: string, index: number): boolean {
  const high = text.charCodeAt(index - 1);
  const low = text.charCodeAt(index);
  return high >= 0xd800 && high <= 0xdbff && low >= 0xdc00 && low <= 0xdfff;
}

/**
 * Split text into chunk strings (convenience function)
 */
export function chunkText(text: string, options: ChunkOptions): string[] {
  return new TextSplitter(options).splitText(text);
}

/**
 * Rebuild the original text from one document's chunks, dropping the overlap
 */
export function reconstructText(chunks: readonly Chunk[]): string {
  const ordered = [...chunks].sort((a, b) => a.sequenceIndex - b.sequenceIndex);
  let text = '';
  let covered = 0;

  for (const chunk of ordered) {
    text += chunk.text.slice(Math.max(0, covered - chunk.startOffset));
    covered = chunk.endOffset;
  }

  return text;
}
