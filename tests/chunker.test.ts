import { describe, it, expect } from 'vitest';
import {
  TextSplitter,
  chunkText,
  reconstructText,
  validateChunkOptions,
} from '../src/chunker.js';
import { ConfigurationError } from '../src/errors.js';

const SAMPLE = 'The API uses JSON. JSON is a format.';

describe('chunkText', () => {
  it('should return empty array for empty text', () => {
    expect(chunkText('', { chunkSize: 10, overlap: 2 })).toEqual([]);
  });

  it('should return single chunk for short text', () => {
    const text = 'Hello, world!';
    expect(chunkText(text, { chunkSize: 100, overlap: 10 })).toEqual(['Hello, world!']);
  });

  it('should return single chunk when text is exactly chunkSize long', () => {
    const text = 'a'.repeat(20);
    expect(chunkText(text, { chunkSize: 20, overlap: 5 })).toEqual([text]);
  });

  it('should cut after a sentence terminator, then before whitespace', () => {
    const chunks = chunkText(SAMPLE, { chunkSize: 20, overlap: 5 });
    expect(chunks).toEqual(['The API uses JSON.', 'JSON. JSON is a', ' is a format.']);
  });

  it('should avoid splitting words when whitespace is in range', () => {
    const chunks = chunkText('aaaa bbbb cccc', { chunkSize: 6, overlap: 0 });
    expect(chunks).toEqual(['aaaa', ' bbbb', ' cccc']);
  });

  it('should cut at the hard limit when no boundary is in range', () => {
    const text = 'a'.repeat(25);
    const chunks = chunkText(text, { chunkSize: 10, overlap: 2 });
    expect(chunks.map(c => c.length)).toEqual([10, 10, 9]);
  });

  it('should only consider the hard cutoff when boundaryTolerance is 0', () => {
    const chunks = chunkText('aaaa bbbb cccc', { chunkSize: 6, overlap: 0, boundaryTolerance: 0 });
    expect(chunks).toEqual(['aaaa b', 'bbb cc', 'cc']);
  });

  it('should not treat an abbreviation as a sentence end', () => {
    const chunks = chunkText('Ask Dr. Jones now', { chunkSize: 14, overlap: 0 });
    expect(chunks).toEqual(['Ask Dr. Jones', ' now']);
  });

  it('should still cut after a word that only resembles an abbreviation', () => {
    const chunks = chunkText('Read the docs. Then ask', { chunkSize: 20, overlap: 0 });
    expect(chunks).toEqual(['Read the docs.', ' Then ask']);
  });

  it('should not split a surrogate pair at the hard limit', () => {
    const text = 'ab\u{1F600}cdef';
    const chunks = new TextSplitter({ chunkSize: 3, overlap: 0 }).split(text, 'doc');

    expect(chunks.map(c => c.text)).toEqual(['ab', '\u{1F600}c', 'def']);
    expect(reconstructText(chunks)).toBe(text);
  });

  it('should respect chunk size limit', () => {
    const text = 'word '.repeat(100);
    const chunks = chunkText(text, { chunkSize: 50, overlap: 10 });

    expect(chunks.length).toBeGreaterThan(1);
    chunks.forEach(chunk => {
      expect(chunk.length).toBeLessThanOrEqual(50);
    });
  });
});

describe('TextSplitter', () => {
  it('should assign ids, offsets and sequence numbers', () => {
    const chunks = new TextSplitter({ chunkSize: 20, overlap: 5 }).split(SAMPLE, 'doc');

    expect(chunks.map(c => c.id)).toEqual(['doc-0', 'doc-1', 'doc-2']);
    expect(chunks.map(c => [c.startOffset, c.endOffset])).toEqual([
      [0, 18],
      [13, 28],
      [23, 36],
    ]);
    expect(chunks.map(c => c.sequenceIndex)).toEqual([0, 1, 2]);
    chunks.forEach(chunk => {
      expect(chunk.documentId).toBe('doc');
      expect(chunk.unit).toBe('characters');
    });
  });

  it('should clamp boundaryTolerance so every window advances', () => {
    const splitter = new TextSplitter({ chunkSize: 10, overlap: 4, boundaryTolerance: 100 });
    expect(splitter.boundaryTolerance).toBe(5);
  });

  it('should default boundaryTolerance to 50', () => {
    const splitter = new TextSplitter({ chunkSize: 500, overlap: 50 });
    expect(splitter.boundaryTolerance).toBe(50);
  });

  describe('invariants', () => {
    const texts = [
      SAMPLE,
      'Lorem ipsum dolor sit amet. '.repeat(40),
      'x'.repeat(333),
      'First line.\nSecond line!\n\nThird paragraph? Yes. '.repeat(12),
      'short words a b c d e f g h i j k l m n o p q r s t u v w x y z '.repeat(8),
    ];
    const configs = [
      { chunkSize: 20, overlap: 5 },
      { chunkSize: 50, overlap: 0 },
      { chunkSize: 64, overlap: 16, boundaryTolerance: 8 },
      { chunkSize: 7, overlap: 6 },
    ];

    for (const config of configs) {
      for (const text of texts) {
        const label = `chunkSize ${config.chunkSize}, overlap ${config.overlap}, ${text.length} chars`;

        it(`should keep chunks exact, bounded and overlapping (${label})`, () => {
          const splitter = new TextSplitter(config);
          const chunks = splitter.split(text, 'doc');

          chunks.forEach((chunk, i) => {
            expect(chunk.endOffset - chunk.startOffset).toBeLessThanOrEqual(config.chunkSize);
            expect(chunk.text).toBe(text.slice(chunk.startOffset, chunk.endOffset));
            if (i > 0) {
              expect(chunk.startOffset).toBe(chunks[i - 1].endOffset - config.overlap);
            }
          });
          expect(chunks[chunks.length - 1].endOffset).toBe(text.length);
        });

        it(`should reconstruct the original text (${label})`, () => {
          const chunks = new TextSplitter(config).split(text, 'doc');
          expect(reconstructText(chunks)).toBe(text);
        });

        it(`should be deterministic (${label})`, () => {
          const splitter = new TextSplitter(config);
          expect(splitter.split(text, 'doc')).toEqual(splitter.split(text, 'doc'));
        });
      }
    }
  });
});

describe('reconstructText', () => {
  it('should return empty string for no chunks', () => {
    expect(reconstructText([])).toBe('');
  });

  it('should accept chunks in any order', () => {
    const chunks = new TextSplitter({ chunkSize: 20, overlap: 5 }).split(SAMPLE, 'doc');
    expect(reconstructText([...chunks].reverse())).toBe(SAMPLE);
  });
});

describe('validateChunkOptions', () => {
  it('should reject a non-positive chunkSize', () => {
    expect(() => validateChunkOptions({ chunkSize: 0, overlap: 0 })).toThrow(ConfigurationError);
    expect(() => validateChunkOptions({ chunkSize: 1.5, overlap: 0 })).toThrow(
      'chunkSize must be a positive integer'
    );
  });

  it('should reject a negative overlap', () => {
    expect(() => validateChunkOptions({ chunkSize: 10, overlap: -1 })).toThrow(
      'overlap must be a non-negative integer'
    );
  });

  it('should reject overlap equal to or larger than chunkSize', () => {
    expect(() => validateChunkOptions({ chunkSize: 10, overlap: 10 })).toThrow(
      'overlap must be less than chunkSize'
    );
    expect(() => new TextSplitter({ chunkSize: 10, overlap: 12 })).toThrow(ConfigurationError);
  });

  it('should reject a negative boundaryTolerance', () => {
    expect(() => validateChunkOptions({ chunkSize: 10, overlap: 2, boundaryTolerance: -3 })).toThrow(
      'boundaryTolerance must be a non-negative integer'
    );
  });

  it('should accept valid options', () => {
    expect(() => validateChunkOptions({ chunkSize: 10, overlap: 9, boundaryTolerance: 0 })).not.toThrow();
  });
});
