/**
 * Document readers for ragtalk
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { extname, join, relative } from 'node:path';
import type * as Mammoth from 'mammoth';
import type PdfParse from 'pdf-parse';
import type { Document } from './types.js';
import { DocumentError } from './errors.js';

// Parsers load on first use
const require = createRequire(import.meta.url);
let pdfParse: typeof PdfParse | null = null;
let mammoth: typeof Mammoth | null = null;

function getPdfParse(): typeof PdfParse {
  if (pdfParse) return pdfParse;
  const loaded: typeof PdfParse = require('pdf-parse');
  pdfParse = loaded;
  return loaded;
}

function getMammoth(): typeof Mammoth {
  if (mammoth) return mammoth;
  const loaded: typeof Mammoth = require('mammoth');
  mammoth = loaded;
  return loaded;
}

/** Extracts plain text from one file format */
export interface DocumentReader {
  /** Lower-case extensions, with the dot */
  readonly extensions: readonly string[];
  read(filePath: string): Promise<string>;
}

/** Reader for UTF-8 text and markdown files */
export class TextReader implements DocumentReader {
  readonly extensions = ['.txt', '.md'] as const;

  async read(filePath: string): Promise<string> {
    return readFile(filePath, 'utf-8');
  }
}

/** Reader for PDF files */
export class PdfReader implements DocumentReader {
  readonly extensions = ['.pdf'] as const;

  async read(filePath: string): Promise<string> {
    const data = await getPdfParse()(await readFile(filePath));
    return data.text;
  }
}

/** Reader for Word documents */
export class DocxReader implements DocumentReader {
  readonly extensions = ['.docx'] as const;

  async read(filePath: string): Promise<string> {
    const result = await getMammoth().extractRawText({ buffer: await readFile(filePath) });
    return result.value;
  }
}

const DEFAULT_READERS: readonly DocumentReader[] = [
  new TextReader(),
  new PdfReader(),
  new DocxReader(),
];

/**
 * Picks a reader by file extension
 */
export class DocumentReaderRegistry {
  private readers = new Map<string, DocumentReader>();

  constructor(readers: readonly DocumentReader[] = DEFAULT_READERS) {
    for (const reader of readers) {
      this.register(reader);
    }
  }

  /** Supported extensions */
  get extensions(): string[] {
    return [...this.readers.keys()];
  }

  /**
   * Register a reader, replacing any reader of the same extensions
   */
  register(reader: DocumentReader): void {
    for (const ext of reader.extensions) {
      this.readers.set(ext.toLowerCase(), reader);
    }
  }

  supports(filePath: string): boolean {
    return this.readers.has(extname(filePath).toLowerCase());
  }

  getReader(filePath: string): DocumentReader {
    const ext = extname(filePath).toLowerCase();
    const reader = this.readers.get(ext);
    if (!reader) {
      throw new DocumentError(`Unsupported file format: ${ext || '(none)'}`, filePath);
    }
    return reader;
  }

  /**
   * Read a file and wrap it as a Document whose id is its path relative to `baseDir`
   */
  async readDocument(filePath: string, baseDir?: string): Promise<Document> {
    const reader = this.getReader(filePath);
    const sourcePath = baseDir ? relative(baseDir, filePath) : filePath;

    let rawText: string;
    try {
      rawText = await reader.read(filePath);
    } catch (error) {
      throw new DocumentError(`Error reading file ${filePath}`, filePath, { cause: error });
    }

    return { id: fileToDocId(sourcePath), sourcePath, rawText };
  }
}

/**
 * Document ID from a (relative) file path, with '/' as the separator
 */
export function fileToDocId(filePath: string): string {
  return filePath.replace(/\\/g, '/');
}

/**
 * Recursively find all files with given extensions, sorted by path
 */
export async function findDocuments(dir: string, extensions: readonly string[]): Promise<string[]> {
  const wanted = new Set(extensions.map(e => e.toLowerCase()));
  const files: string[] = [];

  async function walk(currentDir: string): Promise<void> {
    const entries = await readdir(currentDir);

    for (const entry of entries) {
      const fullPath = join(currentDir, entry);
      const stats = await stat(fullPath);

      if (stats.isDirectory()) {
        // Skip hidden directories and node_modules
        if (!entry.startsWith('.') && entry !== 'node_modules') {
          await walk(fullPath);
        }
      } else if (stats.isFile() && wanted.has(extname(entry).toLowerCase())) {
        files.push(fullPath);
      }
    }
  }

  try {
    await walk(dir);
  } catch (error) {
    throw new DocumentError(`Cannot read documents directory ${dir}`, dir, { cause: error });
  }

  return files.sort();
}
