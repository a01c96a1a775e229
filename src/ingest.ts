/**
 * Directory ingestion for ragtalk
 */

import { relative } from 'node:path';
import type { Logger } from './logger.js';
import type { RAGPipeline } from './pipeline.js';
import { DocumentReaderRegistry, findDocuments } from './documents.js';
import { DocumentError, IngestionError } from './errors.js';
import { NullLogger } from './logger.js';

export interface IngestSummary {
  /** Source paths ingested in this run */
  ingested: string[];
  /** Source paths already in the index */
  skipped: string[];
  /** Source paths that could not be read or indexed */
  failed: Array<{ sourcePath: string; error: Error }>;
  /** Chunks added in this run */
  chunks: number;
}

export interface IngestDirectoryOptions {
  pipeline: RAGPipeline;
  dir: string;
  /** Source paths (relative to `dir`) already indexed */
  known?: ReadonlySet<string>;
  registry?: DocumentReaderRegistry;
  logger?: Logger;
}

/**
 * Ingest every supported, not yet indexed file under a directory.
 *
 * A file that cannot be read or indexed is logged and recorded in
 * `failed`; the remaining files are still ingested.
 */
export async function ingestDirectory(options: IngestDirectoryOptions): Promise<IngestSummary> {
  const {
    pipeline,
    dir,
    known = new Set<string>(),
    registry = new DocumentReaderRegistry(),
    logger = new NullLogger(),
  } = options;

  const summary: IngestSummary = { ingested: [], skipped: [], failed: [], chunks: 0 };
  const files = await findDocuments(dir, registry.extensions);
  logger.debug(`Found ${files.length} document(s) in ${dir}`);

  for (const file of files) {
    const sourcePath = relative(dir, file);
    if (known.has(sourcePath)) {
      summary.skipped.push(sourcePath);
      continue;
    }

    try {
      const document = await registry.readDocument(file, dir);
      const chunks = await pipeline.ingest(document);
      summary.ingested.push(sourcePath);
      summary.chunks += chunks.length;
    } catch (error) {
      if (error instanceof DocumentError || error instanceof IngestionError) {
        logger.error(`Skipping ${sourcePath}: ${error.message}`);
        summary.failed.push({ sourcePath, error });
        continue;
      }
      throw error;
    }
  }

  if (summary.ingested.length === 0 && summary.failed.length === 0) {
    logger.info('No new documents to ingest');
  } else {
    logger.info(
      `Ingested ${summary.ingested.length} document(s), ${summary.chunks} chunk(s)`,
      summary.failed.length > 0 ? { failed: summary.failed.length } : undefined
    );
  }

  return summary;
}
