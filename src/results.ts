/**
 * Saving answered questions for ragtalk
 */

import { appendFile, mkdir, stat } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { Answer } from './types.js';
import type { RAGPipeline } from './pipeline.js';
import { formatSources } from './prompt.js';

const HEADER = ['Question', 'Response', 'Sources'];

/**
 * Quote a CSV field when it contains a delimiter, quote or line break
 */
export function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function csvRow(fields: string[]): string {
  return `${fields.map(csvField).join(',')}\r\n`;
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Append an answer to a CSV file, writing the header when the file is new
 */
export async function saveResults(filePath: string, answer: Answer): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const header = (await exists(filePath)) ? '' : csvRow(HEADER);
  const row = csvRow([
    answer.question,
    answer.response,
    formatSources(answer.sources).join('\n'),
  ]);

  await appendFile(filePath, header + row, 'utf-8');
}

export interface SavedTurn {
  answer: Answer;
  /** Set when the answer could not be written to the results file */
  saveError?: Error;
}

/**
 * Answer a question and append it to `resultsFile`, when given.
 * Pipeline errors propagate; a failed write is reported on the result.
 */
export async function answerAndSave(
  pipeline: Pick<RAGPipeline, 'answer'>,
  question: string,
  resultsFile?: string
): Promise<SavedTurn> {
  const answer = await pipeline.answer(question);
  if (!resultsFile) return { answer };

  try {
    await saveResults(resultsFile, answer);
    return { answer };
  } catch (error) {
    return { answer, saveError: error instanceof Error ? error : new Error(String(error)) };
  }
}

/**
 * Default results file for a session started at `date`
 */
export function resultsFilePath(resultsDir: string, date: Date = new Date()): string {
  const stamp = date.toISOString().replace(/[-:]/g, '').replace(/\..+$/, '').replace('T', '_');
  return join(resultsDir, `rag_results_${stamp}.csv`);
}
