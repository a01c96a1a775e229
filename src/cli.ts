#!/usr/bin/env node

/**
 * ragtalk CLI - chat with your documents
 *
 * Usage:
 *   ragtalk ingest [dir]
 *   ragtalk chat [--no-ingest] [--save]
 *   ragtalk info
 */

import 'dotenv/config';
import { createInterface } from 'node:readline/promises';
import chalk from 'chalk';
import { Command } from 'commander';
import ora from 'ora';
import { type RagConfig, loadConfig, toPipelineConfig } from './config.js';
import { OpenAICompletionClient } from './completion.js';
import { createEmbeddingProvider } from './embeddings.js';
import { TurnError } from './errors.js';
import { type IngestSummary, ingestDirectory } from './ingest.js';
import { LocalVectorStore } from './local-store.js';
import { ConsoleLogger } from './logger.js';
import { RAGPipeline } from './pipeline.js';
import { formatSources } from './prompt.js';
import { answerAndSave, resultsFilePath } from './results.js';

const EXIT_COMMANDS = new Set(['exit', 'quit']);

interface Session {
  config: RagConfig;
  logger: ConsoleLogger;
  store: LocalVectorStore;
  pipeline: RAGPipeline;
}

async function openStore(config: RagConfig): Promise<LocalVectorStore> {
  const embedding = createEmbeddingProvider(config.embeddingModel, {
    apiKey: config.openai.apiKey,
  });
  return LocalVectorStore.load(config.paths.indexPath, embedding);
}

/**
 * Load config and the saved index, and wire a pipeline over them
 */
async function openSession(): Promise<Session> {
  const config = loadConfig();
  const logger = new ConsoleLogger({ level: config.logLevel, scope: 'ragtalk' });

  const store = await openStore(config);
  logger.debug(`Loaded index with ${store.size} chunk(s)`, { path: config.paths.indexPath });

  const completion = new OpenAICompletionClient({
    apiKey: config.openai.apiKey,
    model: config.openai.model,
    temperature: config.openai.temperature,
    maxTokens: config.openai.maxTokens,
  });

  const pipeline = new RAGPipeline(toPipelineConfig(config), {
    store,
    completion,
    logger: logger.child('pipeline'),
  });

  return { config, logger, store, pipeline };
}

async function ingest(session: Session, dir: string): Promise<void> {
  const { pipeline, store, logger, config } = session;
  const spinner = ora(`Ingesting documents from ${dir}...`).start();

  let summary: IngestSummary;
  try {
    summary = await ingestDirectory({
      pipeline,
      dir,
      known: store.sources(),
      logger: logger.child('ingest'),
    });
  } catch (error) {
    spinner.fail('Ingestion failed');
    throw error;
  }

  if (summary.ingested.length > 0) {
    await store.save(config.paths.indexPath);
  }

  const message =
    `${summary.ingested.length} new document(s), ${summary.chunks} chunk(s)` +
    (summary.skipped.length > 0 ? `, ${summary.skipped.length} already indexed` : '');

  if (summary.failed.length > 0) {
    spinner.warn(`${message}, ${summary.failed.length} failed`);
  } else {
    spinner.succeed(message);
  }
}

async function chat(session: Session, options: { save: boolean }): Promise<void> {
  const { pipeline, store, config } = session;

  if (store.size === 0) {
    console.log(chalk.yellow('The index is empty; answers will have no document context.'));
  }

  const resultsFile = options.save ? resultsFilePath(config.paths.resultsDir) : undefined;
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  console.log(chalk.dim("Ask a question, or type 'exit' to quit."));

  try {
    for (;;) {
      const question = (await rl.question(chalk.bold('\nYou: '))).trim();
      if (question === '') continue;
      if (EXIT_COMMANDS.has(question.toLowerCase())) break;

      const spinner = ora('Thinking...').start();
      try {
        const { answer, saveError } = await answerAndSave(pipeline, question, resultsFile);
        spinner.stop();

        console.log(`${chalk.bold.cyan('Assistant:')} ${answer.response}`);
        for (const source of formatSources(answer.sources)) {
          console.log(chalk.dim(`  - ${source}`));
        }

        if (saveError) {
          console.log(chalk.yellow(`Could not save results: ${saveError.message}`));
        }
      } catch (error) {
        if (!(error instanceof TurnError)) {
          spinner.fail('Unexpected error');
          throw error;
        }
        // The turn is dropped; the conversation continues
        spinner.fail(error.message);
      }
    }
  } finally {
    rl.close();
  }

  if (resultsFile) {
    console.log(chalk.dim(`Results saved to ${resultsFile}`));
  }
}

async function info(): Promise<void> {
  const config = loadConfig();
  const store = await openStore(config);
  const index = store.serialize();

  console.log(`Index: ${config.paths.indexPath}`);
  console.log(`  Version: ${index.version}`);
  console.log(`  Model: ${index.model}`);
  console.log(`  Dimensions: ${index.dimensions}`);
  console.log(`  Documents: ${store.documents().size}`);
  console.log(`  Chunks: ${store.size}`);
}

const program = new Command();

program.name('ragtalk').description('Chat with your documents').version('0.1.0');

program
  .command('ingest')
  .description('Index new documents from a directory')
  .argument('[dir]', 'Documents directory (default: configured docsDir)')
  .action(async (dir: string | undefined) => {
    const session = await openSession();
    await ingest(session, dir ?? session.config.paths.docsDir);
  });

program
  .command('chat')
  .description('Start an interactive conversation')
  .option('--no-ingest', 'Skip ingesting new documents first')
  .option('--save', 'Append every answer to a CSV file in the results directory')
  .action(async (options: { ingest: boolean; save?: boolean }) => {
    const session = await openSession();
    if (options.ingest) {
      await ingest(session, session.config.paths.docsDir);
    }
    await chat(session, { save: options.save ?? false });
  });

program
  .command('info')
  .description('Show information about the saved index')
  .action(info);

program.parseAsync().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`Error: ${message}`));
  process.exitCode = 1;
});
