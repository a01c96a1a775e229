/**
 * Configuration loading for ragtalk
 *
 * Precedence, lowest first: defaults, JSON config file, environment.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { AbbreviationMap, PipelineConfig } from './types.js';
import { parseAbbreviationMap } from './abbreviations.js';
import { DEFAULT_COMPLETION_MODEL } from './completion.js';
import { DEFAULT_MODEL } from './embeddings.js';
import { ConfigurationError } from './errors.js';
import { LOG_LEVELS } from './logger.js';

export const CONFIG_FILE_NAME = 'ragtalk.config.json';

/** Abbreviation list shipped with the package */
export const BUNDLED_ABBREVIATIONS_PATH = fileURLToPath(
  new URL('../data/abbreviations.json', import.meta.url)
);

const booleanFlag = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0']).transform(v => v === 'true' || v === '1'),
]);

const configSchema = z
  .object({
    chunkSize: z.coerce.number().int().positive().default(500),
    chunkOverlap: z.coerce.number().int().nonnegative().default(50),
    boundaryTolerance: z.coerce.number().int().nonnegative().default(50),
    topK: z.coerce.number().int().positive().default(2),
    historyWindow: z.coerce.number().int().nonnegative().default(5),
    contextualizeQuestions: booleanFlag.default(false),
    abbreviationsPath: z.string().min(1).default(BUNDLED_ABBREVIATIONS_PATH),
    systemPrompt: z.string().min(1).optional(),
    embeddingModel: z.string().min(1).default(DEFAULT_MODEL),
    openai: z
      .object({
        apiKey: z.string().min(1).optional(),
        model: z.string().min(1).default(DEFAULT_COMPLETION_MODEL),
        temperature: z.coerce.number().min(0).max(2).default(0.1),
        maxTokens: z.coerce.number().int().positive().default(1000),
      })
      .default({}),
    paths: z
      .object({
        docsDir: z.string().min(1).default('docs'),
        indexPath: z.string().min(1).default('.ragtalk/index.json'),
        resultsDir: z.string().min(1).default('results'),
      })
      .default({}),
    logLevel: z.enum(LOG_LEVELS).default('info'),
  })
  .refine(config => config.chunkOverlap < config.chunkSize, {
    message: 'chunkOverlap must be less than chunkSize',
    path: ['chunkOverlap'],
  });

export type RagConfig = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

/** Environment variable → config path */
const ENV_KEYS: ReadonlyArray<[string, readonly string[]]> = [
  ['CHUNK_SIZE', ['chunkSize']],
  ['CHUNK_OVERLAP', ['chunkOverlap']],
  ['BOUNDARY_TOLERANCE', ['boundaryTolerance']],
  ['TOP_K', ['topK']],
  ['HISTORY_WINDOW', ['historyWindow']],
  ['CONTEXTUALIZE_QUESTIONS', ['contextualizeQuestions']],
  ['ABBREVIATIONS_PATH', ['abbreviationsPath']],
  ['SYSTEM_PROMPT', ['systemPrompt']],
  ['EMBEDDING_MODEL', ['embeddingModel']],
  ['OPENAI_API_KEY', ['openai', 'apiKey']],
  ['OPENAI_MODEL', ['openai', 'model']],
  ['OPENAI_TEMPERATURE', ['openai', 'temperature']],
  ['OPENAI_MAX_TOKENS', ['openai', 'maxTokens']],
  ['DOCS_DIR', ['paths', 'docsDir']],
  ['INDEX_PATH', ['paths', 'indexPath']],
  ['RESULTS_DIR', ['paths', 'resultsDir']],
  ['LOG_LEVEL', ['logLevel']],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setPath(target: Record<string, unknown>, path: readonly string[], value: string): void {
  let node = target;
  for (const key of path.slice(0, -1)) {
    const next = node[key];
    if (isRecord(next)) {
      node = next;
    } else {
      const created: Record<string, unknown> = {};
      node[key] = created;
      node = created;
    }
  }
  node[path[path.length - 1]] = value;
}

/**
 * Read the JSON config file, if any. An explicit RAGTALK_CONFIG must exist.
 */
function readConfigFile(env: Env, cwd: string): Record<string, unknown> {
  const explicit = env.RAGTALK_CONFIG;
  const path = resolve(cwd, explicit ?? CONFIG_FILE_NAME);

  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    if (!explicit && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new ConfigurationError(`Cannot read config file ${path}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Config file ${path} is not valid JSON`, { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Load and validate configuration
 */
export function loadConfig(options: { env?: Env; cwd?: string } = {}): RagConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const raw = structuredClone(readConfigFile(env, cwd));
  for (const [name, path] of ENV_KEYS) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      setPath(raw, path, value);
    }
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  const config = result.data;
  return {
    ...config,
    abbreviationsPath: resolve(cwd, config.abbreviationsPath),
    paths: {
      docsDir: resolve(cwd, config.paths.docsDir),
      indexPath: resolve(cwd, config.paths.indexPath),
      resultsDir: resolve(cwd, config.paths.resultsDir),
    },
  };
}

/**
 * Load the abbreviation mapping a config points at
 */
export function loadAbbreviations(path: string): AbbreviationMap {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read abbreviations file ${path}`, { cause: error });
  }

  try {
    return parseAbbreviationMap(JSON.parse(content));
  } catch (error) {
    if (error instanceof ConfigurationError) throw error;
    throw new ConfigurationError(`Abbreviations file ${path} is not valid JSON`, { cause: error });
  }
}

/**
 * Pipeline settings from a loaded config
 */
export function toPipelineConfig(config: RagConfig): PipelineConfig {
  return {
    chunkSize: config.chunkSize,
    overlap: config.chunkOverlap,
    boundaryTolerance: config.boundaryTolerance,
    topK: config.topK,
    historyWindow: config.historyWindow,
    contextualizeQuestions: config.contextualizeQuestions,
    systemPrompt: config.systemPrompt,
    abbreviations: loadAbbreviations(config.abbreviationsPath),
  };
}
