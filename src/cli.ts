#!/usr/bin/env node
/**
 * Hybrid Search CLI
 *
 * Usage:
 *   hybrid-search search <query> [--blend weighted|rrf] [--top-n N] [--k N] [--rerank] [--json]
 *   hybrid-search eval --queries PATH [--top-n N] [--blend weighted|rrf] [--rerank] [--compare]
 *   hybrid-search ingest --input PATH [--input PATH ...]
 *   hybrid-search stats
 *
 * Every command also takes --db NAME and --config PATH.
 * Results go to stdout; logs and errors go to stderr.
 * Exit codes: 0 success, 1 fatal error, 2 usage error.
 *
 * @module cli
 */

import dotenv from 'dotenv';
import { parseArgs, type ParseArgsConfig } from 'util';
import { fileURLToPath } from 'url';
import { realpathSync } from 'fs';

import { MCPError } from './server/index.js';
import {
  Bm25LexicalSource,
  configForRequest,
  createEvaluationVariants,
  createHybridSearch,
  evaluateVariants,
  loadJudgments,
  loadSearchConfig,
  type CrossEncoder,
  type HybridSearchServices,
  type SearchConfig,
  type SearchOverrides,
} from './services/search/index.js';
import { DatabaseService, VectorService } from './services/storage/index.js';
import { HashingEmbedder } from './services/embedding/index.js';
import { readCorpus, ingestDocuments } from './services/ingestion/index.js';
import { presentResponse } from './tools/index.js';
import { BlendMode } from './utils/index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage:
  hybrid-search search <query> [--blend weighted|rrf] [--top-n N] [--k N] [--rrf-k N]
                               [--w-lexical X] [--w-vector X] [--rerank] [--json]
  hybrid-search eval --queries PATH [--top-n N] [--k N] [--blend weighted|rrf] [--rerank]
                     [--compare] [--concurrency N]
  hybrid-search ingest --input PATH [--input PATH ...]
  hybrid-search stats

Common options: --db NAME  --config PATH`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

interface CommonArgs {
  db?: string;
  configPath?: string;
}

export type CliCommand =
  | ({ command: 'search'; query: string; json: boolean; overrides: SearchOverrides } & CommonArgs)
  | ({
      command: 'eval';
      queriesPath: string;
      compare: boolean;
      concurrency: number;
      overrides: SearchOverrides;
    } & CommonArgs)
  | ({ command: 'ingest'; inputs: string[] } & CommonArgs)
  | ({ command: 'stats' } & CommonArgs)
  | { command: 'help' };

const COMMON_OPTIONS = {
  db: { type: 'string' },
  config: { type: 'string' },
} as const;

const TUNING_OPTIONS = {
  blend: { type: 'string' },
  'top-n': { type: 'string' },
  k: { type: 'string' },
  rerank: { type: 'boolean' },
} as const;

function toInteger(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new UsageError(`--${flag} must be an integer, got "${value}"`);
  }
  return parsed;
}

function toNumber(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new UsageError(`--${flag} must be a number, got "${value}"`);
  }
  return parsed;
}

function toBlend(value: string | undefined): BlendMode | undefined {
  if (value === undefined) return undefined;
  const result = BlendMode.safeParse(value);
  if (!result.success) {
    throw new UsageError(`--blend must be weighted or rrf, got "${value}"`);
  }
  return result.data;
}

function common(values: { db?: string; config?: string }): CommonArgs {
  const args: CommonArgs = {};
  if (values.db !== undefined) args.db = values.db;
  if (values.config !== undefined) args.configPath = values.config;
  return args;
}

function parseWith<T extends ParseArgsConfig>(config: T): ReturnType<typeof parseArgs<T>> {
  try {
    return parseArgs(config);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parse argv (without the node and script entries) into a command
 *
 * @throws UsageError for an unknown command, an unknown flag or a malformed value
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;

  switch (command) {
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      return { command: 'help' };

    case 'search': {
      const { values, positionals } = parseWith({
        args: rest,
        allowPositionals: true,
        strict: true,
        options: {
          ...COMMON_OPTIONS,
          ...TUNING_OPTIONS,
          'rrf-k': { type: 'string' },
          'w-lexical': { type: 'string' },
          'w-vector': { type: 'string' },
          json: { type: 'boolean' },
        },
      });
      const query = positionals.join(' ').trim();
      if (query.length === 0) {
        throw new UsageError('search requires a query');
      }
      return {
        command: 'search',
        query,
        json: values.json ?? false,
        overrides: {
          blend: toBlend(values.blend),
          top_n: toInteger('top-n', values['top-n']),
          candidate_pool: toInteger('k', values.k),
          rrf_k: toInteger('rrf-k', values['rrf-k']),
          lexical_weight: toNumber('w-lexical', values['w-lexical']),
          vector_weight: toNumber('w-vector', values['w-vector']),
          rerank: values.rerank,
        },
        ...common(values),
      };
    }

    case 'eval': {
      const { values } = parseWith({
        args: rest,
        strict: true,
        options: {
          ...COMMON_OPTIONS,
          ...TUNING_OPTIONS,
          queries: { type: 'string' },
          compare: { type: 'boolean' },
          concurrency: { type: 'string' },
        },
      });
      if (values.queries === undefined) {
        throw new UsageError('eval requires --queries PATH');
      }
      const concurrency = toInteger('concurrency', values.concurrency) ?? 1;
      if (concurrency < 1) {
        throw new UsageError(`--concurrency must be at least 1, got ${concurrency}`);
      }
      return {
        command: 'eval',
        queriesPath: values.queries,
        compare: values.compare ?? false,
        concurrency,
        overrides: {
          blend: toBlend(values.blend),
          top_n: toInteger('top-n', values['top-n']),
          candidate_pool: toInteger('k', values.k),
          rerank: values.rerank,
        },
        ...common(values),
      };
    }

    case 'ingest': {
      const { values } = parseWith({
        args: rest,
        strict: true,
        options: { ...COMMON_OPTIONS, input: { type: 'string', multiple: true } },
      });
      if (!values.input || values.input.length === 0) {
        throw new UsageError('ingest requires at least one --input PATH');
      }
      return { command: 'ingest', inputs: values.input, ...common(values) };
    }

    case 'stats': {
      const { values } = parseWith({ args: rest, strict: true, options: COMMON_OPTIONS });
      return { command: 'stats', ...common(values) };
    }

    default:
      throw new UsageError(`Unknown command "${command}"`);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════════

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  /** Receives each line of command output */
  out?: (line: string) => void;
  /** Replaces the Gemini cross-encoder */
  crossEncoder?: CrossEncoder;
}

function openServices(config: SearchConfig): HybridSearchServices {
  const embedder = new HashingEmbedder(config.embedding.dimensions);
  const db = DatabaseService.open(config.database, config.storagePath, embedder);
  const conn = db.getConnection();
  return { db, lexical: new Bm25LexicalSource(conn), vector: new VectorService(conn), embedder };
}

function formatScore(score: number): string {
  return score.toFixed(4);
}

async function runSearch(
  cmd: Extract<CliCommand, { command: 'search' }>,
  config: SearchConfig,
  options: RunOptions,
  out: (line: string) => void
): Promise<void> {
  const requestConfig = configForRequest(config, cmd.overrides);
  const services = openServices(requestConfig);
  try {
    const pipeline = createHybridSearch(services, requestConfig, { crossEncoder: options.crossEncoder });
    const response = presentResponse(services.db, await pipeline(cmd.query));

    if (cmd.json) {
      out(JSON.stringify(response, null, 2));
      return;
    }
    for (const failure of response.degraded_sources) {
      console.error(`[WARN] ${failure.source} source unavailable: ${failure.reason}`);
    }
    if (response.results.length === 0) {
      out('No results.');
      return;
    }
    for (const item of response.results) {
      const raw = Object.entries(item.raw_scores)
        .map(([source, value]) => `${source}=${formatScore(value)}`)
        .join(' ');
      out(`${item.rank}. ${item.doc_id}  score=${formatScore(item.score)}  [${raw}]  ${item.title ?? ''}`.trimEnd());
    }
  } finally {
    services.db.close();
  }
}

async function runEval(
  cmd: Extract<CliCommand, { command: 'eval' }>,
  config: SearchConfig,
  options: RunOptions,
  out: (line: string) => void
): Promise<void> {
  const requestConfig = configForRequest(config, cmd.overrides);
  const judgments = await loadJudgments(cmd.queriesPath);
  const services = openServices(requestConfig);
  try {
    const variants = createEvaluationVariants(services, requestConfig, {
      compare: cmd.compare,
      crossEncoder: options.crossEncoder,
    });
    const results = await evaluateVariants(judgments, variants, requestConfig.topN, {
      concurrency: cmd.concurrency,
    });
    for (const [name, result] of Object.entries(results)) {
      const { mrr_at_n, recall_at_n, n, flagged_queries } = result.aggregate;
      console.error(
        `[INFO] ${name}: MRR@${n}=${formatScore(mrr_at_n)} Recall@${n}=${formatScore(recall_at_n)} flagged=${flagged_queries}`
      );
    }
    out(JSON.stringify({ n: requestConfig.topN, judgments: judgments.length, variants: results }, null, 2));
  } finally {
    services.db.close();
  }
}

async function runIngest(
  cmd: Extract<CliCommand, { command: 'ingest' }>,
  config: SearchConfig,
  out: (line: string) => void
): Promise<void> {
  const corpus = await readCorpus(cmd.inputs);
  const embedder = new HashingEmbedder(config.embedding.dimensions);
  const db = DatabaseService.exists(config.database, config.storagePath)
    ? DatabaseService.open(config.database, config.storagePath, embedder)
    : DatabaseService.create(config.database, embedder, undefined, config.storagePath);
  try {
    const result = await ingestDocuments(db, new VectorService(db.getConnection()), embedder, corpus.documents);
    for (const skipped of corpus.skipped) {
      console.error(`[WARN] ${skipped.file}:${skipped.line}: ${skipped.reason}`);
    }
    out(
      JSON.stringify(
        {
          database_name: config.database,
          files: corpus.files,
          records_read: corpus.records_read,
          duplicates: corpus.duplicates,
          skipped: corpus.skipped.length,
          ...result,
        },
        null,
        2
      )
    );
  } finally {
    db.close();
  }
}

function runStats(config: SearchConfig, out: (line: string) => void): void {
  const db = DatabaseService.open(config.database, config.storagePath);
  try {
    out(JSON.stringify(db.getStats(), null, 2));
  } finally {
    db.close();
  }
}

/**
 * Run one CLI invocation
 *
 * @returns the process exit code
 */
export async function run(argv: readonly string[], options: RunOptions = {}): Promise<number> {
  const out = options.out ?? ((line: string) => process.stdout.write(`${line}\n`));

  let cmd: CliCommand;
  try {
    cmd = parseCliArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(`[ERROR] ${error.message}`);
    console.error(USAGE);
    return EXIT_USAGE;
  }

  if (cmd.command === 'help') {
    out(USAGE);
    return EXIT_OK;
  }

  try {
    const config = loadSearchConfig({
      configPath: cmd.configPath,
      env: options.env,
      overrides: cmd.db === undefined ? undefined : { database: cmd.db },
    });

    switch (cmd.command) {
      case 'search':
        await runSearch(cmd, config, options, out);
        break;
      case 'eval':
        await runEval(cmd, config, options, out);
        break;
      case 'ingest':
        await runIngest(cmd, config, out);
        break;
      case 'stats':
        runStats(config, out);
        break;
    }
    return EXIT_OK;
  } catch (error) {
    const mcpError = MCPError.fromUnknown(error);
    console.error(`[ERROR] ${mcpError.category}: ${mcpError.message}`);
    return EXIT_ERROR;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN
// ═══════════════════════════════════════════════════════════════════════════════

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch (error) {
    console.error(`[WARN] Could not resolve entry script: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }
}

if (isEntryPoint()) {
  dotenv.config();
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exitCode = EXIT_ERROR;
    });
}
