#!/usr/bin/env node
/**
 * Knowledge drill - programmatic API and CLI
 *
 * Usage:
 *   - MCP server: node dist/src/mcp/server.js
 *   - CLI: knowledge-drill <command>
 */

import { readdir } from 'fs/promises';
import { realpathSync } from 'fs';
import { join, basename } from 'path';
import { pathToFileURL } from 'url';
import { createInterface } from 'readline/promises';
import { getIngestionService } from './core/ingestion/service.js';
import { getKnowledgeBaseService } from './core/knowledge-base/service.js';
import { getHistoryService, type HistoryPage } from './core/history/service.js';
import { getDrillService, type DrillService } from './core/drill/service.js';
import { formatEvaluation } from './core/drill/view.js';
import { isSupportedFile } from './core/ingestion/parsers/index.js';
import { ModelUnavailableError, QuestionGenerationError } from './core/errors.js';
import { closeDatabase } from './storage/sqlite.js';
import { sanitizeError } from './utils/security.js';
import {
  DIFFICULTIES,
  SELECTION_STRATEGIES,
  type Difficulty,
  type HistoryStatistics,
  type IngestionResult,
  type KnowledgeBase,
  type KnowledgeBaseStats,
  type Question,
  type SelectionStrategy,
} from './types/index.js';

export { getIngestionService } from './core/ingestion/service.js';
export { getKnowledgeBaseService } from './core/knowledge-base/service.js';
export { getHistoryService } from './core/history/service.js';
export { getDrillService, DrillService } from './core/drill/service.js';
export { ContentSelector } from './core/selection/selector.js';
export { QuestionPipeline } from './core/question/pipeline.js';
export { EvaluationPipeline } from './core/evaluation/pipeline.js';
export { sanitize as sanitizeModelResponse } from './core/llm/sanitizer.js';
export * from './core/errors.js';
export * from './types/index.js';

export interface BatchIndexResult {
  success: number;
  skipped: number;
  failed: number;
  errors: Array<{ file: string; error: string }>;
}

/**
 * High-level API over the drill services
 */
export class KnowledgeDrillClient {
  private knowledgeBases = getKnowledgeBaseService();
  private ingestionService = getIngestionService();

  createKnowledgeBase(name: string, description?: string): KnowledgeBase {
    return this.knowledgeBases.createKnowledgeBase(name, description);
  }

  listKnowledgeBases(): KnowledgeBase[] {
    return this.knowledgeBases.listKnowledgeBases();
  }

  getStats(kbName: string): KnowledgeBaseStats {
    return this.knowledgeBases.getStats(kbName);
  }

  async deleteKnowledgeBase(kbName: string): Promise<void> {
    await this.knowledgeBases.deleteKnowledgeBase(kbName);
  }

  async indexDocument(kbName: string, filepath: string, forceReindex = false): Promise<IngestionResult> {
    return this.ingestionService.indexDocument(kbName, filepath, { forceReindex });
  }

  /**
   * Index every supported file under `dirPath`
   */
  async batchIndex(
    kbName: string,
    dirPath: string,
    options: {
      recursive?: boolean;
      concurrency?: number;
      force?: boolean;
      onProgress?: (current: number, total: number, filename: string, status: IngestionResult['status']) => void;
    } = {}
  ): Promise<BatchIndexResult> {
    const { recursive = true, concurrency = 3, force = false, onProgress } = options;

    const files = (await collectFiles(dirPath, recursive)).filter(isSupportedFile);
    const result: BatchIndexResult = { success: 0, skipped: 0, failed: 0, errors: [] };
    let done = 0;

    for (let i = 0; i < files.length; i += concurrency) {
      const batch = files.slice(i, i + concurrency);
      const settled = await Promise.allSettled(
        batch.map(filepath => this.indexDocument(kbName, filepath, force))
      );

      settled.forEach((outcome, index) => {
        const filepath = batch[index] ?? '';
        done++;
        if (outcome.status === 'rejected') {
          result.failed++;
          result.errors.push({ file: filepath, error: sanitizeError(outcome.reason) });
          onProgress?.(done, files.length, basename(filepath), 'failed');
          return;
        }

        const status = outcome.value.status;
        if (status === 'failed') {
          result.failed++;
          result.errors.push({ file: filepath, error: outcome.value.error ?? 'Unknown error' });
        } else if (status === 'skipped') {
          result.skipped++;
        } else {
          result.success++;
        }
        onProgress?.(done, files.length, basename(filepath), status);
      });
    }

    return result;
  }

  getHistory(kbName: string, page = 1, onlyIncorrect = false): HistoryPage {
    return getHistoryService().getHistoryPage(kbName, { page, onlyIncorrect });
  }

  getStatistics(kbName: string): HistoryStatistics {
    return getHistoryService().getStatistics(kbName);
  }

  close(): void {
    closeDatabase();
  }
}

async function collectFiles(dirPath: string, recursive: boolean): Promise<string[]> {
  const files: string[] = [];
  const entries = await readdir(dirPath, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name);
    if (entry.isDirectory() && recursive) {
      files.push(...await collectFiles(fullPath, recursive));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }

  return files.sort();
}

export interface ParsedArgs {
  positional: string[];
  flags: Map<string, string | true>;
}

/**
 * `--name value` and bare `--flag` switches; everything else is positional
 */
export function parseArgs(args: string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    const name = arg.slice(2);
    const next = args[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      flags.set(name, next);
      i++;
    } else {
      flags.set(name, true);
    }
  }

  return { positional, flags };
}

function choiceFlag<T extends string>(parsed: ParsedArgs, name: string, choices: readonly T[]): T | undefined {
  const value = parsed.flags.get(name);
  if (value === undefined) {
    return undefined;
  }
  const match = choices.find(choice => choice === value);
  if (!match) {
    throw new Error(`--${name} must be one of ${choices.join(', ')}`);
  }
  return match;
}

export interface DrillIO {
  ask(prompt: string): Promise<string>;
  print(line: string): void;
}

export interface DrillLoopOptions {
  difficulty?: Difficulty;
  strategy?: SelectionStrategy;
  /** Stop after this many questions */
  limit?: number;
}

export interface DrillSummary {
  asked: number;
  answered: number;
  correct: number;
}

const QUIT_COMMANDS = new Set([':q', 'quit', 'exit']);

/**
 * Question/answer loop. An empty answer skips the question; `:q` ends the
 * session. Generation failures offer a retry, other errors propagate.
 */
export async function runDrill(
  drill: Pick<DrillService, 'nextQuestion' | 'submitAnswer'>,
  kbName: string,
  options: DrillLoopOptions,
  io: DrillIO
): Promise<DrillSummary> {
  const summary: DrillSummary = { asked: 0, answered: 0, correct: 0 };
  const limit = options.limit ?? Infinity;

  while (summary.asked < limit) {
    let question: Question;
    try {
      question = await drill.nextQuestion(kbName, {
        difficulty: options.difficulty,
        strategy: options.strategy,
      });
    } catch (error) {
      if (!(error instanceof QuestionGenerationError || error instanceof ModelUnavailableError)) {
        throw error;
      }
      io.print(error.message);
      const retry = (await io.ask('Try again? [Y/n] ')).trim().toLowerCase();
      if (retry === 'n' || QUIT_COMMANDS.has(retry)) {
        break;
      }
      continue;
    }

    summary.asked++;
    io.print('');
    io.print(`Q${summary.asked} [${question.difficulty}] ${question.content}`);
    if (question.background) {
      io.print(`(${question.background})`);
    }

    const answer = (await io.ask('> ')).trim();
    if (QUIT_COMMANDS.has(answer)) {
      break;
    }
    if (!answer) {
      io.print('Skipped.');
      continue;
    }

    const result = await drill.submitAnswer(question, answer);
    summary.answered++;
    if (result.evaluated && result.evaluation.isCorrect) {
      summary.correct++;
    }
    io.print(formatEvaluation(result.evaluation));
  }

  return summary;
}

const HELP = `
Knowledge drill CLI

Commands:
  create <kb> [description]        Create a knowledge base
  index <kb> <filepath> [--force]  Index a .txt or .md file
  index-dir <kb> <dir> [--force]   Index every supported file in a directory
  list                             List knowledge bases
  drill <kb>                       Start an interactive drill
    --difficulty easy|medium|hard
    --strategy random|diverse|recent|comprehensive
    --limit <n>                    Stop after n questions
  history <kb> [--page n] [--incorrect]
                                   Show answered questions
  stats <kb>                       Show knowledge base and answer statistics
  delete <kb>                      Delete a knowledge base and its history
  help                             Show this help message

MCP server:
  node dist/src/mcp/server.js
`;

function usage(line: string): never {
  console.error(`Usage: ${line}`);
  process.exit(1);
}

async function cli(): Promise<void> {
  const [command, ...rest] = process.argv.slice(2);
  const parsed = parseArgs(rest);
  const [first, second] = parsed.positional;

  const client = new KnowledgeDrillClient();

  try {
    switch (command) {
      case 'create': {
        if (!first) usage('create <kb> [description]');
        const description = parsed.positional.slice(1).join(' ') || undefined;
        const kb = client.createKnowledgeBase(first, description);
        console.log(`Created knowledge base "${kb.name}"`);
        break;
      }

      case 'index': {
        if (!first || !second) usage('index <kb> <filepath> [--force]');
        console.log(`Indexing: ${second}`);
        const result = await client.indexDocument(first, second, parsed.flags.has('force'));
        if (result.status === 'failed') {
          console.error(`Failed: ${result.error}`);
          process.exitCode = 1;
        } else if (result.status === 'skipped') {
          console.log(`Unchanged: ${result.chunkCount} chunks already indexed`);
        } else {
          console.log(`Success: ${result.chunkCount} chunks indexed`);
        }
        break;
      }

      case 'index-dir': {
        if (!first || !second) usage('index-dir <kb> <directory> [--force]');
        console.log(`Indexing directory: ${second}\n`);
        const startTime = Date.now();
        const result = await client.batchIndex(first, second, {
          force: parsed.flags.has('force'),
          onProgress: (current, total, filename, status) => {
            const icon = status === 'success' ? '✓' : status === 'failed' ? '✗' : '○';
            console.log(`[${current}/${total}] ${icon} ${filename}`);
          },
        });
        const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
        console.log(`\nCompleted in ${elapsed}s:`);
        console.log(`  Indexed: ${result.success}`);
        console.log(`  Unchanged: ${result.skipped}`);
        console.log(`  Failed: ${result.failed}`);
        if (result.errors.length > 0) {
          console.log('\nErrors:');
          for (const err of result.errors.slice(0, 10)) {
            console.log(`  - ${basename(err.file)}: ${err.error}`);
          }
          if (result.errors.length > 10) {
            console.log(`  ... and ${result.errors.length - 10} more`);
          }
        }
        break;
      }

      case 'list': {
        const knowledgeBases = client.listKnowledgeBases();
        if (knowledgeBases.length === 0) {
          console.log('No knowledge bases');
        } else {
          for (const kb of knowledgeBases) {
            console.log(`  ${kb.name} (${kb.documentCount} documents)${kb.description ? ` - ${kb.description}` : ''}`);
          }
        }
        break;
      }

      case 'drill': {
        if (!first) usage('drill <kb> [--difficulty d] [--strategy s] [--limit n]');
        const limitFlag = parsed.flags.get('limit');
        const limit = typeof limitFlag === 'string' ? parseInt(limitFlag, 10) : undefined;
        if (limit !== undefined && (isNaN(limit) || limit < 1)) usage('--limit <positive number>');

        const rl = createInterface({ input: process.stdin, output: process.stdout });
        try {
          console.log(`Drilling "${first}". Empty answer skips, :q quits.`);
          const summary = await runDrill(
            getDrillService(),
            first,
            {
              difficulty: choiceFlag(parsed, 'difficulty', DIFFICULTIES),
              strategy: choiceFlag(parsed, 'strategy', SELECTION_STRATEGIES),
              limit,
            },
            { ask: prompt => rl.question(prompt), print: line => console.log(line) }
          );
          console.log(`\nAnswered ${summary.answered} of ${summary.asked}, ${summary.correct} correct`);
        } finally {
          rl.close();
        }
        break;
      }

      case 'history': {
        if (!first) usage('history <kb> [--page n] [--incorrect]');
        const pageFlag = parsed.flags.get('page');
        const page = client.getHistory(
          first,
          typeof pageFlag === 'string' ? Math.max(1, parseInt(pageFlag, 10) || 1) : 1,
          parsed.flags.has('incorrect')
        );
        if (page.records.length === 0) {
          console.log('No answers recorded');
          break;
        }
        for (const record of page.records) {
          const grade = record.evaluated
            ? `${record.evaluation.isCorrect ? '✓' : '✗'} ${record.evaluation.score}/10`
            : 'ungraded';
          console.log(`[${record.createdAt.toISOString()}] ${grade} ${record.question}`);
          console.log(`    ${record.userAnswer}`);
        }
        console.log(`\nPage ${page.page} of ${page.totalPages} (${page.total} answers)`);
        break;
      }

      case 'stats': {
        if (!first) usage('stats <kb>');
        const kb = client.getStats(first);
        const history = client.getStatistics(first);
        console.log(`Knowledge base "${kb.name}":`);
        console.log(`  Documents: ${kb.documentCount}`);
        console.log(`  Chunks: ${kb.chunkCount}`);
        console.log(`  Answers: ${history.total} (${history.evaluated} graded)`);
        console.log(`  Accuracy: ${history.accuracy}%`);
        console.log(`  Average score: ${history.averageScore}`);
        for (const [bucket, count] of Object.entries(history.scoreDistribution)) {
          console.log(`    ${bucket.padEnd(6)} ${count}`);
        }
        break;
      }

      case 'delete': {
        if (!first) usage('delete <kb>');
        await client.deleteKnowledgeBase(first);
        console.log(`Deleted knowledge base "${first}"`);
        break;
      }

      case 'help':
      default: {
        console.log(HELP);
        break;
      }
    }
  } finally {
    client.close();
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    // bin links resolve to this file
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  cli().catch((error: unknown) => {
    console.error('Error:', sanitizeError(error));
    process.exit(1);
  });
}
