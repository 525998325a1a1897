#!/usr/bin/env node

import fs from 'fs/promises';
import path from 'path';
import { Command, Option } from 'commander';
import dotenv from 'dotenv';
import pc from 'picocolors';
import { summarizeSnapshot } from './cache/stats.js';
import { clearCache, readCache } from './cache/store.js';
import { loadConfig } from './config/loader.js';
import { ConfigError } from './config/types.js';
import { generateRunId, logger } from './observability/logger.js';
import { formatMarkdown, formatText } from './output/formatter.js';
import { createDependencies, resolveTargets, runReview } from './pipeline/orchestrator.js';
import { formatDocuments } from './tools/latexindent.js';

const EXIT_CONFIG_ERROR = 3;

interface ReviewCommandOptions {
  llm?: boolean;
  adjudicate?: boolean;
  fix?: boolean;
  annotate?: boolean;
  cache: boolean;
  json?: string;
  format: 'json' | 'text' | 'markdown';
  config?: string;
}

interface FixCommandOptions {
  config?: string;
}

interface CacheCommandOptions {
  config?: string;
}

function fail(error: unknown): never {
  if (error instanceof ConfigError) {
    console.error(pc.red('Configuration error:'), error.message);
    process.exit(EXIT_CONFIG_ERROR);
  }
  console.error(pc.red('Error:'), error instanceof Error ? error.message : error);
  process.exit(1);
}

async function review(files: string[], options: ReviewCommandOptions): Promise<number> {
  const root = process.cwd();
  const config = await loadConfig(root, options.config);
  const reviewOptions = {
    root,
    config,
    files,
    // Annotating replaces earlier annotations, so it needs this run's suggestions.
    llm: options.llm || options.annotate,
    adjudicate: options.adjudicate || options.fix,
    fix: options.fix,
    annotate: options.annotate,
    useCache: options.cache,
  };

  const deps = await createDependencies(reviewOptions);
  const { report, exitCode } = await runReview(reviewOptions, deps);
  const json = JSON.stringify(report, null, 2);

  if (options.json) {
    const target = path.resolve(root, options.json);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, `${json}\n`, 'utf-8');
  }

  if (options.format === 'json') {
    console.log(json);
  } else if (options.format === 'markdown') {
    console.log(formatMarkdown(report));
  } else {
    console.log(formatText(report, pc.isColorSupported));
  }

  return exitCode;
}

async function fix(files: string[], options: FixCommandOptions): Promise<number> {
  const root = process.cwd();
  const config = await loadConfig(root, options.config);
  const targets = await resolveTargets({ root, config, files });
  const result = await formatDocuments(targets, root, config.checks.configDir);

  for (const document of result.formatted) {
    console.log(pc.green('formatted'), document);
  }
  for (const document of result.failed) {
    console.log(pc.red('failed'), document);
  }
  console.log(pc.dim(`${result.formatted.length} formatted, ${result.failed.length} failed`));

  return result.failed.length > 0 ? 1 : 0;
}

async function cacheStats(options: CacheCommandOptions): Promise<void> {
  const root = process.cwd();
  const config = await loadConfig(root, options.config);
  const result = await readCache(path.resolve(root, config.cache.path));

  if (result.status === 'absent') {
    console.log(pc.dim('No usable cache:'), result.reason, result.detail ?? '');
    return;
  }

  const stats = summarizeSnapshot(result.snapshot);
  console.log(pc.dim('Cache:'), config.cache.path);
  console.log(pc.dim('Version:'), stats.version);
  console.log(pc.dim('Saved:'), stats.timestamp || '(unknown)');
  console.log(pc.dim('Documents:'), stats.documents);
  console.log(pc.dim('Lines:'), `${stats.lines} (${stats.lineIssues} issue(s))`);
  console.log(pc.dim('Segments:'), `${stats.segments} (${stats.segmentIssues} issue(s))`);
}

async function cacheClear(options: CacheCommandOptions): Promise<void> {
  const root = process.cwd();
  const config = await loadConfig(root, options.config);
  const removed = await clearCache(path.resolve(root, config.cache.path));
  console.log(removed ? pc.green('Cache cleared') : pc.dim('No cache to clear'));
}

dotenv.config();
logger.setContext({ runId: generateRunId(), root: process.cwd() });

const program = new Command();

program
  .name('draftlint')
  .description('Incremental review of LaTeX manuscripts with linters, LanguageTool and an LLM editor')
  .version('0.1.0');

program
  .command('review')
  .description('Check documents, reusing cached results for unchanged lines and segments')
  .argument('[files...]', 'Documents to review (default: discovered from the configuration)')
  .option('--llm', 'Run the LLM clarity review on changed segments')
  .option('--adjudicate', 'Ask the LLM to accept or reject checker findings')
  .option('--fix', 'Format with latexindent and apply fixes the adjudicator accepted (implies --adjudicate)')
  .option('--annotate', 'Write LLM suggestions into the documents as comments (implies --llm)')
  .option('--no-cache', 'Ignore the cache and recheck everything')
  .option('--json <path>', 'Also write the JSON report to a file')
  .addOption(new Option('--format <format>', 'Output format').choices(['json', 'text', 'markdown']).default('text'))
  .option('--config <path>', 'Configuration file')
  .action(async (files: string[], options: ReviewCommandOptions) => {
    logger.setContext({ runId: generateRunId(), root: process.cwd(), command: 'review' });
    try {
      process.exitCode = await review(files, options);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('fix')
  .description('Format documents in place with latexindent')
  .argument('[files...]', 'Documents to format (default: discovered from the configuration)')
  .option('--config <path>', 'Configuration file')
  .action(async (files: string[], options: FixCommandOptions) => {
    logger.setContext({ runId: generateRunId(), root: process.cwd(), command: 'fix' });
    try {
      process.exitCode = await fix(files, options);
    } catch (error) {
      fail(error);
    }
  });

const cache = program
  .command('cache')
  .description('Inspect or reset the review cache');

cache
  .command('stats')
  .description('Show what the cache holds')
  .option('--config <path>', 'Configuration file')
  .action(async (options: CacheCommandOptions) => {
    try {
      await cacheStats(options);
    } catch (error) {
      fail(error);
    }
  });

cache
  .command('clear')
  .description('Delete the cache file')
  .option('--config <path>', 'Configuration file')
  .action(async (options: CacheCommandOptions) => {
    try {
      await cacheClear(options);
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync(process.argv).catch(fail);
