import path from 'path';
import { IncrementalMerger, type SegmentReviewResult } from '../cache/merger.js';
import { loadCache, saveCache } from '../cache/store.js';
import { CacheWriteError, type CacheSnapshot } from '../cache/types.js';
import { InMemorySemaphore } from '../concurrency/semaphore.js';
import type { DraftlintConfig } from '../config/types.js';
import { discoverDocuments } from '../documents/discovery.js';
import { readDocument, toDocumentKey } from '../documents/reader.js';
import { DocumentReadError } from '../documents/types.js';
import { Adjudicator } from '../llm/adjudicator.js';
import { createTextGenerator } from '../llm/client.js';
import { loadPromptOverride } from '../llm/prompts.js';
import { SegmentReviewer } from '../llm/reviewer.js';
import { RunMetrics } from '../metrics/metrics.js';
import { logger } from '../observability/logger.js';
import { annotateSuggestions, applyAdjudicatedFixes } from '../review/fixer.js';
import { buildReport, exitCodeFor, type FixSummary, type ReviewReport } from '../review/report.js';
import { applySuppressions, scanSuppressions } from '../review/suppressions.js';
import { extractSegments } from '../segments/extract.js';
import { createTools } from '../tools/index.js';
import { formatDocuments, type FormatResult } from '../tools/latexindent.js';
import { failureForAll, type CheckTool } from '../tools/types.js';
import type { Document, Issue, Segment } from '../types.js';

export interface ReviewOptions {
  root: string;
  config: DraftlintConfig;
  // Documents to review; discovered from the configured paths when empty.
  files?: string[];
  llm?: boolean;
  adjudicate?: boolean;
  useCache?: boolean;
  // Format with latexindent first, then apply accepted adjudication fixes.
  fix?: boolean;
  // Write LLM suggestions into the documents as comments.
  annotate?: boolean;
}

export type DocumentFormatter = (paths: readonly string[]) => Promise<FormatResult>;

export interface ReviewDependencies {
  tools: CheckTool[];
  reviewer?: SegmentReviewer;
  adjudicator?: Adjudicator;
  semaphore?: InMemorySemaphore;
  formatter?: DocumentFormatter;
}

export interface ReviewOutcome {
  report: ReviewReport;
  exitCode: number;
  snapshot: CacheSnapshot;
}

function groupByFile(issues: readonly Issue[]): Map<string, Issue[]> {
  const grouped = new Map<string, Issue[]>();
  for (const issue of issues) {
    const bucket = grouped.get(issue.file);
    if (bucket) {
      bucket.push(issue);
    } else {
      grouped.set(issue.file, [issue]);
    }
  }
  return grouped;
}

/**
 * Wire the production collaborators: enabled checkers, latexindent for
 * `fix`, and the configured LLM client behind one semaphore when LLM review
 * or adjudication is requested.
 */
export async function createDependencies(options: ReviewOptions): Promise<ReviewDependencies> {
  const { llm, checks, languages } = options.config;
  const deps: ReviewDependencies = { tools: createTools(checks) };
  if (options.fix && checks.latexindent) {
    deps.formatter = paths => formatDocuments(paths, options.root, checks.configDir);
  }
  if (!options.llm && !options.adjudicate) {
    return deps;
  }

  const client = createTextGenerator(llm);
  const semaphore = new InMemorySemaphore(llm.maxConcurrent);
  const configDir = path.resolve(options.root, checks.configDir);
  deps.semaphore = semaphore;

  if (options.llm) {
    const prompt = await loadPromptOverride(configDir, 'prompt_clarity', languages.primary);
    deps.reviewer = new SegmentReviewer(client, semaphore, prompt ?? undefined);
  }
  if (options.adjudicate) {
    const prompt = await loadPromptOverride(configDir, 'prompt_adjudicate', languages.primary);
    deps.adjudicator = new Adjudicator(client, semaphore, prompt ?? undefined);
  }
  return deps;
}

export async function resolveTargets(options: Pick<ReviewOptions, 'root' | 'config' | 'files'>): Promise<string[]> {
  if (options.files && options.files.length > 0) {
    return [...new Set(options.files.map(file => toDocumentKey(options.root, file)))].sort();
  }
  return discoverDocuments(options.root, options.config.paths);
}

async function runTools(
  tools: readonly CheckTool[],
  documents: readonly Document[],
  options: ReviewOptions
): Promise<Issue[]> {
  if (documents.length === 0) return [];

  const issues: Issue[] = [];
  for (const tool of tools) {
    try {
      issues.push(...await tool.run(documents, { root: options.root, config: options.config }));
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'Unknown error';
      logger.error('tool_execution', `${tool.name} crashed`, { error: reason });
      issues.push(...failureForAll(tool.name, documents, `${tool.name} failed: ${reason}`));
    }
  }
  return issues;
}

// A formatter that cannot start fails every target; the review still runs.
async function formatTargets(formatter: DocumentFormatter, targets: string[]): Promise<FormatResult> {
  try {
    return await formatter(targets);
  } catch (error) {
    logger.error('format', 'Formatter unavailable', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    return { formatted: [], failed: [...targets] };
  }
}

async function rewriteDocuments(
  options: ReviewOptions,
  issues: readonly Issue[],
  documents: readonly Document[],
  formatted: FormatResult
): Promise<FixSummary> {
  const fixedLines = options.fix ? await applyAdjudicatedFixes(options.root, issues) : 0;
  const annotatedLines = options.annotate
    ? await annotateSuggestions(options.root, issues, documents.map(document => document.path))
    : 0;
  return {
    formatted: formatted.formatted,
    formatFailed: formatted.failed,
    fixedLines,
    annotatedLines,
  };
}

/**
 * One incremental review run: plan against the cache, check only what
 * changed, merge, suppress, adjudicate, persist and report. With `fix` or
 * `annotate` the documents are rewritten after the cache is saved, so the
 * rewritten lines count as changed next time.
 */
export async function runReview(options: ReviewOptions, deps: ReviewDependencies): Promise<ReviewOutcome> {
  const useCache = options.useCache ?? true;
  const runLLM = Boolean(options.llm && deps.reviewer);
  const cachePath = path.resolve(options.root, options.config.cache.path);
  const metrics = new RunMetrics();

  if (options.llm && !deps.reviewer) {
    logger.warn('review', 'LLM review requested without a reviewer, skipping');
  }

  const previous = useCache ? await loadCache(cachePath) : null;
  const merger = new IncrementalMerger(previous);
  const targets = await resolveTargets(options);
  const formatted = options.fix && deps.formatter
    ? await formatTargets(deps.formatter, targets)
    : { formatted: [], failed: [] };

  logger.info('review', 'Review started', {
    documents: targets.length,
    cacheLoaded: previous !== null,
    llm: runLLM,
    adjudicate: Boolean(options.adjudicate && deps.adjudicator),
  });

  const documents: Document[] = [];
  for (const target of targets) {
    try {
      documents.push(await readDocument(options.root, target));
    } catch (error) {
      if (!(error instanceof DocumentReadError)) throw error;
      logger.warn('document_read', 'Skipping unreadable document', {
        document: error.documentPath,
        reason: error.reason,
      });
      metrics.recordUnreadable();
    }
  }

  const toCheck = documents.filter(document => merger.prepare(document).linesToCheck.size > 0);
  const freshIssues = await runTools(deps.tools, toCheck, options);
  metrics.recordToolFailures(freshIssues.filter(issue => issue.type === 'tool_failure').length);
  const freshByFile = groupByFile(freshIssues);

  const freshSegments: Segment[] = [];
  for (const document of documents) {
    const segments = extractSegments(document, options.config.segments);
    freshSegments.push(...merger.needsReview(document.path, segments));
  }

  let segmentResults: SegmentReviewResult[] | null = null;
  if (runLLM && deps.reviewer) {
    segmentResults = await deps.reviewer.review(freshSegments);
    metrics.recordReviewUsage(deps.reviewer.getUsage());
  }

  const issues: Issue[] = [];
  for (const document of documents) {
    const result = merger.mergeAndSnapshot(document.path, freshByFile.get(document.path) ?? [], segmentResults);
    metrics.recordMerge(result.stats, document.lines.length, merger.needsCheck(document.path).size);

    const suppressions = new Map([[document.path, scanSuppressions(document.lines)]]);
    let documentIssues = applySuppressions(result.issues, suppressions);

    if (options.adjudicate && deps.adjudicator) {
      const adjudicated = await deps.adjudicator.adjudicate(documentIssues, document);
      const replaced = new Map<Issue, Issue>();
      documentIssues.forEach((issue, index) => {
        if (adjudicated[index] !== issue) replaced.set(issue, adjudicated[index]);
      });
      if (replaced.size > 0) {
        merger.replaceLineIssues(document.path, result.lineIssues.map(issue => replaced.get(issue) ?? issue));
      }
      documentIssues = adjudicated;
    }

    issues.push(...documentIssues);
  }

  if (deps.adjudicator) {
    metrics.recordAdjudicationUsage(deps.adjudicator.getUsage());
  }

  const processed = new Set(targets);
  const retain = previous ? [...previous.documents.keys()].filter(key => !processed.has(key)) : [];
  let snapshot = merger.buildSnapshot(retain);

  let saved = false;
  try {
    snapshot = await saveCache(snapshot, cachePath);
    saved = true;
  } catch (error) {
    if (!(error instanceof CacheWriteError)) throw error;
    logger.error('cache_save', 'Cache could not be written, report is unaffected', {
      cachePath,
      error: error.message,
    });
  }

  const metricsSnapshot = metrics.snapshot(deps.semaphore);
  const report = buildReport(issues, {
    enabled: useCache,
    loaded: previous !== null,
    saved,
    path: options.config.cache.path,
    documentsSkipped: metricsSnapshot.documents.skipped,
    documentsPartial: metricsSnapshot.documents.partial,
    documentsFull: metricsSnapshot.documents.full,
    linesReused: metricsSnapshot.lines.reused,
    linesChecked: metricsSnapshot.lines.checked,
    segmentsCached: metricsSnapshot.segments.cached,
    segmentsFresh: metricsSnapshot.segments.fresh,
  }, metricsSnapshot);

  if (options.fix || options.annotate) {
    report.fixes = await rewriteDocuments(options, report.issues, documents, formatted);
  }

  logger.info('review', 'Review complete', {
    summary: report.summary,
    issues: report.issues.length,
    metrics: metricsSnapshot,
  });

  return { report, exitCode: exitCodeFor(report.summary), snapshot };
}
