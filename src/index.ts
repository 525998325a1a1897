export { hashDocument, hashLine, hashSegment } from './cache/hasher.js';
export { detectLineChanges, linesNeedingCheck } from './cache/line-detector.js';
export { detectSegmentChanges } from './cache/segment-detector.js';
export { IncrementalMerger } from './cache/merger.js';
export type { DocumentPlan, MergeResult, MergeStats, PlanMode, SegmentReviewResult } from './cache/merger.js';
export { clearCache, loadCache, readCache, saveCache } from './cache/store.js';
export type { CacheLoadResult } from './cache/store.js';
export { summarizeSnapshot } from './cache/stats.js';
export { CACHE_VERSION, CacheFormatError, CacheWriteError } from './cache/types.js';
export type {
  CacheSnapshot,
  DocumentSnapshot,
  IssueRecord,
  LineClassification,
  LineChangeResult,
  LineRecord,
  SegmentClassification,
  SegmentRecord,
} from './cache/types.js';
export { loadConfig, parseConfig } from './config/loader.js';
export { DEFAULT_CONFIG } from './config/defaults.js';
export { ConfigError } from './config/types.js';
export type { DraftlintConfig, LLMProvider } from './config/types.js';
export { readDocument, toDocument } from './documents/reader.js';
export { discoverDocuments } from './documents/discovery.js';
export { extractSegments } from './segments/extract.js';
export { createDependencies, resolveTargets, runReview } from './pipeline/orchestrator.js';
export type { DocumentFormatter, ReviewDependencies, ReviewOptions, ReviewOutcome } from './pipeline/orchestrator.js';
export { createTextGenerator } from './llm/client.js';
export { OllamaClient, OpenAICompatibleClient } from './llm/local-clients.js';
export type { TextGenerator } from './llm/types.js';
export { annotateSuggestions, applyAdjudicatedFixes } from './review/fixer.js';
export { formatDocuments } from './tools/latexindent.js';
export { buildReport, summarize } from './review/report.js';
export type { FixSummary, ReviewReport } from './review/report.js';
export { describeFixes, formatMarkdown, formatText } from './output/formatter.js';
export type { Adjudication, Document, Issue, Segment, Severity } from './types.js';
