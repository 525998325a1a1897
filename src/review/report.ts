import { compareIssues } from '../cache/records.js';
import type { MetricsSnapshot } from '../metrics/metrics.js';
import { normalizeSeverity } from '../tools/types.js';
import type { Issue, ReviewSummary } from '../types.js';

export const REPORT_VERSION = '1.0';

export interface CacheReportStats {
  enabled: boolean;
  loaded: boolean;
  saved: boolean;
  path: string;
  documentsSkipped: number;
  documentsPartial: number;
  documentsFull: number;
  linesReused: number;
  linesChecked: number;
  segmentsCached: number;
  segmentsFresh: number;
}

export interface FixSummary {
  formatted: string[];
  formatFailed: string[];
  fixedLines: number;
  annotatedLines: number;
}

export interface ReviewReport {
  version: string;
  summary: ReviewSummary;
  issues: Issue[];
  cache: CacheReportStats;
  metrics?: MetricsSnapshot;
  // Present when the run rewrote documents.
  fixes?: FixSummary;
}

export function normalizeIssue(issue: Issue): Issue {
  const normalized: Issue = {
    tool: issue.tool || 'unknown',
    type: issue.type || 'generic',
    file: issue.file,
    line: Number.isInteger(issue.line) && issue.line > 0 ? issue.line : 0,
    col: Number.isInteger(issue.col) && issue.col > 0 ? issue.col : 0,
    severity: normalizeSeverity(issue.severity),
    message: issue.message,
  };
  if (issue.code !== undefined) normalized.code = issue.code;
  if (issue.suggestion !== undefined) normalized.suggestion = issue.suggestion;
  if (issue.adjudication !== undefined) normalized.adjudication = issue.adjudication;
  if (issue.suppressed) {
    normalized.suppressed = true;
    if (issue.suppression) normalized.suppression = issue.suppression;
  }
  return normalized;
}

/**
 * An issue counts unless it is suppressed or an adjudication rejected it.
 */
export function isActive(issue: Issue): boolean {
  return !issue.suppressed && issue.adjudication?.accept !== false;
}

export function summarize(issues: readonly Issue[]): ReviewSummary {
  const summary: ReviewSummary = { errors: 0, warnings: 0, notes: 0 };
  for (const issue of issues) {
    if (!isActive(issue)) continue;
    if (issue.severity === 'error') {
      summary.errors++;
    } else if (issue.severity === 'warning') {
      summary.warnings++;
    } else {
      summary.notes++;
    }
  }
  return summary;
}

export function exitCodeFor(summary: ReviewSummary): number {
  if (summary.errors > 0) return 2;
  if (summary.warnings > 0) return 1;
  return 0;
}

export function buildReport(
  issues: readonly Issue[],
  cache: CacheReportStats,
  metrics?: MetricsSnapshot
): ReviewReport {
  const normalized = issues.map(normalizeIssue).sort(compareIssues);
  const report: ReviewReport = {
    version: REPORT_VERSION,
    summary: summarize(normalized),
    issues: normalized,
    cache,
  };
  if (metrics) report.metrics = metrics;
  return report;
}
