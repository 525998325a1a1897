import type { Issue, Severity } from '../types.js';
import type { IssueRecord } from './types.js';

const SEVERITIES: readonly Severity[] = ['error', 'warning', 'note'];

export function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && (SEVERITIES as readonly string[]).includes(value);
}

/**
 * Strip the position fields from an issue so it can be stored under a
 * line or segment record.
 */
export function toIssueRecord(issue: Issue): IssueRecord {
  const record: IssueRecord = {
    tool: issue.tool,
    type: issue.type,
    col: issue.col,
    severity: issue.severity,
    message: issue.message,
  };
  if (issue.code !== undefined) record.code = issue.code;
  if (issue.suggestion !== undefined) record.suggestion = issue.suggestion;
  if (issue.adjudication !== undefined) record.adjudication = { ...issue.adjudication };
  return record;
}

export function toIssue(record: IssueRecord, file: string, line: number): Issue {
  const issue: Issue = {
    tool: record.tool,
    type: record.type,
    file,
    line,
    col: record.col,
    severity: record.severity,
    message: record.message,
  };
  if (record.code !== undefined) issue.code = record.code;
  if (record.suggestion !== undefined) issue.suggestion = record.suggestion;
  if (record.adjudication !== undefined) issue.adjudication = { ...record.adjudication };
  return issue;
}

/**
 * Report order: file, line, column, then tool and message so that equal
 * inputs always produce the same sequence.
 */
export function compareIssues(a: Issue, b: Issue): number {
  if (a.file !== b.file) return a.file < b.file ? -1 : 1;
  if (a.line !== b.line) return a.line - b.line;
  if (a.col !== b.col) return a.col - b.col;
  if (a.tool !== b.tool) return a.tool < b.tool ? -1 : 1;
  if (a.type !== b.type) return a.type < b.type ? -1 : 1;
  if (a.message !== b.message) return a.message < b.message ? -1 : 1;
  return 0;
}
