import fs from 'fs/promises';
import path from 'path';
import { splitLines } from '../documents/reader.js';
import { logger } from '../observability/logger.js';
import type { Issue } from '../types.js';

export const FIX_MARKER = 'draftlint-fix';
export const ANNOTATION_MARKER = 'draftlint-llm';

const MAX_COMMENT_LENGTH = 160;
const ANNOTATION_SUFFIX = new RegExp(`\\s*%\\s*${ANNOTATION_MARKER}:.*$`);

function sanitize(text: string | undefined): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

function truncate(text: string): string {
  if (text.length <= MAX_COMMENT_LENGTH) return text;
  return `${text.slice(0, MAX_COMMENT_LENGTH - 1).trimEnd()}…`;
}

function groupByFileAndLine(issues: readonly Issue[]): Map<string, Map<number, Issue[]>> {
  const grouped = new Map<string, Map<number, Issue[]>>();
  for (const issue of issues) {
    let byLine = grouped.get(issue.file);
    if (!byLine) {
      byLine = new Map();
      grouped.set(issue.file, byLine);
    }
    const bucket = byLine.get(issue.line);
    if (bucket) {
      bucket.push(issue);
    } else {
      byLine.set(issue.line, [issue]);
    }
  }
  return grouped;
}

export function isApplicableFix(issue: Issue): boolean {
  return !issue.suppressed
    && issue.line > 0
    && issue.adjudication?.accept === true
    && sanitize(issue.adjudication?.fix).length > 0
    && !/[\r\n]/.test(issue.adjudication?.fix ?? '');
}

export function isAnnotatable(issue: Issue): boolean {
  return !issue.suppressed
    && issue.line > 0
    && issue.tool === 'llm'
    && issue.type !== 'tool_failure';
}

/**
 * Replace each line that has an accepted adjudication fix with the fix and a
 * trailing marker comment. The first fix of a line wins. Returns the number
 * of lines replaced.
 */
export function applyFixesToLines(lines: string[], fixes: ReadonlyMap<number, readonly Issue[]>): number {
  let replaced = 0;
  for (const [lineNumber, issues] of fixes) {
    if (lineNumber < 1 || lineNumber > lines.length) continue;
    const adjudication = issues[0]?.adjudication;
    const fix = adjudication?.fix?.trim();
    if (!fix) continue;

    const indent = /^\s*/.exec(lines[lineNumber - 1])?.[0] ?? '';
    const comment = truncate(sanitize(adjudication?.comment) || 'fixed');
    lines[lineNumber - 1] = `${indent}${fix} % ${FIX_MARKER}: ${comment}`;
    replaced++;
  }
  return replaced;
}

/**
 * Drop earlier LLM annotations from every line, then append the suggestions
 * of this run as a trailing comment. Returns the number of annotated lines.
 */
export function annotateLines(lines: string[], suggestions: ReadonlyMap<number, readonly Issue[]>): number {
  for (let i = 0; i < lines.length; i++) {
    lines[i] = lines[i].replace(ANNOTATION_SUFFIX, '');
  }

  let annotated = 0;
  for (const [lineNumber, issues] of suggestions) {
    if (lineNumber < 1 || lineNumber > lines.length) continue;
    const parts = issues
      .map(issue => truncate(sanitize(issue.suggestion) || sanitize(issue.message)))
      .filter(text => text.length > 0);
    if (parts.length === 0) continue;

    lines[lineNumber - 1] = `${lines[lineNumber - 1]} % ${ANNOTATION_MARKER}: ${parts.join(' | ')}`;
    annotated++;
  }
  return annotated;
}

async function rewriteDocument(
  root: string,
  file: string,
  edit: (lines: string[]) => number
): Promise<number> {
  const target = path.resolve(root, file);
  const content = await fs.readFile(target, 'utf-8');
  const lines = splitLines(content);
  const count = edit(lines);

  const eol = content.includes('\r\n') ? '\r\n' : '\n';
  const trailing = /(\r\n|\r|\n)$/.test(content) ? eol : '';
  const updated = lines.join(eol) + trailing;

  if (updated !== content) {
    await fs.writeFile(target, updated, 'utf-8');
    logger.info('fix', 'Document rewritten', { document: file, lines: count });
  }
  return count;
}

export async function applyAdjudicatedFixes(root: string, issues: readonly Issue[]): Promise<number> {
  let total = 0;
  for (const [file, fixes] of groupByFileAndLine(issues.filter(isApplicableFix))) {
    total += await rewriteDocument(root, file, lines => applyFixesToLines(lines, fixes));
  }
  return total;
}

/**
 * Annotate LLM suggestions in `files`. Every listed file loses its previous
 * annotations, including files without suggestions this run.
 */
export async function annotateSuggestions(
  root: string,
  issues: readonly Issue[],
  files: readonly string[]
): Promise<number> {
  const grouped = groupByFileAndLine(issues.filter(isAnnotatable));
  let total = 0;
  for (const file of files) {
    const suggestions = grouped.get(file) ?? new Map<number, Issue[]>();
    total += await rewriteDocument(root, file, lines => annotateLines(lines, suggestions));
  }
  return total;
}
