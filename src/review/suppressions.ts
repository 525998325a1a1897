import { findCommentStart } from '../segments/latex.js';
import type { Issue, SuppressionRule } from '../types.js';

const DIRECTIVE_PATTERN = /\bdraftlint:\s*(ignore-next-line|ignore-start|ignore-end|ignore-file)\b/i;

type Directive = 'ignore-next-line' | 'ignore-start' | 'ignore-end' | 'ignore-file';

export interface SuppressionRange {
  start: number;
  end: number;
  rule: SuppressionRule;
}

export interface DocumentSuppressions {
  ignoreFile: boolean;
  ranges: SuppressionRange[];
}

function parseDirective(line: string): Directive | null {
  const start = findCommentStart(line);
  if (start === -1) return null;
  const match = DIRECTIVE_PATTERN.exec(line.slice(start + 1));
  if (!match) return null;
  switch (match[1].toLowerCase()) {
    case 'ignore-next-line':
      return 'ignore-next-line';
    case 'ignore-start':
      return 'ignore-start';
    case 'ignore-end':
      return 'ignore-end';
    default:
      return 'ignore-file';
  }
}

/**
 * Collect `% draftlint: ...` directives. A block without `ignore-end` runs to
 * the last line; a stray `ignore-end` is ignored.
 */
export function scanSuppressions(lines: readonly string[]): DocumentSuppressions {
  const ranges: SuppressionRange[] = [];
  let ignoreFile = false;
  let blockStart: number | null = null;

  lines.forEach((line, index) => {
    const lineNumber = index + 1;
    switch (parseDirective(line)) {
      case 'ignore-file':
        ignoreFile = true;
        break;
      case 'ignore-next-line':
        ranges.push({ start: lineNumber + 1, end: lineNumber + 1, rule: 'ignore-next-line' });
        break;
      case 'ignore-start':
        if (blockStart === null) blockStart = lineNumber;
        break;
      case 'ignore-end':
        if (blockStart !== null) {
          ranges.push({ start: blockStart, end: lineNumber, rule: 'ignore-block' });
          blockStart = null;
        }
        break;
      case null:
        break;
    }
  });

  if (blockStart !== null) {
    ranges.push({ start: blockStart, end: lines.length, rule: 'ignore-block' });
  }

  return { ignoreFile, ranges };
}

export function matchSuppression(issue: Issue, suppressions: DocumentSuppressions): SuppressionRule | null {
  if (suppressions.ignoreFile) return 'ignore-file';
  if (issue.line <= 0) return null;
  const range = suppressions.ranges.find(r => r.start <= issue.line && issue.line <= r.end);
  return range ? range.rule : null;
}

/**
 * Flag suppressed issues. Issues of documents without an entry are returned
 * unflagged.
 */
export function applySuppressions(
  issues: readonly Issue[],
  suppressions: ReadonlyMap<string, DocumentSuppressions>
): Issue[] {
  return issues.map(issue => {
    const info = suppressions.get(issue.file);
    const rule = info ? matchSuppression(issue, info) : null;
    return rule ? { ...issue, suppressed: true, suppression: { rule } } : issue;
  });
}
