import { describe, expect, it } from 'vitest';
import type { Issue } from '../types.js';
import { applySuppressions, scanSuppressions } from './suppressions.js';

function issueAt(line: number): Issue {
  return { tool: 'vale', type: 'style', file: 'a.tex', line, col: 1, severity: 'warning', message: 'Avoid "very".' };
}

describe('scanSuppressions', () => {
  it('reads next-line and block directives from comments', () => {
    const lines = [
      'Intro.',
      '% draftlint: ignore-next-line',
      'Skipped line.',
      '% draftlint: ignore-start',
      'Block line.',
      '% draftlint: ignore-end',
      'Checked line.',
    ];

    expect(scanSuppressions(lines)).toEqual({
      ignoreFile: false,
      ranges: [
        { start: 3, end: 3, rule: 'ignore-next-line' },
        { start: 4, end: 6, rule: 'ignore-block' },
      ],
    });
  });

  it('runs an unterminated block to the last line', () => {
    expect(scanSuppressions(['a', '%draftlint: IGNORE-START', 'b', 'c']).ranges).toEqual([
      { start: 2, end: 4, rule: 'ignore-block' },
    ]);
  });

  it('ignores directives outside comments', () => {
    expect(scanSuppressions(['Write draftlint: ignore-file in prose', '50\\% draftlint: ignore-file'])).toEqual({
      ignoreFile: false,
      ranges: [],
    });
  });

  it('recognises a whole-file directive after text', () => {
    expect(scanSuppressions(['Text. % draftlint: ignore-file']).ignoreFile).toBe(true);
  });
});

describe('applySuppressions', () => {
  const suppressions = new Map([['a.tex', scanSuppressions(['% draftlint: ignore-next-line', 'Quiet.', 'Loud.'])]]);

  it('flags matching issues and leaves the rest untouched', () => {
    const loud = issueAt(3);
    const result = applySuppressions([issueAt(2), loud], suppressions);

    expect(result[0]).toEqual({ ...issueAt(2), suppressed: true, suppression: { rule: 'ignore-next-line' } });
    expect(result[1]).toBe(loud);
  });

  it('suppresses document-level issues only for ignore-file', () => {
    expect(applySuppressions([issueAt(0)], suppressions)[0].suppressed).toBeUndefined();

    const ignored = new Map([['a.tex', scanSuppressions(['% draftlint: ignore-file'])]]);
    expect(applySuppressions([issueAt(0)], ignored)[0].suppression).toEqual({ rule: 'ignore-file' });
  });
});
