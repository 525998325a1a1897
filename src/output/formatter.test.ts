import { describe, expect, it } from 'vitest';
import { buildReport, type CacheReportStats } from '../review/report.js';
import { describeFixes, formatMarkdown, formatText } from './formatter.js';

const cacheStats: CacheReportStats = {
  enabled: true,
  loaded: true,
  saved: true,
  path: 'out/.review_cache.json',
  documentsSkipped: 1,
  documentsPartial: 1,
  documentsFull: 0,
  linesReused: 12,
  linesChecked: 2,
  segmentsCached: 3,
  segmentsFresh: 1,
};

const report = buildReport([
  { tool: 'codespell', type: 'typo', file: 'a.tex', line: 4, col: 0, severity: 'warning', message: 'teh ==> the', suggestion: 'the' },
  { tool: 'vale', type: 'style', file: 'a.tex', line: 7, col: 2, severity: 'error', message: 'Repeated word.', code: 'Vale.Repetition' },
  { tool: 'latexindent', type: 'formatting', file: 'b.tex', line: 0, col: 0, severity: 'note', message: 'Not formatted.' },
  { tool: 'vale', type: 'style', file: 'b.tex', line: 3, col: 1, severity: 'warning', message: 'Hidden.', suppressed: true, suppression: { rule: 'ignore-block' } },
], cacheStats);

describe('formatText', () => {
  it('lists active issues and the summary without colour', () => {
    expect(formatText(report).split('\n')).toEqual([
      'a.tex:4  warning  teh ==> the  [codespell]',
      '  suggestion: the',
      'a.tex:7:2  error  Repeated word.  [vale] (Vale.Repetition)',
      'b.tex  note  Not formatted.  [latexindent]',
      '',
      '1 error(s), 1 warning(s), 1 note(s), 1 suppressed or rejected',
      'cache: 1 unchanged, 1 partial, 0 full; 12 line(s) reused, 3 segment(s) reused',
    ]);
  });

  it('ends with the rewrite summary of a fixing run', () => {
    const fixed = { ...report, fixes: { formatted: ['a.tex'], formatFailed: [], fixedLines: 2, annotatedLines: 0 } };

    expect(formatText(fixed).split('\n').at(-1)).toBe('1 document(s) formatted, 2 line(s) fixed, 0 line(s) annotated');
  });
});

describe('describeFixes', () => {
  it('names the documents latexindent could not format', () => {
    expect(describeFixes({ formatted: [], formatFailed: ['a.tex', 'b.tex'], fixedLines: 0, annotatedLines: 1 }))
      .toBe('0 document(s) formatted, 0 line(s) fixed, 1 line(s) annotated, latexindent failed on a.tex, b.tex');
  });
});

describe('formatMarkdown', () => {
  it('groups issues by file', () => {
    expect(formatMarkdown(report).split('\n')).toEqual([
      '## Review Report\n',
      '**1** errors, **1** warnings, **1** notes\n',
      '### a.tex',
      '- **warning** (line 4, codespell): teh ==> the _Suggestion:_ the',
      '- **error** (line 7, vale): Repeated word.',
      '',
      '### b.tex',
      '- **note** (file, latexindent): Not formatted.',
      '',
      '_1 suppressed issue(s) not shown_',
      '---',
      '_Reused 12 line(s) and 3 segment(s) from the review cache_',
    ].join('\n').split('\n'));
  });
});
