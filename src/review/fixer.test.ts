import { randomUUID } from 'crypto';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Issue } from '../types.js';
import {
  annotateLines,
  annotateSuggestions,
  applyAdjudicatedFixes,
  applyFixesToLines,
  isApplicableFix,
} from './fixer.js';

function issue(overrides: Partial<Issue> = {}): Issue {
  return {
    tool: 'codespell',
    type: 'typo',
    file: 'paper.tex',
    line: 2,
    col: 0,
    severity: 'warning',
    message: 'teh ==> the',
    ...overrides,
  };
}

describe('isApplicableFix', () => {
  it('takes accepted single-line fixes only', () => {
    expect(isApplicableFix(issue({ adjudication: { accept: true, fix: 'The line.' } }))).toBe(true);
    expect(isApplicableFix(issue({ adjudication: { accept: false, fix: 'The line.' } }))).toBe(false);
    expect(isApplicableFix(issue({ adjudication: { accept: true } }))).toBe(false);
    expect(isApplicableFix(issue({ adjudication: { accept: true, fix: 'One.\nTwo.' } }))).toBe(false);
    expect(isApplicableFix(issue({ line: 0, adjudication: { accept: true, fix: 'The line.' } }))).toBe(false);
    expect(isApplicableFix(issue({ suppressed: true, adjudication: { accept: true, fix: 'The line.' } }))).toBe(false);
  });
});

describe('applyFixesToLines', () => {
  it('replaces the line, keeps its indent and marks it', () => {
    const lines = ['\\begin{itemize}', '  \\item Teh point.', '\\end{itemize}'];

    const replaced = applyFixesToLines(lines, new Map([
      [2, [issue({ adjudication: { accept: true, fix: '\\item The point.', comment: 'Typo.' } })]],
    ]));

    expect(replaced).toBe(1);
    expect(lines[1]).toBe('  \\item The point. % draftlint-fix: Typo.');
  });

  it('uses the first fix of a line and ignores lines out of range', () => {
    const lines = ['Teh end.'];

    const replaced = applyFixesToLines(lines, new Map([
      [1, [
        issue({ line: 1, adjudication: { accept: true, fix: 'The end.' } }),
        issue({ line: 1, adjudication: { accept: true, fix: 'Other.' } }),
      ]],
      [5, [issue({ line: 5, adjudication: { accept: true, fix: 'Nothing.' } })]],
    ]));

    expect(replaced).toBe(1);
    expect(lines).toEqual(['The end. % draftlint-fix: fixed']);
  });
});

describe('annotateLines', () => {
  it('replaces earlier annotations with the suggestions of this run', () => {
    const lines = ['First. % draftlint-llm: old advice', 'Second.'];

    const annotated = annotateLines(lines, new Map([
      [2, [
        issue({ tool: 'llm', type: 'clarity', line: 2, message: 'Vague.', suggestion: 'Say what is second.' }),
        issue({ tool: 'llm', type: 'clarity', line: 2, message: 'Too short.' }),
      ]],
    ]));

    expect(annotated).toBe(1);
    expect(lines).toEqual(['First.', 'Second. % draftlint-llm: Say what is second. | Too short.']);
  });
});

describe('document rewriting', () => {
  let root: string;

  beforeEach(async () => {
    root = path.join(os.tmpdir(), `draftlint-fix-${randomUUID()}`);
    await fs.mkdir(root, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('applies accepted fixes and keeps line endings', async () => {
    await fs.writeFile(path.join(root, 'paper.tex'), 'Intro.\r\nTeh line.\r\n');

    const fixed = await applyAdjudicatedFixes(root, [
      issue({ adjudication: { accept: true, fix: 'The line.', comment: 'Spelling.' } }),
      issue({ line: 1, adjudication: { accept: false, fix: 'Nope.' } }),
    ]);

    expect(fixed).toBe(1);
    expect(await fs.readFile(path.join(root, 'paper.tex'), 'utf-8'))
      .toBe('Intro.\r\nThe line. % draftlint-fix: Spelling.\r\n');
  });

  it('clears stale annotations from documents without suggestions', async () => {
    await fs.writeFile(path.join(root, 'paper.tex'), 'Text. % draftlint-llm: stale\n');

    const annotated = await annotateSuggestions(root, [], ['paper.tex']);

    expect(annotated).toBe(0);
    expect(await fs.readFile(path.join(root, 'paper.tex'), 'utf-8')).toBe('Text.\n');
  });
});
