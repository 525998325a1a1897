import { describe, expect, it } from 'vitest';
import { hashLine } from './hasher.js';
import { detectLineChanges, linesNeedingCheck } from './line-detector.js';
import type { DocumentSnapshot, LineRecord } from './types.js';

function snapshotOf(lines: string[]): DocumentSnapshot {
  const records = new Map<number, LineRecord>();
  lines.forEach((text, index) => {
    records.set(index + 1, { lineNumber: index + 1, contentDigest: hashLine(text), issues: [] });
  });
  return { fileDigest: 'f'.repeat(32), lineCount: lines.length, lines: records, segments: new Map(), documentIssues: [] };
}

describe('detectLineChanges', () => {
  it('marks every line new without a previous snapshot', () => {
    const result = detectLineChanges(['a', 'b'], null);

    expect(result.classifications.map(c => c.status)).toEqual(['new', 'new']);
    expect(result.classifications.map(c => c.previousLine)).toEqual([null, null]);
    expect(result.deleted.size).toBe(0);
  });

  it('follows lines that moved after an insertion', () => {
    const previous = snapshotOf(['one', 'two', 'three', 'four', 'five']);
    const result = detectLineChanges(['one', 'two', 'inserted', 'three', 'four', 'five'], previous);

    expect(result.classifications.map(c => c.previousLine)).toEqual([1, 2, null, 3, 4, 5]);
    expect([...linesNeedingCheck(result.classifications)]).toEqual([3]);
    expect(result.deleted.size).toBe(0);
  });

  it('reports unclaimed previous lines as deleted', () => {
    const previous = snapshotOf(['one', 'two', 'three']);
    const result = detectLineChanges(['one', 'three'], previous);

    expect(result.classifications.map(c => c.previousLine)).toEqual([1, 3]);
    expect([...result.deleted]).toEqual([2]);
  });

  it('treats an edited line as new and its old version as deleted', () => {
    const previous = snapshotOf(['alpha', 'beta']);
    const result = detectLineChanges(['alpha', 'beta!'], previous);

    expect(result.classifications[1]).toEqual({
      currentLine: 2,
      previousLine: null,
      status: 'new',
      contentDigest: hashLine('beta!'),
    });
    expect([...result.deleted]).toEqual([2]);
  });

  it('ignores indentation changes', () => {
    const previous = snapshotOf(['\\item first']);
    const result = detectLineChanges(['    \\item first'], previous);

    expect(result.classifications[0].status).toBe('unchanged');
  });

  it('pairs duplicate lines with the lowest unclaimed previous line', () => {
    const previous = snapshotOf(['', 'text', '', 'more']);
    const result = detectLineChanges(['', '', 'text', '', 'more'], previous);

    expect(result.classifications.map(c => c.previousLine)).toEqual([1, 3, 2, null, 4]);
    expect(result.classifications[3].status).toBe('new');
  });

  it('never claims a previous line twice', () => {
    const previous = snapshotOf(['x']);
    const result = detectLineChanges(['x', 'x', 'x'], previous);

    expect(result.classifications.map(c => c.status)).toEqual(['unchanged', 'new', 'new']);
  });
});
