import { hashLine } from './hasher.js';
import type { DocumentSnapshot, LineChangeResult, LineClassification } from './types.js';

/**
 * Classify every current line as unchanged or new against the previous
 * snapshot, and report previous lines that were not claimed.
 *
 * Matching is greedy over a digest multimap: each current line claims the
 * lowest unclaimed previous line number with the same digest. This is O(n)
 * and never pairs lines whose trimmed content differs. It does not attempt an
 * optimal alignment; with many identical lines interleaved with edits it may
 * pair a different instance of the duplicate than an LCS would.
 */
export function detectLineChanges(
  currentLines: readonly string[],
  previous: DocumentSnapshot | null | undefined
): LineChangeResult {
  if (!previous) {
    return {
      classifications: currentLines.map((text, index) => ({
        currentLine: index + 1,
        previousLine: null,
        status: 'new',
        contentDigest: hashLine(text),
      })),
      deleted: new Set(),
    };
  }

  const candidatesByDigest = new Map<string, number[]>();
  const previousLineNumbers = [...previous.lines.keys()].sort((a, b) => a - b);
  for (const lineNumber of previousLineNumbers) {
    const record = previous.lines.get(lineNumber);
    if (!record) continue;
    const candidates = candidatesByDigest.get(record.contentDigest);
    if (candidates) {
      candidates.push(lineNumber);
    } else {
      candidatesByDigest.set(record.contentDigest, [lineNumber]);
    }
  }

  // Candidates are ascending, so a cursor per digest yields the lowest
  // unclaimed previous line without rescanning.
  const cursors = new Map<string, number>();
  const claimed = new Set<number>();
  const classifications: LineClassification[] = [];

  currentLines.forEach((text, index) => {
    const contentDigest = hashLine(text);
    const candidates = candidatesByDigest.get(contentDigest);
    const cursor = cursors.get(contentDigest) ?? 0;

    if (candidates && cursor < candidates.length) {
      const previousLine = candidates[cursor];
      cursors.set(contentDigest, cursor + 1);
      claimed.add(previousLine);
      classifications.push({
        currentLine: index + 1,
        previousLine,
        status: 'unchanged',
        contentDigest,
      });
      return;
    }

    classifications.push({
      currentLine: index + 1,
      previousLine: null,
      status: 'new',
      contentDigest,
    });
  });

  const deleted = new Set<number>();
  for (const lineNumber of previousLineNumbers) {
    if (!claimed.has(lineNumber)) {
      deleted.add(lineNumber);
    }
  }

  return { classifications, deleted };
}

export function linesNeedingCheck(classifications: readonly LineClassification[]): Set<number> {
  const lines = new Set<number>();
  for (const classification of classifications) {
    if (classification.status === 'new') {
      lines.add(classification.currentLine);
    }
  }
  return lines;
}
