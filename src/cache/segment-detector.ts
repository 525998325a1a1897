import { hashSegment } from './hasher.js';
import type { SegmentClassification, SegmentRecord } from './types.js';

/**
 * A segment is cached when its exact text was reviewed in the previous run,
 * wherever it sat in the document. Boundaries are not compared.
 */
export function detectSegmentChanges<S extends { text: string }>(
  segments: readonly S[],
  previous: ReadonlyMap<string, SegmentRecord> | null | undefined
): SegmentClassification<S>[] {
  return segments.map(segment => {
    const digest = hashSegment(segment.text);
    return {
      segment,
      digest,
      status: previous?.has(digest) ? 'cached' : 'fresh',
    };
  });
}
