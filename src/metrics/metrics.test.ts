import { describe, expect, it } from 'vitest';
import type { MergeStats } from '../cache/merger.js';
import { InMemorySemaphore } from '../concurrency/semaphore.js';
import { RunMetrics, estimateCost } from './metrics.js';

function stats(overrides: Partial<MergeStats>): MergeStats {
  return {
    mode: 'full',
    carriedLineIssues: 0,
    freshLineIssues: 0,
    documentIssues: 0,
    cachedSegments: 0,
    freshSegments: 0,
    carriedSegmentIssues: 0,
    freshSegmentIssues: 0,
    deletedLines: 0,
    unsettled: false,
    ...overrides,
  };
}

describe('estimateCost', () => {
  it('prices input and output tokens separately', () => {
    expect(estimateCost(1000, 1000)).toBe(0.018);
    expect(estimateCost(0, 0)).toBe(0);
  });
});

describe('RunMetrics', () => {
  it('aggregates documents, lines and segments', () => {
    const metrics = new RunMetrics();
    metrics.recordMerge(stats({ mode: 'skip', cachedSegments: 2 }), 10, 0);
    metrics.recordMerge(stats({ mode: 'partial', deletedLines: 1, cachedSegments: 1, freshSegments: 1 }), 8, 3);
    metrics.recordMerge(stats({ mode: 'full', freshSegments: 2 }), 5, 5);
    metrics.recordUnreadable();
    metrics.recordToolFailures(2);

    const snapshot = metrics.snapshot();

    expect(snapshot.documents).toEqual({ total: 4, skipped: 1, partial: 1, full: 1, unreadable: 1 });
    expect(snapshot.lines).toEqual({ reused: 15, checked: 8, deleted: 1 });
    expect(snapshot.segments).toEqual({ cached: 3, fresh: 3 });
    expect(snapshot.tools.failures).toBe(2);
  });

  it('adds review and adjudication usage', async () => {
    const metrics = new RunMetrics();
    const semaphore = new InMemorySemaphore(2);
    await Promise.all([semaphore.withPermit(async () => 1), semaphore.withPermit(async () => 2)]);

    metrics.recordReviewUsage({ calls: 3, failures: 1, inputTokens: 2000, outputTokens: 500 });
    metrics.recordAdjudicationUsage({ calls: 2, failures: 0, inputTokens: 1000, outputTokens: 500 });

    const snapshot = metrics.snapshot(semaphore);
    expect(snapshot.llm).toEqual({ reviewCalls: 3, adjudicationCalls: 2, failures: 1, peakInFlight: 2 });
    expect(snapshot.tokens).toEqual({ totalInput: 3000, totalOutput: 1000, estimatedCostUSD: 0.024 });
  });
});
