import type { MergeStats } from '../cache/merger.js';
import type { InMemorySemaphore } from '../concurrency/semaphore.js';
import type { UsageStats } from '../llm/reviewer.js';

// USD per 1K tokens, Claude Sonnet list price.
const PRICING = {
  INPUT_TOKENS_PER_1K: 0.003,
  OUTPUT_TOKENS_PER_1K: 0.015,
} as const;

export interface MetricsSnapshot {
  durationMs: number;
  documents: {
    total: number;
    skipped: number;
    partial: number;
    full: number;
    unreadable: number;
  };
  lines: {
    reused: number;
    checked: number;
    deleted: number;
  };
  segments: {
    cached: number;
    fresh: number;
  };
  tools: {
    failures: number;
  };
  llm: {
    reviewCalls: number;
    adjudicationCalls: number;
    failures: number;
    peakInFlight: number;
  };
  tokens: {
    totalInput: number;
    totalOutput: number;
    estimatedCostUSD: number;
  };
}

export function estimateCost(inputTokens: number, outputTokens: number): number {
  const cost = (inputTokens / 1000) * PRICING.INPUT_TOKENS_PER_1K
    + (outputTokens / 1000) * PRICING.OUTPUT_TOKENS_PER_1K;
  return parseFloat(cost.toFixed(6));
}

/**
 * Counters for one review run.
 */
export class RunMetrics {
  private readonly startTime = Date.now();

  private counters = {
    documentsSkipped: 0,
    documentsPartial: 0,
    documentsFull: 0,
    documentsUnreadable: 0,
    linesReused: 0,
    linesChecked: 0,
    linesDeleted: 0,
    segmentsCached: 0,
    segmentsFresh: 0,
    toolFailures: 0,
    reviewCalls: 0,
    adjudicationCalls: 0,
    llmFailures: 0,
    tokensInput: 0,
    tokensOutput: 0,
  };

  recordUnreadable(): void {
    this.counters.documentsUnreadable++;
  }

  recordMerge(stats: MergeStats, lineCount: number, linesChecked: number): void {
    switch (stats.mode) {
      case 'skip':
        this.counters.documentsSkipped++;
        break;
      case 'partial':
        this.counters.documentsPartial++;
        break;
      case 'full':
        this.counters.documentsFull++;
        break;
    }
    this.counters.linesChecked += linesChecked;
    this.counters.linesReused += lineCount - linesChecked;
    this.counters.linesDeleted += stats.deletedLines;
    this.counters.segmentsCached += stats.cachedSegments;
    this.counters.segmentsFresh += stats.freshSegments;
  }

  recordToolFailures(count: number): void {
    this.counters.toolFailures += count;
  }

  recordReviewUsage(usage: UsageStats): void {
    this.counters.reviewCalls += usage.calls;
    this.recordUsage(usage);
  }

  recordAdjudicationUsage(usage: UsageStats): void {
    this.counters.adjudicationCalls += usage.calls;
    this.recordUsage(usage);
  }

  snapshot(llmSemaphore?: InMemorySemaphore): MetricsSnapshot {
    const c = this.counters;
    return {
      durationMs: Date.now() - this.startTime,
      documents: {
        total: c.documentsSkipped + c.documentsPartial + c.documentsFull + c.documentsUnreadable,
        skipped: c.documentsSkipped,
        partial: c.documentsPartial,
        full: c.documentsFull,
        unreadable: c.documentsUnreadable,
      },
      lines: {
        reused: c.linesReused,
        checked: c.linesChecked,
        deleted: c.linesDeleted,
      },
      segments: {
        cached: c.segmentsCached,
        fresh: c.segmentsFresh,
      },
      tools: {
        failures: c.toolFailures,
      },
      llm: {
        reviewCalls: c.reviewCalls,
        adjudicationCalls: c.adjudicationCalls,
        failures: c.llmFailures,
        peakInFlight: llmSemaphore?.getPeak() ?? 0,
      },
      tokens: {
        totalInput: c.tokensInput,
        totalOutput: c.tokensOutput,
        estimatedCostUSD: estimateCost(c.tokensInput, c.tokensOutput),
      },
    };
  }

  private recordUsage(usage: UsageStats): void {
    this.counters.llmFailures += usage.failures;
    this.counters.tokensInput += usage.inputTokens;
    this.counters.tokensOutput += usage.outputTokens;
  }
}
