import type { SegmentReviewResult } from '../cache/merger.js';
import type { InMemorySemaphore } from '../concurrency/semaphore.js';
import { logger } from '../observability/logger.js';
import type { Issue, Segment } from '../types.js';
import { parseClarityResponse } from './parse.js';
import { buildClaritySystemPrompt, buildClarityUserPrompt } from './prompts.js';
import type { TextGenerator } from './types.js';

export interface UsageStats {
  calls: number;
  failures: number;
  inputTokens: number;
  outputTokens: number;
}

export function emptyUsage(): UsageStats {
  return { calls: 0, failures: 0, inputTokens: 0, outputTokens: 0 };
}

/**
 * Clarity review of prose segments. Calls run concurrently up to the
 * semaphore's permits; results come back in the order segments were given.
 */
export class SegmentReviewer {
  private usage: UsageStats = emptyUsage();

  constructor(
    private readonly generator: TextGenerator,
    private readonly semaphore: InMemorySemaphore,
    private readonly systemPrompt: string = buildClaritySystemPrompt()
  ) {}

  review(segments: readonly Segment[]): Promise<SegmentReviewResult[]> {
    return Promise.all(
      segments.map(segment => this.semaphore.withPermit(() => this.reviewSegment(segment)))
    );
  }

  async reviewSegment(segment: Segment): Promise<SegmentReviewResult> {
    this.usage.calls++;
    try {
      const response = await this.generator.complete(this.systemPrompt, buildClarityUserPrompt(segment.text));
      if (response.usage) {
        this.usage.inputTokens += response.usage.inputTokens;
        this.usage.outputTokens += response.usage.outputTokens;
      }

      const issues: Issue[] = parseClarityResponse(response.text).map(item => ({
        tool: 'llm',
        type: 'clarity',
        file: segment.file,
        line: segment.startLine,
        col: 0,
        severity: 'note',
        message: item.rationale,
        suggestion: item.suggestion,
      }));

      return { segment, issues };
    } catch (error) {
      this.usage.failures++;
      const reason = error instanceof Error ? error.message : 'Unknown error';
      logger.warn('llm_review', 'Segment review failed', {
        document: segment.file,
        startLine: segment.startLine,
        error: reason,
      });

      return {
        segment,
        failed: true,
        issues: [{
          tool: 'llm',
          type: 'tool_failure',
          file: segment.file,
          line: segment.startLine,
          col: 0,
          severity: 'error',
          message: `LLM review failed: ${reason}`,
        }],
      };
    }
  }

  getUsage(): UsageStats {
    return { ...this.usage };
  }
}
