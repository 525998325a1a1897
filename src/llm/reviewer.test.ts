import { describe, expect, it, vi } from 'vitest';
import { InMemorySemaphore } from '../concurrency/semaphore.js';
import type { Segment } from '../types.js';
import { SegmentReviewer } from './reviewer.js';
import type { LLMResponse, TextGenerator } from './types.js';

function respondWith(handler: (userPrompt: string) => Promise<string>): TextGenerator {
  return {
    complete: vi.fn(async (_system: string, user: string): Promise<LLMResponse> => ({
      text: await handler(user),
      stopReason: 'end_turn',
      usage: { inputTokens: 100, outputTokens: 20 },
    })),
  };
}

const segments: Segment[] = [
  { text: 'First passage.', file: 'a.tex', startLine: 1 },
  { text: 'Second passage.', file: 'a.tex', startLine: 5 },
  { text: 'Third passage.', file: 'b.tex', startLine: 2 },
];

describe('SegmentReviewer', () => {
  it('turns suggestions into notes at the segment start line', async () => {
    const generator = respondWith(async () => '[{"suggestion": "Rewrite.", "rationale": "Clearer."}]');
    const reviewer = new SegmentReviewer(generator, new InMemorySemaphore(2));

    const [result] = await reviewer.review([segments[1]]);

    expect(result.issues).toEqual([{
      tool: 'llm',
      type: 'clarity',
      file: 'a.tex',
      line: 5,
      col: 0,
      severity: 'note',
      message: 'Clearer.',
      suggestion: 'Rewrite.',
    }]);
    expect(result.failed).toBeUndefined();
  });

  it('keeps results in segment order when calls finish out of order', async () => {
    const delays: Record<string, number> = { 'First passage.': 30, 'Second passage.': 0, 'Third passage.': 10 };
    const generator = respondWith(async user => {
      const text = Object.keys(delays).find(key => user.endsWith(key)) ?? '';
      await new Promise(resolve => setTimeout(resolve, delays[text]));
      return '[]';
    });
    const reviewer = new SegmentReviewer(generator, new InMemorySemaphore(3));

    const results = await reviewer.review(segments);

    expect(results.map(r => r.segment.text)).toEqual(['First passage.', 'Second passage.', 'Third passage.']);
  });

  it('never runs more calls than the semaphore allows', async () => {
    let inFlight = 0;
    let peak = 0;
    const generator = respondWith(async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise(resolve => setTimeout(resolve, 5));
      inFlight--;
      return '[]';
    });
    const semaphore = new InMemorySemaphore(2);

    await new SegmentReviewer(generator, semaphore).review(segments);

    expect(peak).toBe(2);
    expect(semaphore.getPeak()).toBe(2);
    expect(semaphore.getAvailable()).toBe(2);
  });

  it('turns a failed call into an error issue for that segment only', async () => {
    const generator = respondWith(async user => {
      if (user.endsWith('Second passage.')) throw new Error('overloaded');
      return '[]';
    });
    const reviewer = new SegmentReviewer(generator, new InMemorySemaphore(3));

    const results = await reviewer.review(segments);

    expect(results.map(r => r.failed ?? false)).toEqual([false, true, false]);
    expect(results[1].issues).toEqual([{
      tool: 'llm',
      type: 'tool_failure',
      file: 'a.tex',
      line: 5,
      col: 0,
      severity: 'error',
      message: 'LLM review failed: overloaded',
    }]);
    expect(reviewer.getUsage()).toEqual({ calls: 3, failures: 1, inputTokens: 200, outputTokens: 40 });
  });

  it('fails a segment whose answer has no list', async () => {
    const reviewer = new SegmentReviewer(respondWith(async () => 'Looks good to me.'), new InMemorySemaphore(1));

    const [result] = await reviewer.review([segments[0]]);

    expect(result.failed).toBe(true);
    expect(result.issues[0].message).toBe('LLM review failed: Unusable LLM response: expected a JSON list of suggestions');
  });
});
