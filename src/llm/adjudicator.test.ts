import { describe, expect, it, vi } from 'vitest';
import { InMemorySemaphore } from '../concurrency/semaphore.js';
import { toDocument } from '../documents/reader.js';
import type { Issue } from '../types.js';
import { Adjudicator, needsAdjudication } from './adjudicator.js';
import type { LLMResponse, TextGenerator } from './types.js';

function generatorReplying(...texts: string[]) {
  const complete = vi.fn(async (_system: string, _user: string): Promise<LLMResponse> => ({
    text: texts.shift() ?? '',
    stopReason: 'end_turn',
  }));
  return { complete };
}

const document = toDocument('a.tex', 'Teh result holds.\nSecond line.\n');

const typo: Issue = {
  tool: 'codespell',
  type: 'typo',
  file: 'a.tex',
  line: 1,
  col: 0,
  severity: 'warning',
  message: 'Teh ==> The',
  suggestion: 'The',
};

describe('needsAdjudication', () => {
  it('skips issues that cannot or need not be judged', () => {
    expect(needsAdjudication(typo)).toBe(true);
    expect(needsAdjudication({ ...typo, tool: 'llm' })).toBe(false);
    expect(needsAdjudication({ ...typo, line: 0 })).toBe(false);
    expect(needsAdjudication({ ...typo, suppressed: true })).toBe(false);
    expect(needsAdjudication({ ...typo, adjudication: { accept: true } })).toBe(false);
    expect(needsAdjudication({ ...typo, type: 'tool_failure' })).toBe(false);
  });
});

describe('Adjudicator', () => {
  it('attaches the decision and sends the flagged line', async () => {
    const generator = generatorReplying('{"accept": true, "fix": "The result holds."}');
    const adjudicator = new Adjudicator(generator, new InMemorySemaphore(1));

    const [result] = await adjudicator.adjudicate([typo], document);

    expect(result.adjudication).toEqual({ accept: true, fix: 'The result holds.' });
    const userPrompt = generator.complete.mock.calls[0][1];
    expect(JSON.parse(userPrompt)).toEqual({
      issue: { tool: 'codespell', type: 'typo', message: 'Teh ==> The', code: null, suggestion: 'The' },
      line: 'Teh result holds.',
    });
  });

  it('accepts an issue when the answer cannot be parsed', async () => {
    const adjudicator = new Adjudicator(generatorReplying('maybe'), new InMemorySemaphore(1));

    const [result] = await adjudicator.adjudicate([typo], document);

    expect(result.adjudication).toEqual({ accept: true });
  });

  it('leaves already adjudicated issues alone', async () => {
    const generator = generatorReplying();
    const decided: Issue = { ...typo, adjudication: { accept: false } };

    const [result] = await new Adjudicator(generator, new InMemorySemaphore(1)).adjudicate([decided], document);

    expect(result).toBe(decided);
    expect(generator.complete).not.toHaveBeenCalled();
  });

  it('asks again for a concrete fix on accepted spelling findings', async () => {
    const generator = generatorReplying('{"accept": true}', '{"accept": true, "fix": "The result holds."}');
    const speller: Issue = { ...typo, tool: 'languagetool', type: 'grammar', code: 'MORFOLOGIK_RULE_EN_US_SPELLER_RULE' };

    const [result] = await new Adjudicator(generator, new InMemorySemaphore(1)).adjudicate([speller], document);

    expect(generator.complete).toHaveBeenCalledTimes(2);
    expect(result.adjudication).toEqual({ accept: true, fix: 'The result holds.' });
  });

  it('keeps the issue undecided when the call fails', async () => {
    const generator: TextGenerator = { complete: vi.fn().mockRejectedValue(new Error('timeout')) };
    const adjudicator = new Adjudicator(generator, new InMemorySemaphore(1));

    const [result] = await adjudicator.adjudicate([typo], document);

    expect(result).toBe(typo);
    expect(adjudicator.getUsage().failures).toBe(1);
  });
});
