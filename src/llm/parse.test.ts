import { describe, expect, it } from 'vitest';
import { parseAdjudicationResponse, parseClarityResponse } from './parse.js';
import { LLMResponseError } from './types.js';

describe('parseClarityResponse', () => {
  it('reads a plain JSON list', () => {
    const text = JSON.stringify([{ suggestion: 'Use the active voice.', rationale: 'Shorter.' }]);

    expect(parseClarityResponse(text)).toEqual([{ suggestion: 'Use the active voice.', rationale: 'Shorter.' }]);
  });

  it('unwraps lists held under a known key', () => {
    expect(parseClarityResponse('{"items": [{"suggestion": "A", "rationale": "B"}]}')).toEqual([
      { suggestion: 'A', rationale: 'B' },
    ]);
    expect(parseClarityResponse('{"results": []}')).toEqual([]);
  });

  it('finds the list inside surrounding prose', () => {
    const text = 'Here you go:\n[{"suggestion": "A", "rationale": "B"}]\nHope this helps.';

    expect(parseClarityResponse(text)).toEqual([{ suggestion: 'A', rationale: 'B' }]);
  });

  it('accepts bare strings and fills in a rationale', () => {
    expect(parseClarityResponse('["Split the sentence."]')).toEqual([
      { suggestion: 'Split the sentence.', rationale: 'Suggestion' },
    ]);
  });

  it('throws when no list can be recovered', () => {
    expect(() => parseClarityResponse('I have no suggestions.')).toThrow(LLMResponseError);
    expect(() => parseClarityResponse('{"verdict": "fine"}')).toThrow(LLMResponseError);
  });
});

describe('parseAdjudicationResponse', () => {
  it('reads a decision object', () => {
    expect(parseAdjudicationResponse('{"accept": false, "comment": "Proper noun."}')).toEqual({
      accept: false,
      comment: 'Proper noun.',
    });
  });

  it('extracts the object from surrounding text', () => {
    expect(parseAdjudicationResponse('Decision: {"accept": true, "fix": "The result is clear."} done')).toEqual({
      accept: true,
      fix: 'The result is clear.',
    });
  });

  it('drops empty fix and comment fields', () => {
    expect(parseAdjudicationResponse('{"accept": true, "fix": "  ", "comment": ""}')).toEqual({ accept: true });
  });

  it('returns null for unparseable text', () => {
    expect(parseAdjudicationResponse('yes')).toBeNull();
  });
});
