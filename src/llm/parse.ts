import type { AdjudicationDecision, ClaritySuggestion } from './types.js';
import { LLMResponseError } from './types.js';

const LIST_KEYS = ['suggestions', 'items', 'results'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function between(text: string, open: string, close: string): string | null {
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  if (start === -1 || end <= start) return null;
  return text.slice(start, end + 1);
}

function toSuggestion(item: unknown): ClaritySuggestion | null {
  if (typeof item === 'string') {
    return item.trim() ? { suggestion: item, rationale: 'Suggestion' } : null;
  }
  if (!isRecord(item)) return null;
  const suggestion = typeof item.suggestion === 'string' ? item.suggestion : '';
  const rationale = typeof item.rationale === 'string' && item.rationale ? item.rationale : 'Suggestion';
  if (!suggestion && rationale === 'Suggestion') return null;
  return { suggestion, rationale };
}

/**
 * Accepts a JSON array, an object wrapping the array under `suggestions`,
 * `items` or `results`, or prose around a JSON array.
 */
export function parseClarityResponse(text: string): ClaritySuggestion[] {
  let data = tryParse(text.trim());

  if (data === undefined) {
    const bracketed = between(text, '[', ']');
    data = bracketed === null ? undefined : tryParse(bracketed);
  }

  if (isRecord(data)) {
    const wrapper = data;
    const key = LIST_KEYS.find(k => Array.isArray(wrapper[k]));
    data = key ? wrapper[key] : undefined;
  }

  if (!Array.isArray(data)) {
    throw new LLMResponseError('expected a JSON list of suggestions', text.slice(0, 200));
  }

  return data.flatMap(item => {
    const suggestion = toSuggestion(item);
    return suggestion ? [suggestion] : [];
  });
}

/**
 * Returns null when no JSON object can be recovered from the text.
 */
export function parseAdjudicationResponse(text: string): AdjudicationDecision | null {
  let data = tryParse(text.trim());

  if (!isRecord(data)) {
    const braced = between(text, '{', '}');
    data = braced === null ? undefined : tryParse(braced);
  }

  if (!isRecord(data)) return null;

  const decision: AdjudicationDecision = { accept: data.accept !== false };
  if (typeof data.fix === 'string' && data.fix.trim()) decision.fix = data.fix;
  if (typeof data.comment === 'string' && data.comment.trim()) decision.comment = data.comment;
  return decision;
}
