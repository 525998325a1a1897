import type { Adjudication } from '../types.js';

export interface LLMResponse {
  text: string;
  stopReason: string | null;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

/**
 * Anything that turns a system and user prompt into text. The Claude client
 * implements it; tests pass a fake.
 */
export interface TextGenerator {
  complete(systemPrompt: string, userPrompt: string): Promise<LLMResponse>;
}

export interface ClaritySuggestion {
  suggestion: string;
  rationale: string;
}

export type AdjudicationDecision = Adjudication;

export class LLMResponseError extends Error {
  constructor(
    public readonly reason: string,
    public readonly preview: string
  ) {
    super(`Unusable LLM response: ${reason}`);
    this.name = 'LLMResponseError';
  }
}
