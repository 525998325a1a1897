import fs from 'fs/promises';
import path from 'path';
import type { Issue } from '../types.js';
import { hasErrorCode } from '../utils/errors.js';

export function buildClaritySystemPrompt(): string {
  return `You are an experienced academic editor reviewing a passage of a technical manuscript.

Your role is to:
1. Find sentences that are ambiguous, convoluted or hard to follow
2. Propose a clearer rewrite that keeps the technical meaning
3. Explain briefly why the rewrite reads better

Ignore spelling, grammar and formatting; other tools check those.
Leave LaTeX commands and mathematics untouched.

Respond ONLY with a valid JSON array in this exact format:
[
  { "suggestion": "rewritten sentence", "rationale": "why it is clearer" }
]

Respond with [] when the passage needs no changes.
Do not include any text outside the JSON structure.`;
}

export function buildClarityUserPrompt(text: string): string {
  return `Review this passage:\n\n${text}`;
}

export function buildAdjudicationSystemPrompt(): string {
  return `You are a careful proofreader judging findings reported by automatic checkers on a LaTeX manuscript.

For the finding you are given, decide whether it is a real problem in the quoted line.
False positives are common for technical terms, names, macros and mathematics.

Respond ONLY with one JSON object in this exact format:
{ "accept": true, "fix": "full corrected line", "comment": "short reason" }

Set accept to false when the finding is a false positive.
Omit fix when no concrete correction applies.
Do not include any text outside the JSON structure.`;
}

export function buildSpellingFixSystemPrompt(): string {
  return `Role: Proofreader.
Goal: Fix spelling mistakes.
Output: Exactly one JSON object:
{ "accept": true, "fix": "...", "comment": "..." }
Rules:
- accept must be true.
- fix is the full corrected line (not empty).
- Only change a single word in the line, based on the suggestions.
- If multiple suggestions fit, pick the shortest plausible one.
- No extra text.`;
}

export function buildAdjudicationUserPrompt(issue: Issue, lineText: string): string {
  return JSON.stringify({
    issue: {
      tool: issue.tool,
      type: issue.type,
      message: issue.message,
      code: issue.code ?? null,
      suggestion: issue.suggestion ?? null,
    },
    line: lineText,
  });
}

export function buildSpellingFixUserPrompt(issue: Issue, lineText: string): string {
  return JSON.stringify({
    code: issue.code ?? null,
    suggestion: issue.suggestion ?? null,
    line: lineText,
  });
}

/**
 * Prompt override from the checks config directory. English configurations
 * prefer `<name>_en.txt` and fall back to `<name>.txt`.
 */
export async function loadPromptOverride(
  configDir: string,
  name: string,
  language: string
): Promise<string | null> {
  const candidates = language.toLowerCase().startsWith('en')
    ? [`${name}_en.txt`, `${name}.txt`]
    : [`${name}.txt`];

  for (const candidate of candidates) {
    try {
      const text = await fs.readFile(path.join(configDir, candidate), 'utf-8');
      if (text.trim()) return text;
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) throw error;
    }
  }
  return null;
}
