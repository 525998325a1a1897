import type { DraftlintConfig } from './types.js';

export const CONFIG_FILENAME = 'draftlint.yaml';

export const DEFAULT_CONFIG: DraftlintConfig = {
  languages: {
    primary: 'en-US',
  },
  llm: {
    provider: 'anthropic',
    model: 'claude-sonnet-4-20250514',
    maxTokens: 2048,
    temperature: 0,
    timeoutMs: 60000,
    maxConcurrent: 3,
  },
  checks: {
    chktex: true,
    vale: true,
    codespell: false,
    latexindent: true,
    languagetool: true,
    configDir: 'configs',
  },
  paths: {
    roots: ['.'],
    extensions: ['.tex'],
    exclude: ['out', 'node_modules'],
  },
  cache: {
    path: 'out/.review_cache.json',
  },
  segments: {
    maxChars: 4000,
    overlapSentences: 1,
  },
};
