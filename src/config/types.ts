export interface LanguagesConfig {
  primary: string;
}

export const LLM_PROVIDERS = ['anthropic', 'openai', 'ollama'] as const;

export type LLMProvider = typeof LLM_PROVIDERS[number];

export interface LLMConfig {
  provider: LLMProvider;
  // Base URL for the openai and ollama providers.
  apiUrl?: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  maxConcurrent: number;
}

export interface ChecksConfig {
  chktex: boolean;
  vale: boolean;
  codespell: boolean;
  latexindent: boolean;
  languagetool: boolean;
  configDir: string;
}

export interface PathsConfig {
  roots: string[];
  extensions: string[];
  exclude: string[];
}

export interface CacheConfig {
  path: string;
}

export interface SegmentsConfig {
  maxChars: number;
  overlapSentences: number;
}

export interface DraftlintConfig {
  languages: LanguagesConfig;
  llm: LLMConfig;
  checks: ChecksConfig;
  paths: PathsConfig;
  cache: CacheConfig;
  segments: SegmentsConfig;
}

export interface ConfigValidationError {
  field: string;
  reason: string;
}

export class ConfigError extends Error {
  constructor(
    public readonly configPath: string,
    public readonly errors: ConfigValidationError[]
  ) {
    super(`Invalid configuration in ${configPath}: ${errors.map(e => `${e.field} ${e.reason}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}
