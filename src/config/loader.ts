import fs from 'fs/promises';
import path from 'path';
import * as yaml from 'js-yaml';
import { logger } from '../observability/logger.js';
import { hasErrorCode } from '../utils/errors.js';
import { CONFIG_FILENAME, DEFAULT_CONFIG } from './defaults.js';
import { ConfigError, LLM_PROVIDERS, type ConfigValidationError, type DraftlintConfig } from './types.js';

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class SectionReader {
  constructor(
    private readonly name: string,
    private readonly raw: RawSection,
    private readonly errors: ConfigValidationError[]
  ) {}

  string(key: string, fallback: string): string {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'string' || value.length === 0) {
      this.errors.push({ field: `${this.name}.${key}`, reason: 'must be a non-empty string' });
      return fallback;
    }
    return value;
  }

  optionalString(key: string): string | undefined {
    const value = this.raw[key];
    if (value === undefined || value === null) return undefined;
    return this.string(key, '') || undefined;
  }

  choice<T extends string>(key: string, allowed: readonly T[], fallback: T): T {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    const match = allowed.find(option => option === value);
    if (match === undefined) {
      this.errors.push({ field: `${this.name}.${key}`, reason: `must be one of ${allowed.join(', ')}` });
      return fallback;
    }
    return match;
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'boolean') {
      this.errors.push({ field: `${this.name}.${key}`, reason: 'must be true or false' });
      return fallback;
    }
    return value;
  }

  number(key: string, fallback: number, min: number, integer = true): number {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || Number.isNaN(value) || value < min || (integer && !Number.isInteger(value))) {
      this.errors.push({
        field: `${this.name}.${key}`,
        reason: `must be ${integer ? 'an integer' : 'a number'} >= ${min}`,
      });
      return fallback;
    }
    return value;
  }

  stringList(key: string, fallback: string[]): string[] {
    const value = this.raw[key];
    if (value === undefined) return [...fallback];
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
      this.errors.push({ field: `${this.name}.${key}`, reason: 'must be a list of strings' });
      return [...fallback];
    }
    return value;
  }
}

function section(raw: RawSection, name: string, errors: ConfigValidationError[]): SectionReader {
  const value = raw[name];
  if (value === undefined || value === null) {
    return new SectionReader(name, {}, errors);
  }
  if (!isRecord(value)) {
    errors.push({ field: name, reason: 'must be a mapping' });
    return new SectionReader(name, {}, errors);
  }
  return new SectionReader(name, value, errors);
}

/**
 * Validate a parsed YAML document against the configuration layout,
 * filling defaults for anything left out.
 */
export function parseConfig(raw: unknown, configPath: string): DraftlintConfig {
  if (raw === undefined || raw === null) {
    return structuredClone(DEFAULT_CONFIG);
  }
  if (!isRecord(raw)) {
    throw new ConfigError(configPath, [{ field: 'root', reason: 'must be a mapping' }]);
  }

  const errors: ConfigValidationError[] = [];
  const d = DEFAULT_CONFIG;

  const languages = section(raw, 'languages', errors);
  const llm = section(raw, 'llm', errors);
  const checks = section(raw, 'checks', errors);
  const paths = section(raw, 'paths', errors);
  const cache = section(raw, 'cache', errors);
  const segments = section(raw, 'segments', errors);

  const config: DraftlintConfig = {
    languages: {
      primary: languages.string('primary', d.languages.primary),
    },
    llm: {
      provider: llm.choice('provider', LLM_PROVIDERS, d.llm.provider),
      model: llm.string('model', d.llm.model),
      maxTokens: llm.number('maxTokens', d.llm.maxTokens, 1),
      temperature: llm.number('temperature', d.llm.temperature, 0, false),
      timeoutMs: llm.number('timeoutMs', d.llm.timeoutMs, 1),
      maxConcurrent: llm.number('maxConcurrent', d.llm.maxConcurrent, 1),
    },
    checks: {
      chktex: checks.boolean('chktex', d.checks.chktex),
      vale: checks.boolean('vale', d.checks.vale),
      codespell: checks.boolean('codespell', d.checks.codespell),
      latexindent: checks.boolean('latexindent', d.checks.latexindent),
      languagetool: checks.boolean('languagetool', d.checks.languagetool),
      configDir: checks.string('configDir', d.checks.configDir),
    },
    paths: {
      roots: paths.stringList('roots', d.paths.roots),
      extensions: paths.stringList('extensions', d.paths.extensions),
      exclude: paths.stringList('exclude', d.paths.exclude),
    },
    cache: {
      path: cache.string('path', d.cache.path),
    },
    segments: {
      maxChars: segments.number('maxChars', d.segments.maxChars, 1),
      overlapSentences: segments.number('overlapSentences', d.segments.overlapSentences, 0),
    },
  };

  const apiUrl = llm.optionalString('apiUrl');
  if (apiUrl !== undefined) {
    config.llm.apiUrl = apiUrl;
  }

  if (errors.length > 0) {
    throw new ConfigError(configPath, errors);
  }
  return config;
}

/**
 * Load `draftlint.yaml` (or the given file) relative to the project root.
 * A missing default file means defaults; a missing explicit file is an error.
 */
export async function loadConfig(root: string, explicitPath?: string): Promise<DraftlintConfig> {
  const requested = explicitPath || process.env.DRAFTLINT_CONFIG || undefined;
  const configPath = path.resolve(root, requested ?? CONFIG_FILENAME);

  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT') && requested === undefined) {
      logger.info('config_load', 'No configuration file, using defaults', { configPath });
      return structuredClone(DEFAULT_CONFIG);
    }
    throw new ConfigError(configPath, [{
      field: 'file',
      reason: error instanceof Error ? error.message : 'Unknown error',
    }]);
  }

  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    throw new ConfigError(configPath, [{
      field: 'yaml',
      reason: error instanceof Error ? error.message : 'Unknown error',
    }]);
  }

  const config = parseConfig(raw, configPath);
  logger.info('config_load', 'Configuration loaded', { configPath });
  return config;
}

export function languageToolUrl(): string {
  const base = process.env.LT_URL || 'http://localhost:8010';
  return base.endsWith('/v2/check') ? base : `${base.replace(/\/+$/, '')}/v2/check`;
}
