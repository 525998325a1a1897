import axios from 'axios';
import fs from 'fs/promises';
import path from 'path';
import { languageToolUrl } from '../config/loader.js';
import { logger } from '../observability/logger.js';
import { extractLineTexts } from '../segments/extract.js';
import type { Document, Issue } from '../types.js';
import { hasErrorCode } from '../utils/errors.js';
import { failureForAll, toolFailureIssue, type CheckTool, type ToolContext } from './types.js';

const REQUEST_TIMEOUT_MS = 30000;
const MAX_SUGGESTIONS = 3;

export interface LanguageToolRules {
  disabledRules: string[];
  enabledRules: string[];
  ignoreWords: string[];
}

export interface LanguageToolMatch {
  message: string;
  offset: number;
  length: number;
  replacements: string[];
  ruleId?: string;
}

export type FormPoster = (url: string, form: URLSearchParams) => Promise<unknown>;

const EMPTY_RULES: LanguageToolRules = { disabledRules: [], enabledRules: [], ignoreWords: [] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

export async function loadLanguageToolRules(root: string, configDir: string): Promise<LanguageToolRules> {
  const rulesPath = path.resolve(root, configDir, 'languagetool.json');
  let text: string;
  try {
    text = await fs.readFile(rulesPath, 'utf-8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return EMPTY_RULES;
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    logger.warn('languagetool', 'Ignoring unparseable rule file', {
      rulesPath,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    return EMPTY_RULES;
  }
  if (!isRecord(data)) {
    return EMPTY_RULES;
  }

  return {
    disabledRules: stringList(data.disabledRules),
    enabledRules: stringList(data.enabledRules),
    ignoreWords: stringList(data.ignoreWords),
  };
}

/**
 * Plain text with exactly one output line per source line, so that a match
 * offset maps back to a source line by counting newlines.
 */
export function toCheckableText(content: string, lineCount: number): string {
  const lines = new Array<string>(lineCount).fill('');
  for (const { text, line } of extractLineTexts(content)) {
    if (line <= lineCount) {
      lines[line - 1] = text;
    }
  }
  return lines.join('\n');
}

export function offsetToLine(text: string, offset: number): number {
  let line = 1;
  const end = Math.min(offset, text.length);
  for (let i = 0; i < end; i++) {
    if (text[i] === '\n') line++;
  }
  return line;
}

export function parseMatches(data: unknown): LanguageToolMatch[] {
  if (!isRecord(data) || !Array.isArray(data.matches)) {
    throw new Error('LanguageTool response has no matches array');
  }

  const matches: LanguageToolMatch[] = [];
  for (const entry of data.matches) {
    if (!isRecord(entry) || typeof entry.offset !== 'number' || typeof entry.length !== 'number') {
      continue;
    }
    const replacements = Array.isArray(entry.replacements)
      ? entry.replacements.flatMap(r => (isRecord(r) && typeof r.value === 'string' ? [r.value] : []))
      : [];
    const match: LanguageToolMatch = {
      message: typeof entry.message === 'string' ? entry.message : '',
      offset: entry.offset,
      length: entry.length,
      replacements,
    };
    if (isRecord(entry.rule) && typeof entry.rule.id === 'string') {
      match.ruleId = entry.rule.id;
    }
    matches.push(match);
  }
  return matches;
}

/**
 * Convert matches on the plain text back to issues on the source document.
 * The column is where the flagged text first occurs in the source line, or 1
 * when markup in the source hides it.
 */
export function matchesToIssues(
  document: Document,
  plainText: string,
  matches: readonly LanguageToolMatch[],
  rules: LanguageToolRules
): Issue[] {
  const ignored = new Set(rules.ignoreWords.map(word => word.toLowerCase()));
  const issues: Issue[] = [];

  for (const match of matches) {
    const flagged = plainText.slice(match.offset, match.offset + match.length);
    if (ignored.has(flagged.toLowerCase())) continue;

    const line = offsetToLine(plainText, match.offset);
    const source = document.lines[line - 1] ?? '';
    const found = flagged ? source.indexOf(flagged) : -1;

    const issue: Issue = {
      tool: 'languagetool',
      type: 'grammar',
      file: document.path,
      line,
      col: found >= 0 ? found + 1 : 1,
      severity: 'warning',
      message: match.message,
    };
    if (match.ruleId) issue.code = match.ruleId;
    if (match.replacements.length > 0) {
      issue.suggestion = match.replacements.slice(0, MAX_SUGGESTIONS).join('; ');
    }
    issues.push(issue);
  }
  return issues;
}

const axiosPoster: FormPoster = async (url, form) => {
  const response = await axios.post<unknown>(url, form.toString(), {
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    timeout: REQUEST_TIMEOUT_MS,
  });
  return response.data;
};

export function createLanguageToolTool(
  post: FormPoster = axiosPoster,
  url: () => string = languageToolUrl
): CheckTool {
  return {
    name: 'languagetool',

    async run(documents: readonly Document[], context: ToolContext): Promise<Issue[]> {
      if (documents.length === 0) return [];

      const rules = await loadLanguageToolRules(context.root, context.config.checks.configDir);
      const endpoint = url();
      const issues: Issue[] = [];

      for (const [index, document] of documents.entries()) {
        const plainText = toCheckableText(document.content, document.lines.length);
        if (!plainText.trim()) continue;

        const form = new URLSearchParams({
          text: plainText,
          language: context.config.languages.primary,
        });
        if (rules.disabledRules.length > 0) form.set('disabledRules', rules.disabledRules.join(','));
        if (rules.enabledRules.length > 0) form.set('enabledRules', rules.enabledRules.join(','));

        try {
          const data = await post(endpoint, form);
          issues.push(...matchesToIssues(document, plainText, parseMatches(data), rules));
        } catch (error) {
          const reason = error instanceof Error ? error.message : 'Unknown error';
          logger.warn('languagetool', 'LanguageTool request failed', { document: document.path, endpoint, error: reason });

          // A server that cannot be reached fails every remaining document the same way.
          if (axios.isAxiosError(error) && !error.response) {
            issues.push(...failureForAll('languagetool', documents.slice(index), `LanguageTool unreachable at ${endpoint}: ${reason}`));
            break;
          }
          issues.push(toolFailureIssue('languagetool', document.path, `LanguageTool check failed: ${reason}`));
        }
      }

      return issues;
    },
  };
}
