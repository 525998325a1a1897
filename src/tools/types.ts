import type { DraftlintConfig } from '../config/types.js';
import type { Document, Issue, Severity } from '../types.js';

export interface ToolContext {
  root: string;
  config: DraftlintConfig;
}

export interface CheckTool {
  readonly name: string;
  run(documents: readonly Document[], context: ToolContext): Promise<Issue[]>;
}

export class ToolExecutionError extends Error {
  constructor(
    public readonly tool: string,
    public readonly reason: string
  ) {
    super(`${tool} failed: ${reason}`);
    this.name = 'ToolExecutionError';
  }
}

export function toolFailureIssue(tool: string, file: string, message: string): Issue {
  return {
    tool,
    type: 'tool_failure',
    file,
    line: 0,
    col: 0,
    severity: 'error',
    message,
  };
}

export function failureForAll(tool: string, documents: readonly Document[], message: string): Issue[] {
  return documents.map(document => toolFailureIssue(tool, document.path, message));
}

export function normalizeSeverity(value: unknown): Severity {
  if (typeof value !== 'string') return 'note';
  const lowered = value.toLowerCase();
  if (lowered === 'error') return 'error';
  if (lowered === 'warning' || lowered === 'warn') return 'warning';
  return 'note';
}
