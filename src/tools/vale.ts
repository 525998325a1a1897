import path from 'path';
import type { Document, Issue } from '../types.js';
import { runProcess } from './process.js';
import { ToolExecutionError, failureForAll, normalizeSeverity, type CheckTool, type ToolContext } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse `vale --output=JSON`: an object keyed by file name holding alert lists.
 * Returns null when the output is not JSON of that shape.
 */
export function parseValeOutput(stdout: string): Issue[] | null {
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch {
    return null;
  }
  if (!isRecord(data)) return null;

  const issues: Issue[] = [];
  for (const [file, alerts] of Object.entries(data)) {
    if (!Array.isArray(alerts)) continue;
    for (const alert of alerts) {
      if (!isRecord(alert)) continue;
      const span = Array.isArray(alert.Span) && typeof alert.Span[0] === 'number' ? alert.Span[0] : 0;
      const issue: Issue = {
        tool: 'vale',
        type: 'style',
        file,
        line: typeof alert.Line === 'number' ? alert.Line : 0,
        col: span,
        severity: normalizeSeverity(alert.Severity),
        message: typeof alert.Message === 'string' ? alert.Message : '',
      };
      if (typeof alert.Check === 'string') issue.code = alert.Check;
      issues.push(issue);
    }
  }
  return issues;
}

export const valeTool: CheckTool = {
  name: 'vale',

  async run(documents: readonly Document[], context: ToolContext): Promise<Issue[]> {
    if (documents.length === 0) return [];

    const configFile = path.join(context.config.checks.configDir, 'vale.ini');
    const args = ['--no-exit', '--output=JSON', `--config=${configFile}`, ...documents.map(d => d.path)];

    try {
      const output = await runProcess('vale', 'vale', args, context.root);
      const issues = parseValeOutput(output.stdout);
      if (issues === null) {
        const reason = output.stderr.trim() || 'unexpected output';
        return failureForAll('vale', documents, `vale execution failed: ${reason}`);
      }
      return issues;
    } catch (error) {
      if (error instanceof ToolExecutionError) {
        return failureForAll('vale', documents, error.message);
      }
      throw error;
    }
  },
};
