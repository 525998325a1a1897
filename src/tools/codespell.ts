import type { Document, Issue } from '../types.js';
import { runProcess } from './process.js';
import { ToolExecutionError, failureForAll, type CheckTool, type ToolContext } from './types.js';

// paper.tex:10: teh ==> the
const OUTPUT_PATTERN = /^(.*?):(\d+):\s+(.*)$/;
const CORRECTION_PATTERN = /^(\S+)\s+==>\s+(.+)$/;

export function parseCodespellOutput(output: string): Issue[] {
  const issues: Issue[] = [];
  for (const raw of output.split('\n')) {
    const match = OUTPUT_PATTERN.exec(raw.trim());
    if (!match) continue;
    const [, file, line, message] = match;
    const issue: Issue = {
      tool: 'codespell',
      type: 'typo',
      file,
      line: Number(line),
      col: 0,
      severity: 'warning',
      message,
    };
    const correction = CORRECTION_PATTERN.exec(message);
    if (correction) {
      issue.suggestion = correction[2].trim();
    }
    issues.push(issue);
  }
  return issues;
}

export const codespellTool: CheckTool = {
  name: 'codespell',

  async run(documents: readonly Document[], context: ToolContext): Promise<Issue[]> {
    if (documents.length === 0) return [];

    try {
      const output = await runProcess('codespell', 'codespell', documents.map(d => d.path), context.root);
      return parseCodespellOutput(output.stdout + output.stderr);
    } catch (error) {
      if (error instanceof ToolExecutionError) {
        return failureForAll('codespell', documents, error.message);
      }
      throw error;
    }
  },
};
