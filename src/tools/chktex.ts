import path from 'path';
import type { Document, Issue } from '../types.js';
import { runProcess } from './process.js';
import { ToolExecutionError, failureForAll, type CheckTool, type ToolContext } from './types.js';

const OUTPUT_PATTERN = /^(.*?):(\d+):(\d+):(Warning|Error|Message):(\d+):(.*)$/;

export function parseChktexOutput(stdout: string): Issue[] {
  const issues: Issue[] = [];
  for (const raw of stdout.split('\n')) {
    const match = OUTPUT_PATTERN.exec(raw.trim());
    if (!match) continue;
    const [, file, line, col, kind, number, message] = match;
    issues.push({
      tool: 'chktex',
      type: 'latex_lint',
      code: `chktex:${number}`,
      file,
      line: Number(line),
      col: Number(col),
      severity: kind === 'Error' ? 'error' : kind === 'Warning' ? 'warning' : 'note',
      message: message.trim(),
    });
  }
  return issues;
}

export const chktexTool: CheckTool = {
  name: 'chktex',

  async run(documents: readonly Document[], context: ToolContext): Promise<Issue[]> {
    if (documents.length === 0) return [];

    const rcFile = path.join(context.config.checks.configDir, '.chktexrc');
    const args = ['-q', '-I', '-v0', '-l', rcFile, '-f%f:%l:%c:%k:%n:%m\n', ...documents.map(d => d.path)];

    try {
      const output = await runProcess('chktex', 'chktex', args, context.root);
      return parseChktexOutput(output.stdout);
    } catch (error) {
      if (error instanceof ToolExecutionError) {
        return failureForAll('chktex', documents, error.message);
      }
      throw error;
    }
  },
};
