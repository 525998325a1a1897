import path from 'path';
import { logger } from '../observability/logger.js';
import type { Document, Issue } from '../types.js';
import { runProcess } from './process.js';
import { ToolExecutionError, failureForAll, type CheckTool, type ToolContext } from './types.js';

/**
 * Formatting check. latexindent exits non-zero in check mode when the file
 * would be reformatted; the finding applies to the whole document (line 0).
 */
export const latexindentTool: CheckTool = {
  name: 'latexindent',

  async run(documents: readonly Document[], context: ToolContext): Promise<Issue[]> {
    const settings = path.join(context.config.checks.configDir, '.latexindent.yaml');
    const issues: Issue[] = [];

    for (const [index, document] of documents.entries()) {
      try {
        const output = await runProcess(
          'latexindent',
          'latexindent',
          [`-l=${settings}`, '-c=/tmp', '-k', '-s', document.path],
          context.root
        );
        if (output.exitCode !== 0) {
          issues.push({
            tool: 'latexindent',
            type: 'formatting',
            file: document.path,
            line: 0,
            col: 0,
            severity: 'warning',
            message: 'File is not formatted correctly. Run latexindent to correct it.',
          });
        }
      } catch (error) {
        if (error instanceof ToolExecutionError) {
          issues.push(...failureForAll('latexindent', documents.slice(index), error.message));
          break;
        }
        throw error;
      }
    }

    return issues;
  },
};

export interface FormatResult {
  formatted: string[];
  failed: string[];
}

/**
 * Rewrite documents in place with latexindent. A document latexindent exits
 * non-zero on is left as it was and listed under `failed`; a binary that
 * cannot start throws ToolExecutionError.
 */
export async function formatDocuments(
  paths: readonly string[],
  root: string,
  configDir: string
): Promise<FormatResult> {
  const settings = path.join(configDir, '.latexindent.yaml');
  const result: FormatResult = { formatted: [], failed: [] };

  for (const documentPath of paths) {
    const output = await runProcess(
      'latexindent',
      'latexindent',
      [`-l=${settings}`, '-c=/tmp', '-w', '-s', documentPath],
      root
    );
    if (output.exitCode === 0) {
      result.formatted.push(documentPath);
    } else {
      logger.warn('format', 'latexindent could not format document', {
        document: documentPath,
        exitCode: output.exitCode,
        stderr: output.stderr.trim(),
      });
      result.failed.push(documentPath);
    }
  }

  return result;
}
