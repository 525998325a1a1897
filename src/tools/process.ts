import { execa } from 'execa';
import { logger } from '../observability/logger.js';
import { ToolExecutionError } from './types.js';

export interface ProcessOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Run a checker binary to completion. Non-zero exit codes are returned, since
 * most linters use them to signal findings; failing to start is an error.
 */
export async function runProcess(
  tool: string,
  command: string,
  args: readonly string[],
  cwd: string
): Promise<ProcessOutput> {
  logger.info('tool_invocation', `Running ${tool}`, { command, argCount: args.length });

  const result = await execa(command, args, { cwd, reject: false, stripFinalNewline: false });

  if (result.exitCode === undefined) {
    throw new ToolExecutionError(tool, result.shortMessage);
  }

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode,
  };
}
