import { afterEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { toDocument } from '../documents/reader.js';
import { chktexTool } from './chktex.js';
import { formatDocuments, latexindentTool } from './latexindent.js';
import { runProcess } from './process.js';
import { ToolExecutionError } from './types.js';

vi.mock('./process.js', () => ({ runProcess: vi.fn() }));

const context = { root: '/project', config: DEFAULT_CONFIG };
const documents = [toDocument('a.tex', 'A.\n'), toDocument('b.tex', 'B.\n')];

describe('process-based tools', () => {
  afterEach(() => {
    vi.mocked(runProcess).mockReset();
  });

  it('passes document keys to the binary and parses its output', async () => {
    vi.mocked(runProcess).mockResolvedValue({
      stdout: 'a.tex:1:2:Warning:8:Wrong length of dash.\n',
      stderr: '',
      exitCode: 2,
    });

    const issues = await chktexTool.run(documents, context);

    expect(issues).toHaveLength(1);
    expect(issues[0].code).toBe('chktex:8');
    const [tool, command, args, cwd] = vi.mocked(runProcess).mock.calls[0];
    expect([tool, command, cwd]).toEqual(['chktex', 'chktex', '/project']);
    expect(args.slice(-2)).toEqual(['a.tex', 'b.tex']);
  });

  it('reports a binary that cannot start as a failure on every document', async () => {
    vi.mocked(runProcess).mockRejectedValue(new ToolExecutionError('chktex', 'spawn chktex ENOENT'));

    const issues = await chktexTool.run(documents, context);

    expect(issues).toEqual([
      { tool: 'chktex', type: 'tool_failure', file: 'a.tex', line: 0, col: 0, severity: 'error', message: 'chktex failed: spawn chktex ENOENT' },
      { tool: 'chktex', type: 'tool_failure', file: 'b.tex', line: 0, col: 0, severity: 'error', message: 'chktex failed: spawn chktex ENOENT' },
    ]);
  });

  it('does not run at all without documents', async () => {
    expect(await chktexTool.run([], context)).toEqual([]);
    expect(runProcess).not.toHaveBeenCalled();
  });

  it('flags documents latexindent would reformat', async () => {
    vi.mocked(runProcess)
      .mockResolvedValueOnce({ stdout: '', stderr: '', exitCode: 0 })
      .mockResolvedValueOnce({ stdout: '', stderr: '', exitCode: 1 });

    const issues = await latexindentTool.run(documents, context);

    expect(issues).toEqual([{
      tool: 'latexindent',
      type: 'formatting',
      file: 'b.tex',
      line: 0,
      col: 0,
      severity: 'warning',
      message: 'File is not formatted correctly. Run latexindent to correct it.',
    }]);
  });

  it('formats documents in place and lists the ones latexindent rejects', async () => {
    vi.mocked(runProcess)
      .mockResolvedValueOnce({ stdout: '', stderr: '', exitCode: 0 })
      .mockResolvedValueOnce({ stdout: '', stderr: 'syntax error', exitCode: 1 });

    const result = await formatDocuments(['a.tex', 'b.tex'], '/project', 'configs');

    expect(result).toEqual({ formatted: ['a.tex'], failed: ['b.tex'] });
    expect(vi.mocked(runProcess).mock.calls[0]).toEqual([
      'latexindent',
      'latexindent',
      ['-l=configs/.latexindent.yaml', '-c=/tmp', '-w', '-s', 'a.tex'],
      '/project',
    ]);
  });
});
