import type { ChecksConfig } from '../config/types.js';
import { chktexTool } from './chktex.js';
import { codespellTool } from './codespell.js';
import { createLanguageToolTool } from './languagetool.js';
import { latexindentTool } from './latexindent.js';
import type { CheckTool } from './types.js';
import { valeTool } from './vale.js';

export function createTools(checks: ChecksConfig): CheckTool[] {
  const tools: CheckTool[] = [];
  if (checks.chktex) tools.push(chktexTool);
  if (checks.vale) tools.push(valeTool);
  if (checks.codespell) tools.push(codespellTool);
  if (checks.latexindent) tools.push(latexindentTool);
  if (checks.languagetool) tools.push(createLanguageToolTool());
  return tools;
}
