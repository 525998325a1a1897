import pc from 'picocolors';
import { isActive, type FixSummary, type ReviewReport } from '../review/report.js';
import type { Issue, Severity } from '../types.js';

type Colors = ReturnType<typeof pc.createColors>;

function location(issue: Issue): string {
  if (issue.line === 0) return issue.file;
  return issue.col > 0 ? `${issue.file}:${issue.line}:${issue.col}` : `${issue.file}:${issue.line}`;
}

function paintSeverity(colors: Colors, severity: Severity): string {
  switch (severity) {
    case 'error':
      return colors.red('error');
    case 'warning':
      return colors.yellow('warning');
    case 'note':
      return colors.cyan('note');
  }
}

export function describeFixes(fixes: FixSummary): string {
  const parts = [
    `${fixes.formatted.length} document(s) formatted`,
    `${fixes.fixedLines} line(s) fixed`,
    `${fixes.annotatedLines} line(s) annotated`,
  ];
  if (fixes.formatFailed.length > 0) {
    parts.push(`latexindent failed on ${fixes.formatFailed.join(', ')}`);
  }
  return parts.join(', ');
}

/**
 * Terminal listing of active issues followed by the summary line.
 */
export function formatText(report: ReviewReport, useColor = false): string {
  const colors = pc.createColors(useColor);
  const lines: string[] = [];
  const hidden = report.issues.filter(issue => !isActive(issue)).length;

  for (const issue of report.issues) {
    if (!isActive(issue)) continue;
    const code = issue.code ? ` ${colors.dim(`(${issue.code})`)}` : '';
    lines.push(`${location(issue)}  ${paintSeverity(colors, issue.severity)}  ${issue.message}  ${colors.dim(`[${issue.tool}]`)}${code}`);
    if (issue.suggestion) {
      lines.push(`  ${colors.dim('suggestion:')} ${issue.suggestion}`);
    }
    if (issue.adjudication?.fix) {
      lines.push(`  ${colors.dim('fix:')} ${issue.adjudication.fix}`);
    }
  }

  if (lines.length > 0) lines.push('');

  const { errors, warnings, notes } = report.summary;
  let summary = `${errors} error(s), ${warnings} warning(s), ${notes} note(s)`;
  if (hidden > 0) summary += colors.dim(`, ${hidden} suppressed or rejected`);
  lines.push(summary);

  const cache = report.cache;
  if (cache.enabled) {
    lines.push(colors.dim(
      `cache: ${cache.documentsSkipped} unchanged, ${cache.documentsPartial} partial, ${cache.documentsFull} full; ` +
      `${cache.linesReused} line(s) reused, ${cache.segmentsCached} segment(s) reused`
    ));
  }
  if (report.fixes) {
    lines.push(colors.green(describeFixes(report.fixes)));
  }

  return lines.join('\n');
}

export function formatMarkdown(report: ReviewReport): string {
  const sections: string[] = [];

  sections.push('## Review Report\n');

  const { errors, warnings, notes } = report.summary;
  sections.push(`**${errors}** errors, **${warnings}** warnings, **${notes}** notes\n`);

  const byFile = new Map<string, Issue[]>();
  for (const issue of report.issues) {
    if (!isActive(issue)) continue;
    const bucket = byFile.get(issue.file);
    if (bucket) {
      bucket.push(issue);
    } else {
      byFile.set(issue.file, [issue]);
    }
  }

  for (const [file, issues] of byFile) {
    sections.push(`### ${file}`);
    issues.forEach(issue => {
      const where = issue.line === 0 ? 'file' : `line ${issue.line}`;
      let entry = `- **${issue.severity}** (${where}, ${issue.tool}): ${issue.message}`;
      if (issue.suggestion) entry += ` _Suggestion:_ ${issue.suggestion}`;
      sections.push(entry);
    });
    sections.push('');
  }

  const suppressed = report.issues.filter(issue => issue.suppressed).length;
  if (suppressed > 0) {
    sections.push(`_${suppressed} suppressed issue(s) not shown_`);
  }

  if (report.fixes) {
    sections.push(`_${describeFixes(report.fixes)}_`);
  }

  sections.push('---');
  sections.push(`_Reused ${report.cache.linesReused} line(s) and ${report.cache.segmentsCached} segment(s) from the review cache_`);

  return sections.join('\n');
}
