const MATH_ENVIRONMENTS = [
  'equation', 'equation*', 'align', 'align*', 'gather', 'gather*',
  'multline', 'multline*', 'eqnarray', 'eqnarray*', 'displaymath', 'math',
];

const SKIPPED_ENVIRONMENTS = ['verbatim', 'lstlisting', 'minted', 'comment', 'tikzpicture'];

// Macros whose argument is prose worth reviewing.
const TEXT_MACROS = [
  'textbf', 'textit', 'textsc', 'texttt', 'textrm', 'textsf', 'emph', 'underline',
  'part', 'chapter', 'section', 'subsection', 'subsubsection', 'paragraph', 'subparagraph',
  'caption', 'footnote', 'title', 'item', 'mbox', 'text',
];

// Macros dropped together with their arguments.
const DROPPED_MACROS = [
  'cite', 'citep', 'citet', 'ref', 'eqref', 'autoref', 'cref', 'Cref', 'pageref', 'label',
  'url', 'href', 'includegraphics', 'input', 'include', 'bibliography', 'bibliographystyle',
  'usepackage', 'documentclass', 'newcommand', 'renewcommand', 'vspace', 'hspace',
];

function blank(text: string): string {
  return text.replace(/[^\n]/g, ' ');
}

/**
 * Index of the first % that starts a comment, or -1.
 */
export function findCommentStart(line: string): number {
  for (let i = 0; i < line.length; i++) {
    if (line[i] === '%' && (i === 0 || line[i - 1] !== '\\')) {
      return i;
    }
  }
  return -1;
}

export function maskComments(text: string): string {
  return text
    .split('\n')
    .map(line => {
      const start = findCommentStart(line);
      if (start === -1) return line;
      return line.slice(0, start) + ' '.repeat(line.length - start);
    })
    .join('\n');
}

function maskEnvironments(text: string, names: readonly string[]): string {
  let masked = text;
  for (const name of names) {
    const escaped = name.replace(/[*]/g, '\\*');
    const pattern = new RegExp(`\\\\begin\\{${escaped}\\}[\\s\\S]*?\\\\end\\{${escaped}\\}`, 'g');
    masked = masked.replace(pattern, block => blank(block));
  }
  return masked;
}

/**
 * Blank out everything a reviewer should not see while keeping every line
 * break in place: comments, the preamble, \maketitle, the text after
 * \end{document}, display math and verbatim-like blocks.
 */
export function maskNonProse(content: string): string {
  let masked = maskComments(content);

  const begin = masked.indexOf('\\begin{document}');
  if (begin !== -1) {
    masked = blank(masked.slice(0, begin)) + masked.slice(begin);
  }

  masked = masked.split('\\maketitle').join(' '.repeat('\\maketitle'.length));

  const endMarker = '\\end{document}';
  const end = masked.indexOf(endMarker);
  if (end !== -1) {
    const cut = end + endMarker.length;
    masked = masked.slice(0, cut) + blank(masked.slice(cut));
  }

  masked = maskEnvironments(masked, MATH_ENVIRONMENTS);
  masked = maskEnvironments(masked, SKIPPED_ENVIRONMENTS);
  masked = masked.replace(/\$\$[\s\S]*?\$\$/g, block => blank(block));
  masked = masked.replace(/\\\[[\s\S]*?\\\]/g, block => blank(block));

  return masked;
}

/**
 * Reduce one line of LaTeX to the prose it renders. Inline math is removed.
 */
export function latexLineToText(line: string): string {
  let text = line;

  text = text.replace(/\\\(.*?\\\)/g, ' ');
  text = text.replace(/(?<!\\)\$[^$]*(?<!\\)\$/g, ' ');
  text = text.replace(/\\(begin|end)\{[^}]*\}(\[[^\]]*\])?/g, ' ');

  const dropped = new RegExp(`\\\\(${DROPPED_MACROS.join('|')})\\*?(\\[[^\\]]*\\])*(\\{[^}]*\\})*`, 'g');
  text = text.replace(dropped, ' ');

  const kept = new RegExp(`\\\\(${TEXT_MACROS.join('|')})\\*?(\\[[^\\]]*\\])?`, 'g');
  text = text.replace(kept, '');

  text = text.replace(/\\\\/g, ' ');
  text = text.replace(/\\([%&#_$])/g, '$1');
  text = text.replace(/\\[a-zA-Z@]+\*?/g, ' ');
  text = text.replace(/\\./g, ' ');
  text = text.replace(/[{}]/g, '');
  text = text.replace(/~/g, ' ');
  text = text.replace(/``|''/g, '"');

  return text.replace(/\s+/g, ' ').trim();
}
