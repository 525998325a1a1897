import { describe, expect, it } from 'vitest';
import { findCommentStart, latexLineToText, maskComments, maskNonProse } from './latex.js';

describe('findCommentStart', () => {
  it('skips escaped percent signs', () => {
    expect(findCommentStart('100\\% sure % note')).toBe(11);
    expect(findCommentStart('no comment here')).toBe(-1);
    expect(findCommentStart('% whole line')).toBe(0);
  });
});

describe('maskComments', () => {
  it('blanks comments without changing line lengths', () => {
    expect(maskComments('100\\% sure % note')).toBe(`100\\% sure ${' '.repeat(6)}`);
    expect(maskComments('a\n% b\nc')).toBe('a\n   \nc');
  });
});

describe('maskNonProse', () => {
  it('keeps the line structure while hiding preamble, math and trailer', () => {
    const source = [
      '\\documentclass{article}',
      '\\begin{document}',
      'Prose line.',
      '\\begin{equation}',
      'x = y',
      '\\end{equation}',
      '\\end{document}',
      'After the end.',
    ].join('\n');

    const masked = maskNonProse(source).split('\n');

    expect(masked).toHaveLength(8);
    expect(masked[0].trim()).toBe('');
    expect(masked[2]).toBe('Prose line.');
    expect(masked[4].trim()).toBe('');
    expect(masked[7].trim()).toBe('');
  });

  it('hides \\maketitle and display math', () => {
    expect(maskNonProse('\\maketitle Hello').trim()).toBe('Hello');
    expect(maskNonProse('A \\[ x^2 \\] B').replace(/\s+/g, ' ')).toBe('A B');
  });
});

describe('latexLineToText', () => {
  it('unwraps text macros and drops inline math', () => {
    expect(latexLineToText('Energy $E = mc^2$ is \\emph{conserved}.')).toBe('Energy is conserved.');
  });

  it('drops references and citations with their arguments', () => {
    expect(latexLineToText('See \\cite{knuth} and Fig.~\\ref{fig:a}.')).toBe('See and Fig. .');
  });

  it('keeps escaped special characters', () => {
    expect(latexLineToText('50\\% of cases')).toBe('50% of cases');
  });

  it('reduces structural lines to nothing', () => {
    expect(latexLineToText('\\begin{itemize}')).toBe('');
  });
});
