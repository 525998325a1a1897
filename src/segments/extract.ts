import type { Document, Segment } from '../types.js';
import { latexLineToText, maskNonProse } from './latex.js';
import { chunkSentences, splitSentences, type ChunkOptions, type LineText } from './sentences.js';

export const DEFAULT_CHUNK_OPTIONS: ChunkOptions = {
  maxChars: 4000,
  overlapSentences: 1,
};

export function extractLineTexts(content: string): LineText[] {
  const masked = maskNonProse(content);
  const result: LineText[] = [];
  masked.split(/\r\n|\r|\n/).forEach((raw, index) => {
    if (!raw.trim()) return;
    const text = latexLineToText(raw);
    if (text) {
      result.push({ text, line: index + 1 });
    }
  });
  return result;
}

/**
 * Produce the LLM review units of a document. Boundaries are recomputed on
 * every run; the cache recognises a segment only by its exact text.
 */
export function extractSegments(document: Document, options: ChunkOptions = DEFAULT_CHUNK_OPTIONS): Segment[] {
  const lines = extractLineTexts(document.content);
  if (lines.length === 0) {
    return [];
  }

  const sentences = splitSentences(lines);
  return chunkSentences(sentences, options).map(chunk => ({
    text: chunk.text,
    file: document.path,
    startLine: chunk.startLine,
  }));
}
