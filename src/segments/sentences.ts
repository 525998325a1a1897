export interface LineText {
  text: string;
  line: number;
}

export interface Sentence {
  text: string;
  startLine: number;
}

export interface Chunk {
  text: string;
  startLine: number;
}

export interface ChunkOptions {
  maxChars: number;
  overlapSentences: number;
}

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

/**
 * Join line texts and cut them into sentences. Each sentence remembers the
 * line it started on; a sentence may span several lines.
 */
export function splitSentences(lines: readonly LineText[]): Sentence[] {
  const sentences: Sentence[] = [];
  let buffer = '';
  let startLine: number | null = null;

  for (const { text, line } of lines) {
    if (!text) continue;

    if (!buffer) {
      startLine = line;
      buffer = text;
    } else {
      buffer = `${buffer} ${text}`;
    }

    const parts = buffer.split(SENTENCE_BOUNDARY);
    if (parts.length === 1) continue;

    for (const part of parts.slice(0, -1)) {
      const sentence = part.trim();
      if (sentence) {
        sentences.push({ text: sentence, startLine: startLine ?? line });
      }
      startLine = line;
    }

    buffer = parts[parts.length - 1].trim();
    if (!buffer) {
      startLine = null;
    }
  }

  if (buffer) {
    sentences.push({ text: buffer, startLine: startLine ?? lines[lines.length - 1].line });
  }

  return sentences;
}

/**
 * Pack sentences into chunks of at most `maxChars` characters (a single
 * longer sentence becomes its own chunk). When a chunk is closed, its last
 * `overlapSentences` sentences open the next one.
 */
export function chunkSentences(sentences: readonly Sentence[], options: ChunkOptions): Chunk[] {
  const chunks: Chunk[] = [];
  let current: Sentence[] = [];
  let currentLength = 0;

  const flush = (): void => {
    if (current.length === 0) return;
    const text = current.map(s => s.text).join(' ').trim();
    if (text) {
      chunks.push({ text, startLine: current[0].startLine });
    }
    current = [];
    currentLength = 0;
  };

  for (const sentence of sentences) {
    const text = sentence.text.trim();
    if (!text) continue;

    const addLength = text.length + (current.length > 0 ? 1 : 0);
    if (current.length > 0 && currentLength + addLength > options.maxChars) {
      const tail = options.overlapSentences > 0 ? current.slice(-options.overlapSentences) : [];
      flush();
      current = [...tail];
      currentLength = current.reduce((sum, s) => sum + s.text.length, 0) + Math.max(0, current.length - 1);
    }

    if (current.length === 0) {
      current = [{ text, startLine: sentence.startLine }];
      currentLength = text.length;
    } else {
      current.push({ text, startLine: sentence.startLine });
      currentLength += text.length + 1;
    }
  }

  flush();
  return chunks;
}
