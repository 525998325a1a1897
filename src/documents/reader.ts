import fs from 'fs/promises';
import path from 'path';
import { hashDocument } from '../cache/hasher.js';
import type { Document } from '../types.js';
import { DocumentReadError } from './types.js';

/**
 * Split on \n, \r\n or \r. A trailing line break does not start another
 * line, matching how editors number lines.
 */
export function splitLines(content: string): string[] {
  if (content.length === 0) {
    return [];
  }
  const lines = content.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export function toDocument(documentPath: string, content: string): Document {
  return {
    path: documentPath,
    content,
    lines: splitLines(content),
    digest: hashDocument(content),
  };
}

/**
 * Read a document relative to the project root. The returned path is the
 * root-relative, forward-slash form used as the cache key.
 */
export async function readDocument(root: string, documentPath: string): Promise<Document> {
  const key = toDocumentKey(root, documentPath);
  let content: string;
  try {
    content = await fs.readFile(path.resolve(root, key), 'utf-8');
  } catch (error) {
    throw new DocumentReadError(key, error instanceof Error ? error.message : 'Unknown error');
  }
  return toDocument(key, content);
}

export function toDocumentKey(root: string, documentPath: string): string {
  const relative = path.relative(path.resolve(root), path.resolve(root, documentPath));
  return relative.split(path.sep).join('/');
}
