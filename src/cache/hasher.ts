import crypto from 'crypto';

export const LINE_DIGEST_LENGTH = 16;
export const DOCUMENT_DIGEST_LENGTH = 32;
export const SEGMENT_DIGEST_LENGTH = 16;

function sha256(text: string): string {
  return crypto
    .createHash('sha256')
    .update(text, 'utf8')
    .digest('hex');
}

/**
 * Digest of a single line with surrounding whitespace trimmed, so that
 * re-indentation alone does not count as a change.
 */
export function hashLine(text: string): string {
  return sha256(text.trim()).substring(0, LINE_DIGEST_LENGTH);
}

/**
 * Digest of the raw document content. Only used to short-circuit documents
 * that did not change at all.
 */
export function hashDocument(content: string): string {
  return sha256(content).substring(0, DOCUMENT_DIGEST_LENGTH);
}

/**
 * Digest of the exact segment text. Whitespace is significant.
 */
export function hashSegment(text: string): string {
  return sha256(text).substring(0, SEGMENT_DIGEST_LENGTH);
}

export function isDigest(value: string, length: number): boolean {
  return value.length === length && /^[0-9a-f]+$/.test(value);
}
