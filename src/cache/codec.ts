import type { Adjudication } from '../types.js';
import {
  DOCUMENT_DIGEST_LENGTH,
  LINE_DIGEST_LENGTH,
  SEGMENT_DIGEST_LENGTH,
  isDigest,
} from './hasher.js';
import { isSeverity } from './records.js';
import {
  CacheFormatError,
  UNSETTLED_FILE_DIGEST,
  type CacheSnapshot,
  type DocumentSnapshot,
  type IssueRecord,
  type LineRecord,
  type SegmentRecord,
  type SerializedCacheSnapshot,
  type SerializedDocumentSnapshot,
  type SerializedIssueRecord,
} from './types.js';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, field: string): Record<string, unknown> {
  if (!isObject(value)) {
    throw new CacheFormatError(field, 'must be an object');
  }
  return value;
}

function expectString(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw new CacheFormatError(field, 'must be a string');
  }
  return value;
}

function expectDigest(value: unknown, field: string, length: number): string {
  const digest = expectString(value, field);
  if (!isDigest(digest, length)) {
    throw new CacheFormatError(field, `must be ${length} lowercase hex characters`);
  }
  return digest;
}

function expectInteger(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new CacheFormatError(field, 'must be a non-negative integer');
  }
  return value;
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  return expectString(value, field);
}

function parseAdjudication(value: unknown, field: string): Adjudication | undefined {
  if (value === undefined || value === null) return undefined;
  const raw = expectObject(value, field);
  if (typeof raw.accept !== 'boolean') {
    throw new CacheFormatError(`${field}.accept`, 'must be a boolean');
  }
  const adjudication: Adjudication = { accept: raw.accept };
  const fix = optionalString(raw.fix, `${field}.fix`);
  const comment = optionalString(raw.comment, `${field}.comment`);
  if (fix !== undefined) adjudication.fix = fix;
  if (comment !== undefined) adjudication.comment = comment;
  return adjudication;
}

function parseIssueRecord(value: unknown, field: string): IssueRecord {
  const raw = expectObject(value, field);
  if (!isSeverity(raw.severity)) {
    throw new CacheFormatError(`${field}.severity`, 'must be error, warning or note');
  }
  const record: IssueRecord = {
    tool: expectString(raw.tool, `${field}.tool`),
    type: expectString(raw.type, `${field}.type`),
    col: raw.col === undefined ? 0 : expectInteger(raw.col, `${field}.col`),
    severity: raw.severity,
    message: expectString(raw.message, `${field}.message`),
  };
  const code = optionalString(raw.code, `${field}.code`);
  const suggestion = optionalString(raw.suggestion, `${field}.suggestion`);
  const adjudication = parseAdjudication(raw.adjudication, `${field}.adjudication`);
  if (code !== undefined) record.code = code;
  if (suggestion !== undefined) record.suggestion = suggestion;
  if (adjudication !== undefined) record.adjudication = adjudication;
  return record;
}

function parseIssues(value: unknown, field: string): IssueRecord[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new CacheFormatError(field, 'must be an array');
  }
  return value.map((item, index) => parseIssueRecord(item, `${field}[${index}]`));
}

function parseDocumentSnapshot(value: unknown, field: string): DocumentSnapshot {
  const raw = expectObject(value, field);
  const lines = new Map<number, LineRecord>();
  const segments = new Map<string, SegmentRecord>();

  const rawLines = raw.lines === undefined ? {} : expectObject(raw.lines, `${field}.lines`);
  for (const [key, entry] of Object.entries(rawLines)) {
    const lineNumber = Number(key);
    if (!Number.isInteger(lineNumber) || lineNumber < 1) {
      throw new CacheFormatError(`${field}.lines`, `invalid line number key "${key}"`);
    }
    const line = expectObject(entry, `${field}.lines.${key}`);
    lines.set(lineNumber, {
      lineNumber,
      contentDigest: expectDigest(line.content_hash, `${field}.lines.${key}.content_hash`, LINE_DIGEST_LENGTH),
      issues: parseIssues(line.issues, `${field}.lines.${key}.issues`),
    });
  }

  const rawSegments = raw.segments === undefined ? {} : expectObject(raw.segments, `${field}.segments`);
  for (const [key, entry] of Object.entries(rawSegments)) {
    const segment = expectObject(entry, `${field}.segments.${key}`);
    const segmentDigest = expectDigest(segment.segment_hash, `${field}.segments.${key}.segment_hash`, SEGMENT_DIGEST_LENGTH);
    if (segmentDigest !== key) {
      throw new CacheFormatError(`${field}.segments.${key}`, 'segment_hash does not match its key');
    }
    segments.set(key, {
      segmentDigest,
      startLine: expectInteger(segment.start_line, `${field}.segments.${key}.start_line`),
      issues: parseIssues(segment.issues, `${field}.segments.${key}.issues`),
    });
  }

  const fileDigest = raw.file_hash === UNSETTLED_FILE_DIGEST
    ? UNSETTLED_FILE_DIGEST
    : expectDigest(raw.file_hash, `${field}.file_hash`, DOCUMENT_DIGEST_LENGTH);

  return {
    fileDigest,
    lineCount: expectInteger(raw.line_count, `${field}.line_count`),
    lines,
    segments,
    documentIssues: parseIssues(raw.document_issues, `${field}.document_issues`),
  };
}

/**
 * Validate parsed JSON against the persisted cache layout. Throws
 * CacheFormatError on the first field that does not fit.
 */
export function parseCacheSnapshot(value: unknown): CacheSnapshot {
  const raw = expectObject(value, 'root');
  const documents = new Map<string, DocumentSnapshot>();
  const files = raw.files === undefined ? {} : expectObject(raw.files, 'files');

  for (const [path, entry] of Object.entries(files)) {
    documents.set(path, parseDocumentSnapshot(entry, `files.${path}`));
  }

  return {
    version: expectString(raw.version, 'version'),
    timestamp: raw.timestamp === undefined ? '' : expectString(raw.timestamp, 'timestamp'),
    documents,
  };
}

function serializeIssue(record: IssueRecord): SerializedIssueRecord {
  const out: SerializedIssueRecord = {
    tool: record.tool,
    type: record.type,
    col: record.col,
    severity: record.severity,
    message: record.message,
  };
  if (record.code !== undefined) out.code = record.code;
  if (record.suggestion !== undefined) out.suggestion = record.suggestion;
  if (record.adjudication !== undefined) out.adjudication = record.adjudication;
  return out;
}

function serializeDocument(document: DocumentSnapshot): SerializedDocumentSnapshot {
  const lines: SerializedDocumentSnapshot['lines'] = {};
  const lineNumbers = [...document.lines.keys()].sort((a, b) => a - b);
  for (const lineNumber of lineNumbers) {
    const record = document.lines.get(lineNumber);
    if (!record) continue;
    lines[String(lineNumber)] = {
      content_hash: record.contentDigest,
      issues: record.issues.map(serializeIssue),
    };
  }

  const segments: SerializedDocumentSnapshot['segments'] = {};
  const digests = [...document.segments.keys()].sort();
  for (const digest of digests) {
    const record = document.segments.get(digest);
    if (!record) continue;
    segments[digest] = {
      segment_hash: record.segmentDigest,
      start_line: record.startLine,
      issues: record.issues.map(serializeIssue),
    };
  }

  return {
    file_hash: document.fileDigest,
    line_count: document.lineCount,
    lines,
    segments,
    document_issues: document.documentIssues.map(serializeIssue),
  };
}

/**
 * Serialize with document paths, line numbers and segment digests in sorted
 * order so the output does not depend on the order documents finished in.
 */
export function serializeCacheSnapshot(snapshot: CacheSnapshot): SerializedCacheSnapshot {
  const files: SerializedCacheSnapshot['files'] = {};
  const paths = [...snapshot.documents.keys()].sort();
  for (const path of paths) {
    const document = snapshot.documents.get(path);
    if (!document) continue;
    files[path] = serializeDocument(document);
  }

  return {
    version: snapshot.version,
    timestamp: snapshot.timestamp,
    files,
  };
}
