import type { Adjudication, Severity } from '../types.js';

export const CACHE_VERSION = '1.2';

// Stored as the file digest of a document whose last check did not complete,
// so that it never takes the whole-file skip path.
export const UNSETTLED_FILE_DIGEST = '';

/**
 * Issue as stored in the cache. File and line come from the enclosing
 * record and are attached again when the issue is read back.
 */
export interface IssueRecord {
  tool: string;
  type: string;
  col: number;
  severity: Severity;
  message: string;
  code?: string;
  suggestion?: string;
  adjudication?: Adjudication;
}

export interface LineRecord {
  lineNumber: number;
  contentDigest: string;
  issues: IssueRecord[];
}

export interface SegmentRecord {
  segmentDigest: string;
  startLine: number;
  issues: IssueRecord[];
}

export interface DocumentSnapshot {
  fileDigest: string;
  lineCount: number;
  lines: Map<number, LineRecord>;
  segments: Map<string, SegmentRecord>;
  // Findings about the whole document (line 0), e.g. formatting.
  documentIssues: IssueRecord[];
}

export interface CacheSnapshot {
  version: string;
  timestamp: string;
  documents: Map<string, DocumentSnapshot>;
}

export type LineStatus = 'unchanged' | 'new';

export interface LineClassification {
  currentLine: number;
  previousLine: number | null;
  status: LineStatus;
  contentDigest: string;
}

export interface LineChangeResult {
  classifications: LineClassification[];
  deleted: Set<number>;
}

export type SegmentStatus = 'cached' | 'fresh';

export interface SegmentClassification<S> {
  segment: S;
  digest: string;
  status: SegmentStatus;
}

export type CacheLoadFailure = 'missing' | 'unreadable' | 'invalid_json' | 'version_mismatch' | 'malformed';

// On-disk shape. Keys follow the persisted file format.

export interface SerializedIssueRecord {
  tool: string;
  type: string;
  col: number;
  severity: Severity;
  message: string;
  code?: string;
  suggestion?: string;
  adjudication?: Adjudication;
}

export interface SerializedLineRecord {
  content_hash: string;
  issues: SerializedIssueRecord[];
}

export interface SerializedSegmentRecord {
  segment_hash: string;
  start_line: number;
  issues: SerializedIssueRecord[];
}

export interface SerializedDocumentSnapshot {
  file_hash: string;
  line_count: number;
  lines: Record<string, SerializedLineRecord>;
  segments: Record<string, SerializedSegmentRecord>;
  document_issues: SerializedIssueRecord[];
}

export interface SerializedCacheSnapshot {
  version: string;
  timestamp: string;
  files: Record<string, SerializedDocumentSnapshot>;
}

export class CacheFormatError extends Error {
  constructor(
    public readonly field: string,
    public readonly reason: string
  ) {
    super(`Malformed cache field ${field}: ${reason}`);
    this.name = 'CacheFormatError';
  }
}

export class CacheWriteError extends Error {
  constructor(
    public readonly cachePath: string,
    public readonly original: unknown
  ) {
    super(`Failed to write cache to ${cachePath}: ${original instanceof Error ? original.message : 'Unknown error'}`);
    this.name = 'CacheWriteError';
  }
}
