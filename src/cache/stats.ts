import type { CacheSnapshot } from './types.js';

export interface CacheStats {
  version: string;
  timestamp: string;
  documents: number;
  lines: number;
  lineIssues: number;
  segments: number;
  segmentIssues: number;
}

export function summarizeSnapshot(snapshot: CacheSnapshot): CacheStats {
  const stats: CacheStats = {
    version: snapshot.version,
    timestamp: snapshot.timestamp,
    documents: snapshot.documents.size,
    lines: 0,
    lineIssues: 0,
    segments: 0,
    segmentIssues: 0,
  };

  for (const document of snapshot.documents.values()) {
    stats.lines += document.lines.size;
    stats.segments += document.segments.size;
    for (const record of document.lines.values()) stats.lineIssues += record.issues.length;
    for (const record of document.segments.values()) stats.segmentIssues += record.issues.length;
  }
  return stats;
}
