import type { LineClassification, LineRecord, SegmentRecord } from '../cache/types.js';

export type InvariantSeverity = 'warn' | 'error' | 'fatal';

export type InvariantID =
  | 'SEMAPHORE_PERMITS_NON_NEGATIVE'
  | 'SEMAPHORE_IN_FLIGHT_MATCHES_ACQUIRED'
  | 'LINE_MATCH_UNIQUE'
  | 'UNCHANGED_LINE_DIGEST_EQUAL'
  | 'DELETED_LINES_UNCLAIMED'
  | 'SEGMENT_KEY_IS_DIGEST';

export interface InvariantContext {
  // Semaphore context
  semaphorePermits?: number;
  semaphoreInFlight?: number;
  semaphoreMaxPermits?: number;

  // Change detection context
  document?: string;
  classifications?: readonly LineClassification[];
  previousLines?: ReadonlyMap<number, LineRecord>;
  deletedLines?: ReadonlySet<number>;
  segmentRecords?: ReadonlyMap<string, SegmentRecord>;
}

export interface InvariantDefinition {
  id: InvariantID;
  description: string;
  severity: InvariantSeverity;
  evaluate: (context: InvariantContext) => boolean;
}

export interface InvariantViolation {
  invariantId: InvariantID;
  description: string;
  severity: InvariantSeverity;
  document?: string;
  timestamp: string;
}

export interface InvariantCheckResult {
  passed: boolean;
  violations: InvariantViolation[];
}
