import type { Document, Issue, Segment } from '../types.js';
import { logger } from '../observability/logger.js';
import { checkInvariants } from '../invariants/checker.js';
import { CHANGE_DETECTION_INVARIANTS } from '../invariants/registry.js';
import { hasFatalViolations } from '../invariants/violations.js';
import { hashLine, hashSegment } from './hasher.js';
import { detectLineChanges, linesNeedingCheck } from './line-detector.js';
import { detectSegmentChanges } from './segment-detector.js';
import { compareIssues, toIssue, toIssueRecord } from './records.js';
import {
  CACHE_VERSION,
  UNSETTLED_FILE_DIGEST,
  type CacheSnapshot,
  type DocumentSnapshot,
  type LineChangeResult,
  type LineRecord,
  type SegmentClassification,
  type SegmentRecord,
} from './types.js';

export type PlanMode = 'skip' | 'partial' | 'full';

export interface DocumentPlan {
  path: string;
  mode: PlanMode;
  fileDigest: string;
  lines: readonly string[];
  previous: DocumentSnapshot | null;
  changes: LineChangeResult;
  linesToCheck: ReadonlySet<number>;
}

export interface SegmentReviewResult {
  segment: Segment;
  issues: Issue[];
  // Failed reviews are reported but not cached, so the segment is retried.
  failed?: boolean;
}

export interface MergeStats {
  mode: PlanMode;
  carriedLineIssues: number;
  freshLineIssues: number;
  documentIssues: number;
  cachedSegments: number;
  freshSegments: number;
  carriedSegmentIssues: number;
  freshSegmentIssues: number;
  deletedLines: number;
  // A tool failed, so the checked lines are left out of the snapshot.
  unsettled: boolean;
}

export interface MergeResult {
  issues: Issue[];
  // The subset of `issues` stored in line records.
  lineIssues: Issue[];
  snapshot: DocumentSnapshot;
  stats: MergeStats;
}

/**
 * Per-run coordinator between the previous cache snapshot and the checking
 * collaborators. Call prepare() for a document, hand needsCheck() and
 * needsReview() to the tools, then mergeAndSnapshot() with what they found.
 */
export class IncrementalMerger {
  private plans = new Map<string, DocumentPlan>();
  private segmentPlans = new Map<string, SegmentClassification<Segment>[]>();
  private merged = new Map<string, DocumentSnapshot>();
  private unsettledLines = new Map<string, ReadonlySet<number>>();

  constructor(private readonly previous: CacheSnapshot | null) {}

  getPrevious(path: string): DocumentSnapshot | null {
    return this.previous?.documents.get(path) ?? null;
  }

  prepare(document: Document): DocumentPlan {
    let previous = this.getPrevious(document.path);

    if (previous && previous.fileDigest === document.digest) {
      const plan: DocumentPlan = {
        path: document.path,
        mode: 'skip',
        fileDigest: document.digest,
        lines: document.lines,
        previous,
        changes: { classifications: [], deleted: new Set() },
        linesToCheck: new Set(),
      };
      this.plans.set(document.path, plan);
      return plan;
    }

    let changes = detectLineChanges(document.lines, previous);

    if (previous) {
      const result = checkInvariants({
        document: document.path,
        classifications: changes.classifications,
        previousLines: previous.lines,
        deletedLines: changes.deleted,
        segmentRecords: previous.segments,
      }, CHANGE_DETECTION_INVARIANTS);

      if (hasFatalViolations(result.violations)) {
        logger.error('change_detection', 'Discarding cached state for document', {
          document: document.path,
          violations: result.violations.map(v => v.invariantId),
        });
        previous = null;
        changes = detectLineChanges(document.lines, null);
      }
    }

    const plan: DocumentPlan = {
      path: document.path,
      mode: previous ? 'partial' : 'full',
      fileDigest: document.digest,
      lines: document.lines,
      previous,
      changes,
      linesToCheck: linesNeedingCheck(changes.classifications),
    };
    this.plans.set(document.path, plan);
    return plan;
  }

  needsCheck(path: string): ReadonlySet<number> {
    return this.requirePlan(path).linesToCheck;
  }

  /**
   * Classify the document's current segments and return the ones the
   * reviewer has to see.
   */
  needsReview(path: string, segments: readonly Segment[]): Segment[] {
    const plan = this.requirePlan(path);
    const classified = detectSegmentChanges(segments, plan.previous?.segments);
    this.segmentPlans.set(path, classified);

    const seen = new Set<string>();
    const fresh: Segment[] = [];
    for (const classification of classified) {
      if (classification.status !== 'fresh' || seen.has(classification.digest)) continue;
      seen.add(classification.digest);
      fresh.push(classification.segment);
    }
    return fresh;
  }

  /**
   * Keep only fresh issues that belong to this document and sit on a line
   * that was requested. Line 0 marks a document-level finding (including
   * tool failures) and is kept whenever the document was checked at all.
   */
  scopeLineIssues(path: string, freshIssues: readonly Issue[]): Issue[] {
    const plan = this.requirePlan(path);
    if (plan.mode === 'skip') {
      return [];
    }
    return freshIssues.filter(issue =>
      issue.file === path && (issue.line === 0 || plan.linesToCheck.has(issue.line))
    );
  }

  /**
   * Combine carried-over and fresh findings for one document and build its
   * replacement snapshot.
   *
   * `segmentResults` is null when no LLM review ran in this run: cached
   * segment records still present in the document are carried into the
   * snapshot, but contribute no issues.
   *
   * When a fresh `tool_failure` issue is present the checked lines did not
   * get every tool's findings. They are left out of the line records and the
   * file digest is unsettled, so the next run checks them again.
   */
  mergeAndSnapshot(
    path: string,
    freshLineIssues: readonly Issue[],
    segmentResults: readonly SegmentReviewResult[] | null
  ): MergeResult {
    const plan = this.requirePlan(path);
    const scoped = this.scopeLineIssues(path, freshLineIssues);

    const carriedLineIssues = this.carriedLineIssues(plan);
    const lineIssues = scoped.filter(issue => issue.line > 0);
    const documentIssues = this.documentIssues(plan, scoped.filter(issue => issue.line === 0));
    const unsettled = documentIssues.some(issue => issue.type === 'tool_failure');
    const omitted: ReadonlySet<number> = unsettled ? plan.linesToCheck : new Set();
    if (unsettled) {
      this.unsettledLines.set(path, omitted);
    } else {
      this.unsettledLines.delete(path);
    }

    const segments = this.mergeSegments(plan, segmentResults);

    const storedLineIssues = [...carriedLineIssues, ...lineIssues];
    const issues = [
      ...storedLineIssues,
      ...segments.carriedIssues,
      ...segments.freshIssues,
      ...documentIssues,
    ].sort(compareIssues);

    const snapshot: DocumentSnapshot = {
      fileDigest: unsettled ? UNSETTLED_FILE_DIGEST : plan.fileDigest,
      lineCount: plan.lines.length,
      lines: this.buildLineRecords(plan, storedLineIssues, omitted),
      segments: segments.records,
      documentIssues: documentIssues
        .filter(issue => issue.type !== 'tool_failure')
        .map(toIssueRecord),
    };
    this.merged.set(path, snapshot);

    const stats: MergeStats = {
      mode: plan.mode,
      carriedLineIssues: carriedLineIssues.length,
      freshLineIssues: lineIssues.length,
      documentIssues: documentIssues.length,
      cachedSegments: segments.cachedCount,
      freshSegments: segments.freshCount,
      carriedSegmentIssues: segments.carriedIssues.length,
      freshSegmentIssues: segments.freshIssues.length,
      deletedLines: plan.changes.deleted.size,
      unsettled,
    };

    logger.info('cache_merge', 'Document merged', { document: path, ...stats });

    return { issues, lineIssues: storedLineIssues, snapshot, stats };
  }

  /**
   * Replace the line-record issues of an already merged document, e.g. once
   * they carry adjudications. Issues must keep the lines they were merged on.
   */
  replaceLineIssues(path: string, issues: readonly Issue[]): void {
    const plan = this.requirePlan(path);
    const snapshot = this.merged.get(path);
    if (!snapshot) {
      throw new Error(`Document has not been merged: ${path}`);
    }
    snapshot.lines = this.buildLineRecords(
      plan,
      issues.filter(issue => issue.line > 0),
      this.unsettledLines.get(path) ?? new Set()
    );
  }

  /**
   * Assemble the replacement cache root from every merged document.
   * Documents listed in `retainPaths` that were not merged in this run keep
   * their previous entry.
   */
  buildSnapshot(retainPaths: readonly string[] = []): CacheSnapshot {
    const documents = new Map<string, DocumentSnapshot>();
    const paths = new Set<string>(this.merged.keys());

    for (const path of retainPaths) {
      if (this.getPrevious(path)) {
        paths.add(path);
      }
    }

    for (const path of [...paths].sort()) {
      const snapshot = this.merged.get(path) ?? this.getPrevious(path);
      if (snapshot) {
        documents.set(path, snapshot);
      }
    }

    return {
      version: CACHE_VERSION,
      timestamp: '',
      documents,
    };
  }

  private requirePlan(path: string): DocumentPlan {
    const plan = this.plans.get(path);
    if (!plan) {
      throw new Error(`Document has not been prepared: ${path}`);
    }
    return plan;
  }

  /**
   * Document-level findings come from the tools when they ran on this
   * document, and from the previous snapshot otherwise.
   */
  private documentIssues(plan: DocumentPlan, fresh: readonly Issue[]): Issue[] {
    if (plan.linesToCheck.size > 0) {
      return [...fresh];
    }
    return (plan.previous?.documentIssues ?? []).map(record => toIssue(record, plan.path, 0));
  }

  private carriedLineIssues(plan: DocumentPlan): Issue[] {
    const previous = plan.previous;
    if (!previous) {
      return [];
    }

    const issues: Issue[] = [];

    if (plan.mode === 'skip') {
      const lineNumbers = [...previous.lines.keys()].sort((a, b) => a - b);
      for (const lineNumber of lineNumbers) {
        const record = previous.lines.get(lineNumber);
        if (!record) continue;
        for (const issue of record.issues) {
          issues.push(toIssue(issue, plan.path, lineNumber));
        }
      }
      return issues;
    }

    for (const classification of plan.changes.classifications) {
      if (classification.status !== 'unchanged' || classification.previousLine === null) {
        continue;
      }
      const record = previous.lines.get(classification.previousLine);
      if (!record) continue;
      for (const issue of record.issues) {
        issues.push(toIssue(issue, plan.path, classification.currentLine));
      }
    }
    return issues;
  }

  private buildLineRecords(
    plan: DocumentPlan,
    issues: readonly Issue[],
    omitted: ReadonlySet<number>
  ): Map<number, LineRecord> {
    const byLine = new Map<number, Issue[]>();
    for (const issue of issues) {
      const bucket = byLine.get(issue.line);
      if (bucket) {
        bucket.push(issue);
      } else {
        byLine.set(issue.line, [issue]);
      }
    }

    const records = new Map<number, LineRecord>();
    plan.lines.forEach((text, index) => {
      const lineNumber = index + 1;
      if (omitted.has(lineNumber)) return;
      const digest = plan.changes.classifications[index]?.contentDigest ?? hashLine(text);
      records.set(lineNumber, {
        lineNumber,
        contentDigest: digest,
        issues: (byLine.get(lineNumber) ?? []).sort(compareIssues).map(toIssueRecord),
      });
    });
    return records;
  }

  private mergeSegments(
    plan: DocumentPlan,
    segmentResults: readonly SegmentReviewResult[] | null
  ): {
    records: Map<string, SegmentRecord>;
    carriedIssues: Issue[];
    freshIssues: Issue[];
    cachedCount: number;
    freshCount: number;
  } {
    const records = new Map<string, SegmentRecord>();
    const carriedIssues: Issue[] = [];
    const freshIssues: Issue[] = [];
    const classified = this.segmentPlans.get(plan.path) ?? [];
    const previousSegments = plan.previous?.segments;
    let cachedCount = 0;

    for (const classification of classified) {
      if (classification.status !== 'cached' || records.has(classification.digest)) {
        continue;
      }
      const record = previousSegments?.get(classification.digest);
      if (!record) continue;
      cachedCount++;

      const startLine = classification.segment.startLine;
      records.set(classification.digest, {
        segmentDigest: classification.digest,
        startLine,
        issues: record.issues.map(issue => ({ ...issue })),
      });

      if (segmentResults !== null) {
        for (const issue of record.issues) {
          carriedIssues.push(toIssue(issue, plan.path, startLine));
        }
      }
    }

    const freshDigests = new Set<string>();
    for (const classification of classified) {
      if (classification.status === 'fresh') {
        freshDigests.add(classification.digest);
      }
    }

    let freshCount = 0;
    for (const result of segmentResults ?? []) {
      if (result.segment.file !== plan.path) continue;
      const digest = hashSegment(result.segment.text);
      if (!freshDigests.has(digest)) continue;
      freshCount++;

      const issues = result.issues
        .filter(issue => issue.file === plan.path)
        .map(issue => ({ ...issue, line: result.segment.startLine }));
      freshIssues.push(...issues);

      if (!result.failed && !records.has(digest)) {
        records.set(digest, {
          segmentDigest: digest,
          startLine: result.segment.startLine,
          issues: issues.map(toIssueRecord),
        });
      }
    }

    return { records, carriedIssues, freshIssues, cachedCount, freshCount };
  }
}
