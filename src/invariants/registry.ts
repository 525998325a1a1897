import type { InvariantDefinition, InvariantContext, InvariantID } from './types.js';

function claimedPreviousLines(ctx: InvariantContext): number[] {
  const claimed: number[] = [];
  for (const classification of ctx.classifications ?? []) {
    if (classification.previousLine !== null) {
      claimed.push(classification.previousLine);
    }
  }
  return claimed;
}

const INVARIANTS: Record<InvariantID, InvariantDefinition> = {
  SEMAPHORE_PERMITS_NON_NEGATIVE: {
    id: 'SEMAPHORE_PERMITS_NON_NEGATIVE',
    description: 'Semaphore available permits must never be negative',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.semaphorePermits === undefined) return true;
      return ctx.semaphorePermits >= 0;
    },
  },

  SEMAPHORE_IN_FLIGHT_MATCHES_ACQUIRED: {
    id: 'SEMAPHORE_IN_FLIGHT_MATCHES_ACQUIRED',
    description: 'In-flight count must equal (max - available) permits',
    severity: 'error',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.semaphoreInFlight === undefined ||
          ctx.semaphorePermits === undefined ||
          ctx.semaphoreMaxPermits === undefined) {
        return true;
      }
      const expected = ctx.semaphoreMaxPermits - ctx.semaphorePermits;
      return ctx.semaphoreInFlight === expected;
    },
  },

  LINE_MATCH_UNIQUE: {
    id: 'LINE_MATCH_UNIQUE',
    description: 'A previous line may be claimed by at most one current line',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (!ctx.classifications) return true;
      const claimed = claimedPreviousLines(ctx);
      return new Set(claimed).size === claimed.length;
    },
  },

  UNCHANGED_LINE_DIGEST_EQUAL: {
    id: 'UNCHANGED_LINE_DIGEST_EQUAL',
    description: 'An unchanged line must carry the same digest as the previous line it claimed',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (!ctx.classifications || !ctx.previousLines) return true;
      for (const classification of ctx.classifications) {
        if (classification.status !== 'unchanged') continue;
        if (classification.previousLine === null) return false;
        const record = ctx.previousLines.get(classification.previousLine);
        if (!record || record.contentDigest !== classification.contentDigest) {
          return false;
        }
      }
      return true;
    },
  },

  DELETED_LINES_UNCLAIMED: {
    id: 'DELETED_LINES_UNCLAIMED',
    description: 'Deleted lines are exactly the previous lines no current line claimed',
    severity: 'error',
    evaluate: (ctx: InvariantContext) => {
      if (!ctx.classifications || !ctx.previousLines || !ctx.deletedLines) return true;
      const claimed = new Set(claimedPreviousLines(ctx));
      for (const lineNumber of ctx.deletedLines) {
        if (claimed.has(lineNumber)) return false;
      }
      return claimed.size + ctx.deletedLines.size === ctx.previousLines.size;
    },
  },

  SEGMENT_KEY_IS_DIGEST: {
    id: 'SEGMENT_KEY_IS_DIGEST',
    description: 'Segment records must be keyed by their own content digest',
    severity: 'error',
    evaluate: (ctx: InvariantContext) => {
      if (!ctx.segmentRecords) return true;
      for (const [key, record] of ctx.segmentRecords) {
        if (key !== record.segmentDigest) return false;
      }
      return true;
    },
  },
};

export const CHANGE_DETECTION_INVARIANTS: InvariantID[] = [
  'LINE_MATCH_UNIQUE',
  'UNCHANGED_LINE_DIGEST_EQUAL',
  'DELETED_LINES_UNCLAIMED',
  'SEGMENT_KEY_IS_DIGEST',
];

export function getAllInvariants(): InvariantDefinition[] {
  return Object.values(INVARIANTS);
}

export function getInvariantsByIds(ids: InvariantID[]): InvariantDefinition[] {
  return ids.map(id => INVARIANTS[id]);
}
