import type {
  InvariantCheckResult,
  InvariantContext,
  InvariantDefinition,
  InvariantID,
  InvariantViolation,
} from './types.js';
import { getAllInvariants, getInvariantsByIds } from './registry.js';
import { logger } from '../observability/logger.js';

// A check that throws counts as passed; the throw is logged.
function holds(invariant: InvariantDefinition, context: InvariantContext): boolean {
  try {
    return invariant.evaluate(context);
  } catch (error) {
    logger.error('invariant_check', 'Invariant evaluation threw', {
      invariantId: invariant.id,
      document: context.document,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    return true;
  }
}

/**
 * Evaluate the given invariants (all registered ones by default) against a
 * context and log each violation.
 */
export function checkInvariants(
  context: InvariantContext,
  invariantIds?: InvariantID[]
): InvariantCheckResult {
  const invariants = invariantIds ? getInvariantsByIds(invariantIds) : getAllInvariants();
  const timestamp = new Date().toISOString();

  const violations: InvariantViolation[] = invariants
    .filter(invariant => !holds(invariant, context))
    .map(invariant => ({
      invariantId: invariant.id,
      description: invariant.description,
      severity: invariant.severity,
      document: context.document,
      timestamp,
    }));

  for (const violation of violations) {
    logger.warn('invariant_violation', `Invariant violated: ${violation.invariantId}`, {
      severity: violation.severity,
      description: violation.description,
      document: violation.document,
    });
  }

  return { passed: violations.length === 0, violations };
}
