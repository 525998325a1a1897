import type { InvariantViolation } from './types.js';

export function hasFatalViolations(violations: readonly InvariantViolation[]): boolean {
  return violations.some(v => v.severity === 'fatal');
}

export function summarizeViolations(violations: readonly InvariantViolation[]): {
  total: number;
  warn: number;
  error: number;
  fatal: number;
} {
  return {
    total: violations.length,
    warn: violations.filter(v => v.severity === 'warn').length,
    error: violations.filter(v => v.severity === 'error').length,
    fatal: violations.filter(v => v.severity === 'fatal').length,
  };
}
