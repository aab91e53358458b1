import type { InvariantViolation } from './types.js';

export interface ViolationSummary {
  total: number;
  warn: number;
  error: number;
  fatal: number;
}

export function summarizeViolations(violations: InvariantViolation[]): ViolationSummary {
  return {
    total: violations.length,
    warn: violations.filter(v => v.severity === 'warn').length,
    error: violations.filter(v => v.severity === 'error').length,
    fatal: violations.filter(v => v.severity === 'fatal').length,
  };
}
