import type { InvariantContext, InvariantCheckResult, InvariantViolation, InvariantID } from './types.js';
import { getInvariantsByIds, getAllInvariants } from './registry.js';
import { logger } from '../observability/logger.js';
import { summarizeViolations } from './violations.js';
import type { ViolationSummary } from './violations.js';

export function checkInvariants(
  context: InvariantContext,
  invariantIds?: InvariantID[]
): InvariantCheckResult {
  const invariants = invariantIds
    ? getInvariantsByIds(invariantIds)
    : getAllInvariants();

  const violations: InvariantViolation[] = [];

  for (const invariant of invariants) {
    try {
      const passed = invariant.evaluate(context);

      if (!passed) {
        const violation: InvariantViolation = {
          invariantId: invariant.id,
          description: invariant.description,
          severity: invariant.severity,
          context,
          timestamp: new Date().toISOString(),
        };

        violations.push(violation);

        logger.warn('invariant_violation', `Invariant violated: ${invariant.id}`, {
          invariantId: invariant.id,
          severity: invariant.severity,
          description: invariant.description,
          context,
        });
      }
    } catch (error) {
      logger.error('invariant_check_error', 'Error evaluating invariant', {
        invariantId: invariant.id,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  return {
    passed: violations.length === 0,
    violations,
  };
}

export function safeCheckInvariants(
  context: InvariantContext,
  invariantIds?: InvariantID[]
): InvariantViolation[] {
  try {
    return checkInvariants(context, invariantIds).violations;
  } catch (error) {
    logger.error('invariant_safe_check_error', 'Safe invariant check failed', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    return [];
  }
}

/**
 * Keeps the violations seen by one orchestrator so they can be reported
 * alongside its metrics. Checks never throw at the caller.
 */
export class InvariantMonitor {
  private violations: InvariantViolation[] = [];

  constructor(private readonly maxRetained: number = 100) {}

  check(context: InvariantContext, invariantIds?: InvariantID[]): InvariantViolation[] {
    const found = safeCheckInvariants(context, invariantIds);

    if (found.length > 0) {
      this.violations.push(...found);
      if (this.violations.length > this.maxRetained) {
        this.violations.splice(0, this.violations.length - this.maxRetained);
      }
    }

    return found;
  }

  getRecent(): InvariantViolation[] {
    return [...this.violations];
  }

  getSummary(): ViolationSummary {
    return summarizeViolations(this.violations);
  }
}
