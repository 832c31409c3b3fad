import type { GateResult } from '../gates/types';
import { formatGateResult } from '../gates/gate-result';
import { CLASSIFIED_CHECKS, REPAIR_PLANS } from './repair-plans';
import type { FailureType, RepairPlan } from './repair-plans';

export const DEFAULT_MAX_RETRIES = 3;

/**
 * Turns a failed gate verdict into a repair plan and bounds how many repair
 * attempts a goal run may make. One instance belongs to one goal run.
 */
export class ReflexionLoop {
  private attemptCount = 0;

  constructor(private maxRetries: number = DEFAULT_MAX_RETRIES) {
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new RangeError(`maxRetries must be a non-negative integer, got ${maxRetries}`);
    }
  }

  analyzeFailure(result: GateResult): RepairPlan {
    const failureType = this.classifyFailure(result);
    const plan = REPAIR_PLANS[failureType];
    return { failureType, description: plan.description, actions: [...plan.actions], retryState: plan.retryState };
  }

  /** A missing check counts as passed, so unrecognised failures fall through to `unknown` */
  classifyFailure(result: GateResult): FailureType {
    for (const [check, failureType] of CLASSIFIED_CHECKS) {
      if ((result.checks[check] ?? true) === false) {
        return failureType;
      }
    }
    return 'unknown';
  }

  shouldRetry(): boolean {
    return this.attemptCount < this.maxRetries;
  }

  incrementAttempt(): void {
    this.attemptCount += 1;
  }

  reset(): void {
    this.attemptCount = 0;
  }

  getAttemptCount(): number {
    return this.attemptCount;
  }

  getMaxRetries(): number {
    return this.maxRetries;
  }

  generateFailureSummary(result: GateResult): string {
    const lines = ['=== Failure Summary ===', `Gate Result: ${formatGateResult(result)}`, '', 'Failed Checks:'];

    for (const [name, passed] of Object.entries(result.checks)) {
      lines.push(`  ${passed ? '✓' : '✗'} ${name}`);
    }

    if (result.errors.length) {
      lines.push('', 'Errors:');
      for (const error of result.errors) {
        lines.push(`  - ${error}`);
      }
    }

    return lines.join('\n');
  }
}
