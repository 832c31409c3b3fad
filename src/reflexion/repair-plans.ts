/** Failure categories the reflexion loop recognises, in classification priority */
export type FailureType = 'test_failure' | 'determinism_failure' | 'lint_failure' | 'crv_failure' | 'unknown';

/** Pipeline point a repair attempt resumes from */
export type RetryState = 'dev_gate' | 'backtest' | 'init';

export interface RepairPlan {
  failureType: FailureType;
  description: string;
  /** Remedial steps, in the order they should be taken */
  actions: string[];
  retryState: RetryState;
}

/**
 * Check names inspected by classification, first match wins. Checks not in
 * this list never influence the failure type.
 */
export const CLASSIFIED_CHECKS: ReadonlyArray<readonly [check: string, failureType: Exclude<FailureType, 'unknown'>]> = [
  ['tests_pass', 'test_failure'],
  ['determinism', 'determinism_failure'],
  ['lint', 'lint_failure'],
  ['crv_pass', 'crv_failure'],
];

export const REPAIR_PLANS: Readonly<Record<FailureType, Omit<RepairPlan, 'failureType'>>> = {
  test_failure: {
    description: 'Tests failed - code quality issues detected',
    actions: ['Review test failures in gate details', 'Fix failing tests', 'Re-run dev gate'],
    retryState: 'dev_gate',
  },
  determinism_failure: {
    description: 'Determinism check failed - non-deterministic behavior detected',
    actions: ['Check for unseeded random number generators', 'Verify no system time dependencies', 'Ensure all operations are reproducible', 'Re-run determinism check'],
    retryState: 'dev_gate',
  },
  lint_failure: {
    description: 'Lint check failed - code style issues detected',
    actions: ['Review lint errors in gate details', 'Fix lint warnings', 'Re-run lint check'],
    retryState: 'dev_gate',
  },
  crv_failure: {
    description: 'CRV verification failed - strategy violates constraints',
    actions: ['Review CRV violations', 'Adjust strategy parameters to meet constraints', 'Re-run backtest', 'Re-run product gate'],
    retryState: 'backtest',
  },
  unknown: {
    description: 'Unknown failure type',
    actions: ['Review error messages', 'Check logs for details', 'Consider manual intervention'],
    retryState: 'init',
  },
};
