import type { GateResult } from './types';

export function buildGateResult(checks: Record<string, boolean>, errors: string[] = [], details: GateResult['details'] = {}): GateResult {
  return {
    passed: Object.values(checks).every(Boolean),
    checks: { ...checks },
    errors: [...errors],
    details: { ...details },
  };
}

export function countPassedChecks(result: GateResult): number {
  return Object.values(result.checks).filter(Boolean).length;
}

/** e.g. `Gate FAILED: 2/3 checks passed` */
export function formatGateResult(result: GateResult): string {
  const status = result.passed ? 'PASSED' : 'FAILED';
  return `Gate ${status}: ${countPassedChecks(result)}/${Object.keys(result.checks).length} checks passed`;
}
