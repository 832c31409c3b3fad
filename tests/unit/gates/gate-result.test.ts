import { buildGateResult, countPassedChecks, formatGateResult } from '../../../src/gates/gate-result';

describe('gate results', () => {
  it('should pass only when every check passed', () => {
    expect(buildGateResult({ a: true, b: true }).passed).toBe(true);
    expect(buildGateResult({ a: true, b: false }).passed).toBe(false);
  });

  it('should pass an empty battery', () => {
    expect(buildGateResult({}).passed).toBe(true);
  });

  it('should format the verdict with passed/total counts', () => {
    const result = buildGateResult({ tests_pass: true, determinism: false, lint: true });

    expect(countPassedChecks(result)).toBe(2);
    expect(formatGateResult(result)).toBe('Gate FAILED: 2/3 checks passed');
  });

  it('should copy inputs', () => {
    const checks = { a: true };
    const result = buildGateResult(checks);
    checks.a = false;

    expect(result.checks.a).toBe(true);
  });
});
