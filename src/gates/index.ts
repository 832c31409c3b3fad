export { DevGate, DEFAULT_DETERMINISM_RUNS } from './dev-gate';
export type { DevGateOptions } from './dev-gate';
export { ProductGate, placeholderCheck, DEFAULT_MAX_DRAWDOWN_LIMIT, CRV_REPORT_FILE } from './product-gate';
export type { ProductGateOptions, SupplementaryCheck, SupplementaryCheckOutcome } from './product-gate';
export { buildGateResult, formatGateResult, countPassedChecks } from './gate-result';
export type { Gate, GateContext, GateResult } from './types';
