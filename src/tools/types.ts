import type { BacktestToolInput, CrvVerifyToolInput, DeterminismToolInput, GenerateStrategyInput, MemoryCommitInput, MemorySearchInput, MemoryShowInput } from './schemas';

// ── Tool types ──────────────────────────────────────────────────────────

export const TOOL_TYPES = ['generate_strategy', 'backtest', 'run_tests', 'check_determinism', 'lint', 'crv_verify', 'memory_search', 'memory_commit', 'memory_show'] as const;

/** Closed set of actions the control plane may ask an external tool to perform */
export type ToolType = (typeof TOOL_TYPES)[number];

/** Tools that take no parameters */
export type EmptyParameters = Record<string, never>;

export interface ToolParameters {
  generate_strategy: GenerateStrategyInput;
  backtest: BacktestToolInput;
  run_tests: EmptyParameters;
  check_determinism: DeterminismToolInput;
  lint: EmptyParameters;
  crv_verify: CrvVerifyToolInput;
  memory_search: MemorySearchInput;
  memory_commit: MemoryCommitInput;
  memory_show: MemoryShowInput;
}

// ── Call / result envelope ──────────────────────────────────────────────

/** A request to run one tool, with parameters typed by its tool type */
export type ToolCall<T extends ToolType = ToolType> = {
  [K in T]: { toolType: K; parameters: ToolParameters[K] };
}[T];

export type ToolOutput = Record<string, unknown>;

export interface ToolSuccess {
  success: true;
  output?: ToolOutput;
  /** Content-derived identifier (SHA-256 hex) of what the tool produced */
  artifactId?: string;
  error?: undefined;
}

export interface ToolFailure {
  success: false;
  error: string;
  output?: ToolOutput;
  artifactId?: undefined;
}

export type ToolResult = ToolSuccess | ToolFailure;

/**
 * The sole boundary through which the control plane affects the outside world.
 * Implementations must resolve, never reject: every failure is reported as a
 * `success: false` result.
 */
export interface ToolInvoker {
  invoke(call: ToolCall): Promise<ToolResult>;
}

// ── Helpers ─────────────────────────────────────────────────────────────

export function toolSuccess(output?: ToolOutput, artifactId?: string): ToolSuccess {
  const result: ToolSuccess = { success: true };
  if (output !== undefined) result.output = output;
  if (artifactId !== undefined) result.artifactId = artifactId;
  return result;
}

export function toolFailure(error: string, output?: ToolOutput): ToolFailure {
  return output === undefined ? { success: false, error } : { success: false, error, output };
}

export function isToolType(value: string): value is ToolType {
  const known: readonly string[] = TOOL_TYPES;
  return known.includes(value);
}

export function describeToolResult(result: ToolResult): string {
  if (result.success) {
    return result.artifactId ? `Success (artifact ${result.artifactId})` : 'Success';
  }
  return `Error: ${result.error}`;
}
