import type { ToolOutput } from '../tools/types';

/** Inputs a gate may read; unknown keys are carried along untouched */
export interface GateContext {
  spec_path?: string;
  data_path?: string;
  output_dir?: string;
  [key: string]: unknown;
}

export interface GateResult {
  /** Always equal to every value of `checks` being true */
  passed: boolean;
  /** Check name → verdict, in the order the checks ran */
  checks: Record<string, boolean>;
  errors: string[];
  details: Record<string, ToolOutput | undefined>;
}

/** A named battery of checks that must all pass before the pipeline moves on */
export interface Gate {
  readonly name: string;
  run(context: GateContext): Promise<GateResult>;
}
