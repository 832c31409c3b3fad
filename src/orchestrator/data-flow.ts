import type { State } from '../fsm/states';
import type { GateResult } from '../gates/types';
import type { RepairPlan } from '../reflexion/repair-plans';
import type { BacktestStats } from '../tools/schemas';
import type { ToolType } from '../tools/types';

/** Input parameters to start a goal run */
export interface GoalInput {
  goal: string;
  /** Market data file the backtests run against */
  dataPath: string;
}

/** Pipeline steps, in order; a repair attempt resumes at one of them */
export type GoalStep = 'strategy' | 'backtest' | 'dev_gate' | 'product_gate' | 'commit';

export type GoalStatus = 'running' | 'completed' | 'failed';

/** Paths and artifacts a goal run accumulates as it moves through the steps */
export interface RunContext {
  goal: string;
  dataPath: string;
  specPath: string;
  outputDir: string;
  artifacts: {
    strategy?: string;
    backtest?: string;
  };
  stats?: BacktestStats;
  priorWork?: string[];
}

export interface GateFailure {
  gate: string;
  result: GateResult;
  summary: string;
}

/** Result returned when a goal run finishes */
export interface GoalResult {
  status: Exclude<GoalStatus, 'running'>;
  runId: string;
  goal: string;
  finalState: State;
  /** Commit id of the recorded result */
  artifactId?: string;
  stats?: BacktestStats;
  /** What the run may surface externally; artifact ids only in strict mode */
  response?: string;
  error?: string;
  repairPlan?: RepairPlan;
  gateFailure?: GateFailure;
  attempts: number;
  history: State[];
  toolHistory: ToolType[];
  durationMs: number;
}
