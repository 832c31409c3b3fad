import type { ToolType } from '../tools/types';

export const STATES = [
  'init',
  'strategy_design',
  'backtest_ready',
  'backtest_complete',
  'dev_gate',
  'dev_gate_passed',
  'product_gate',
  'product_gate_passed',
  'reflexion',
  'committed',
  'error',
] as const;

/** Pipeline phase of a goal run; exactly one is current at any time */
export type State = (typeof STATES)[number];

export const INITIAL_STATE: State = 'init';

/** Snapshot of the machine: current state plus the append-only logs of how it got there */
export interface FSMState {
  currentState: State;
  /** States left behind, oldest first */
  history: State[];
  /** Tool types that drove each tool-triggered transition */
  toolHistory: ToolType[];
}
