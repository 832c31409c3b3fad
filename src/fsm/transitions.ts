import type { ToolType } from '../tools/types';
import type { State } from './states';

export type TransitionRow = Readonly<Partial<Record<ToolType, State>>>;
export type TransitionTable = Readonly<Record<State, TransitionRow>>;

function freezeTable(table: Record<State, Partial<Record<ToolType, State>>>): TransitionTable {
  for (const row of Object.values(table)) {
    Object.freeze(row);
  }
  return Object.freeze(table);
}

/**
 * Legal `(state, tool) → state` moves. Gate phases loop on themselves: several
 * checks run inside one phase, and the aggregate verdict moves the machine on
 * through a forced transition.
 */
export const transitions: TransitionTable = freezeTable({
  init: {
    generate_strategy: 'strategy_design',
    memory_search: 'init',
  },
  strategy_design: {
    generate_strategy: 'strategy_design',
    backtest: 'backtest_complete',
    memory_search: 'strategy_design',
  },
  backtest_ready: {
    backtest: 'backtest_complete',
  },
  backtest_complete: {
    run_tests: 'dev_gate',
    backtest: 'backtest_complete',
  },
  dev_gate: {
    check_determinism: 'dev_gate',
    lint: 'dev_gate',
    run_tests: 'dev_gate',
  },
  dev_gate_passed: {
    crv_verify: 'product_gate',
  },
  product_gate: {
    crv_verify: 'product_gate',
  },
  product_gate_passed: {
    memory_commit: 'committed',
  },
  committed: {
    memory_show: 'committed',
    memory_search: 'committed',
  },
  reflexion: {
    generate_strategy: 'strategy_design',
    backtest: 'backtest_complete',
    run_tests: 'dev_gate',
  },
  // Only a forced transition leaves the error state
  error: {},
});
