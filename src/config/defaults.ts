import type { Config } from './validator';

export const defaults: Config = {
  engine: {
    test_command: 'cargo test --workspace',
    lint_command: 'cargo clippy --workspace --all-targets -- -D warnings',
    workdir: '.',
    timeout_ms: 600_000,
  },
  memory: {
    search_before_generate: true,
  },
  gates: {
    max_drawdown_limit: 0.1,
    determinism_runs: 3,
  },
  reflexion: {
    max_retries: 3,
  },
  strategy: {
    symbol: 'SPY',
    initial_cash: 100_000,
    seed: 42,
    lookback: 20,
    vol_target: 0.15,
    vol_lookback: 20,
  },
  strict_mode: true,
  workspace_dir: '.goalguard',
};
