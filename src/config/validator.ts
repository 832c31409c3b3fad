import { z } from 'zod';

export const ConfigSchema = z.object({
  engine: z.object({
    cli_path: z.string().min(1).optional(),
    test_command: z.string().min(1),
    lint_command: z.string().min(1),
    workdir: z.string().min(1),
    timeout_ms: z.number().int().positive(),
  }),
  memory: z.object({
    cli_path: z.string().min(1).optional(),
    search_before_generate: z.boolean(),
  }),
  gates: z.object({
    max_drawdown_limit: z.number().gt(0).max(1),
    determinism_runs: z.number().int().min(2),
  }),
  reflexion: z.object({
    max_retries: z.number().int().min(0),
  }),
  strategy: z.object({
    symbol: z.string().min(1),
    initial_cash: z.number().positive(),
    seed: z.number().int(),
    lookback: z.number().int().min(1),
    vol_target: z.number().gt(0).max(1),
    vol_lookback: z.number().int().min(1),
  }),
  strict_mode: z.boolean(),
  workspace_dir: z.string().min(1),
});

export type Config = z.infer<typeof ConfigSchema>;
