import { z } from 'zod';

// ── Strategy specification ──────────────────────────────────────────────

export const StrategyConfigSchema = z.object({
  type: z.enum(['ts_momentum', 'mean_reversion', 'buy_and_hold']),
  symbol: z.string().min(1),
  lookback: z.number().int().min(1),
  vol_target: z.number().gt(0).max(1),
  vol_lookback: z.number().int().min(1),
});

export const CostModelConfigSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('zero') }),
  z.object({
    type: z.literal('fixed_per_share'),
    cost_per_share: z.number().min(0),
    minimum_commission: z.number().min(0),
  }),
  z.object({
    type: z.literal('percentage'),
    percentage: z.number().min(0).max(1),
  }),
]);

export const BacktestSpecSchema = z.object({
  initial_cash: z.number().positive(),
  seed: z.number().int(),
  strategy: StrategyConfigSchema,
  cost_model: CostModelConfigSchema,
});

export type StrategyConfig = z.infer<typeof StrategyConfigSchema>;
export type CostModelConfig = z.infer<typeof CostModelConfigSchema>;
export type BacktestSpec = z.infer<typeof BacktestSpecSchema>;

// ── Tool inputs ─────────────────────────────────────────────────────────

export const GenerateStrategyInputSchema = z.object({
  goal: z.string().min(1),
  spec_path: z.string().min(1),
});

export const BacktestToolInputSchema = z.object({
  spec_path: z.string().min(1),
  data_path: z.string().min(1),
  output_dir: z.string().min(1),
});

export const DeterminismToolInputSchema = z.object({
  spec_path: z.string().min(1),
  data_path: z.string().min(1),
  runs: z.number().int().min(2),
});

export const CrvVerifyToolInputSchema = z.object({
  stats_path: z.string().min(1),
  trades_path: z.string().min(1),
  equity_path: z.string().min(1),
  max_drawdown_limit: z.number().gt(0).max(1),
});

export const MemorySearchInputSchema = z.object({
  query: z.string().min(1),
  limit: z.number().int().positive().optional(),
});

export const MemoryCommitInputSchema = z.object({
  goal: z.string().min(1),
  spec_path: z.string().min(1),
  output_dir: z.string().min(1),
  artifact_ids: z.array(z.string()),
});

export const MemoryShowInputSchema = z.object({
  artifact_id: z.string().regex(/^[a-f0-9]{64}$/, 'artifact_id must be 64 hex characters'),
});

export const EmptyParametersSchema = z.object({}).strict();

export type GenerateStrategyInput = z.infer<typeof GenerateStrategyInputSchema>;
export type BacktestToolInput = z.infer<typeof BacktestToolInputSchema>;
export type DeterminismToolInput = z.infer<typeof DeterminismToolInputSchema>;
export type CrvVerifyToolInput = z.infer<typeof CrvVerifyToolInputSchema>;
export type MemorySearchInput = z.infer<typeof MemorySearchInputSchema>;
export type MemoryCommitInput = z.infer<typeof MemoryCommitInputSchema>;
export type MemoryShowInput = z.infer<typeof MemoryShowInputSchema>;

// ── Artifacts read back from tools ──────────────────────────────────────

export const CrvViolationSchema = z.object({
  rule_id: z.string(),
  severity: z.string(),
  message: z.string(),
});

export const CrvReportSchema = z.object({
  passed: z.boolean(),
  violations: z.array(CrvViolationSchema),
});

export type CrvReport = z.infer<typeof CrvReportSchema>;

/** Headline statistics of a backtest; engines may report more fields */
export const BacktestStatsSchema = z
  .object({
    total_return: z.number(),
    sharpe_ratio: z.number(),
    max_drawdown: z.number(),
    num_trades: z.number().int().optional(),
  })
  .passthrough();

export type BacktestStats = z.infer<typeof BacktestStatsSchema>;

/** Render zod issues as `path: message` lines joined by `; ` */
export function formatSchemaIssues(error: z.ZodError): string {
  return error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');
}
