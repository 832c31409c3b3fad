import type { BacktestSpec, StrategyConfig } from './schemas';
import { BacktestSpecSchema } from './schemas';

export interface StrategyDefaults {
  symbol: string;
  initial_cash: number;
  seed: number;
  lookback: number;
  vol_target: number;
  vol_lookback: number;
}

export interface GoalIntent {
  strategyType: StrategyConfig['type'];
  /** Drawdown ceiling stated in the goal, as a fraction */
  maxDrawdown?: number;
  symbol?: string;
}

const MIN_VOL_TARGET = 0.01;

const STRATEGY_KEYWORDS: Array<[RegExp, StrategyConfig['type']]> = [
  [/\b(mean[\s-]?reversion|revert|reverting)\b/i, 'mean_reversion'],
  [/\b(buy[\s-]?and[\s-]?hold|passive)\b/i, 'buy_and_hold'],
  [/\b(trend|momentum|breakout)\b/i, 'ts_momentum'],
];

const DRAWDOWN_PATTERN = /\b(?:dd|drawdown|max[\s-]?drawdown)\s*(?:<=|<|≤|under|below)?\s*(\d+(?:\.\d+)?)\s*%/i;
const SYMBOL_PATTERN = /\b(?:on|for|trade|trading)\s+\$?(?!DD\b)([A-Z]{1,5})\b(?!\s*(?:<|≤))/;

/** Extract the strategy family, drawdown target and instrument from a free-text goal */
export function parseGoal(goal: string): GoalIntent {
  const intent: GoalIntent = { strategyType: 'ts_momentum' };

  for (const [pattern, type] of STRATEGY_KEYWORDS) {
    if (pattern.test(goal)) {
      intent.strategyType = type;
      break;
    }
  }

  const dd = DRAWDOWN_PATTERN.exec(goal);
  if (dd?.[1]) {
    intent.maxDrawdown = Number(dd[1]) / 100;
  }

  const symbol = SYMBOL_PATTERN.exec(goal);
  if (symbol?.[1]) {
    intent.symbol = symbol[1];
  }

  return intent;
}

/**
 * Build a backtest specification for a goal. A stated drawdown ceiling lowers
 * the volatility target proportionally so the sizing starts inside the limit.
 */
export function generateStrategySpec(goal: string, defaults: StrategyDefaults): BacktestSpec {
  const intent = parseGoal(goal);

  let volTarget = defaults.vol_target;
  if (intent.maxDrawdown !== undefined && intent.maxDrawdown > 0) {
    volTarget = Math.min(volTarget, Math.max(MIN_VOL_TARGET, Math.round(intent.maxDrawdown * 150) / 100));
  }

  return BacktestSpecSchema.parse({
    initial_cash: defaults.initial_cash,
    seed: defaults.seed,
    strategy: {
      type: intent.strategyType,
      symbol: intent.symbol ?? defaults.symbol,
      lookback: defaults.lookback,
      vol_target: volTarget,
      vol_lookback: defaults.vol_lookback,
    },
    cost_model: { type: 'zero' },
  });
}
