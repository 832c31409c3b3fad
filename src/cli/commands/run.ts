import crypto from 'node:crypto';
import path from 'node:path';
import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import type { DeepPartial } from '../../config/loader';
import type { Config } from '../../config/validator';
import type { GoalResult } from '../../orchestrator/data-flow';
import { createGoalOrchestrator, createToolInvoker } from '../../orchestrator/runtime';
import type { ToolInvoker } from '../../tools/types';
import { formatError, formatGoalResult, formatInfo, formatStateTransition, formatStep } from '../formatters';
import { CliWorkflowLogger } from '../logger';
import { parseGoal, parseMaxDrawdown, parseMaxRetries, requireExistingPath } from '../validators';

// ── Types ───────────────────────────────────────────────────────────────

export type RunCommandOptions = {
  goal: string;
  data: string;
  maxDrawdown?: string;
  strict?: boolean;
  rustCli?: string;
  hipcortexCli?: string;
  maxRetries?: string;
  verbose?: boolean;
};

/** Seams for running the command in-process */
export type RunCommandDeps = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  runId?: string;
  createInvoker?: (config: Config) => ToolInvoker;
};

// ── Command registration ────────────────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Drive a trading goal from strategy design to a committed, gated result')
    .requiredOption('--goal <text>', 'Natural-language goal, e.g. "trend strategy on SPY, DD<10%"')
    .requiredOption('--data <path>', 'Market data file for the backtest')
    .option('--max-drawdown <fraction>', 'Maximum drawdown allowed by the product gate (default: 0.10)')
    .option('--strict', 'Only surface artifact ids (default)')
    .option('--no-strict', 'Allow free-text responses')
    .option('--rust-cli <path>', 'Path to the quant_engine binary')
    .option('--hipcortex-cli <path>', 'Path to the hipcortex binary')
    .option('--max-retries <n>', 'Repair attempts after gate failures')
    .option('--verbose', 'Show detailed output')
    .action(async (options: RunCommandOptions) => {
      await executeRunCommand(options, program.opts().verbose === true);
    });
}

// ── Main execution ──────────────────────────────────────────────────────

function buildOverrides(options: RunCommandOptions, cwd: string): DeepPartial<Config> {
  return {
    engine: { cli_path: options.rustCli ? requireExistingPath('--rust-cli', path.resolve(cwd, options.rustCli)) : undefined },
    memory: { cli_path: options.hipcortexCli ? requireExistingPath('--hipcortex-cli', path.resolve(cwd, options.hipcortexCli)) : undefined },
    gates: { max_drawdown_limit: options.maxDrawdown !== undefined ? parseMaxDrawdown(options.maxDrawdown) : undefined },
    reflexion: { max_retries: options.maxRetries !== undefined ? parseMaxRetries(options.maxRetries) : undefined },
    strict_mode: options.strict,
  };
}

/**
 * Executes `goalguard run`. Sets `process.exitCode = 1` when the inputs are
 * invalid or the goal fails; returns the goal result when a run took place.
 */
export async function executeRunCommand(options: RunCommandOptions, globalVerbose = false, deps: RunCommandDeps = {}): Promise<GoalResult | undefined> {
  const cwd = deps.cwd ?? process.cwd();
  const verbose = globalVerbose || Boolean(options.verbose);

  try {
    const goal = parseGoal(options.goal);
    const dataPath = requireExistingPath('--data', path.resolve(cwd, options.data));
    const config = loadConfig(buildOverrides(options, cwd), { cwd, env: deps.env });

    const runId = deps.runId ?? crypto.randomUUID();

    console.log('');
    console.log(formatStep(`Goal: ${goal}`));
    console.log(formatInfo(`data:         ${dataPath}`));
    console.log(formatInfo(`max drawdown: ${(config.gates.max_drawdown_limit * 100).toFixed(1)}%`));
    console.log(formatInfo(`strict mode:  ${config.strict_mode ? 'on' : 'off'}`));
    console.log(formatInfo(`max retries:  ${config.reflexion.max_retries}`));
    if (verbose) console.log(formatInfo(`run id:       ${runId}`));

    const invoker = deps.createInvoker ? deps.createInvoker(config) : createToolInvoker(config, cwd);
    const orchestrator = createGoalOrchestrator({ config, invoker, cwd, runId, logger: new CliWorkflowLogger(runId, verbose) });

    if (verbose) {
      orchestrator.getStateMachine().events.onTransition((event) => {
        console.log(formatStateTransition(event.from, event.to));
      });
    }

    const result = await orchestrator.runGoal({ goal, dataPath });
    console.log(formatGoalResult(result, { verbose }));

    if (result.status === 'failed') {
      process.exitCode = 1;
    }
    return result;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(formatError(msg));
    process.exitCode = 1;
    return undefined;
  }
}
