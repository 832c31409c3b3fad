import chalk from 'chalk';
import type { GoalResult } from '../orchestrator/data-flow';
import type { RunRecord } from '../orchestrator/run-store';
import type { State } from '../fsm/states';

// ── Primitives ──────────────────────────────────────────────────────────

export function formatStep(message: string): string {
  return chalk.cyan(`> ${message}`);
}

export function formatInfo(message: string): string {
  return chalk.gray(`  ${message}`);
}

export function formatSuccess(message: string): string {
  return chalk.green(`  ${message}`);
}

export function formatError(message: string): string {
  return chalk.red(`  ${message}`);
}

export function formatWarning(message: string): string {
  return chalk.yellow(`  ${message}`);
}

function formatPercent(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

// ── State progress ──────────────────────────────────────────────────────

const STATE_LABELS: Partial<Record<State, string>> = {
  strategy_design: 'Designing strategy...',
  backtest_ready: 'Ready to re-run backtest...',
  backtest_complete: 'Backtest complete',
  dev_gate: 'Running dev gate...',
  dev_gate_passed: 'Dev gate passed',
  product_gate: 'Running product gate...',
  product_gate_passed: 'Product gate passed',
  reflexion: 'Analyzing failure...',
  committed: 'Committed',
  error: 'Error',
};

export function formatStateTransition(from: State, to: State): string {
  const label = STATE_LABELS[to] ?? to;
  return chalk.cyan(`  [${from} -> ${to}] ${label}`);
}

// ── Final result ────────────────────────────────────────────────────────

const RULE = '='.repeat(60);

export function formatGoalResult(result: GoalResult, opts?: { verbose?: boolean }): string {
  const lines: string[] = ['', RULE];

  if (result.status === 'completed') {
    lines.push(chalk.green.bold('✓ Goal completed successfully!'), RULE);

    if (result.artifactId) {
      lines.push('', `Artifact ID: ${result.artifactId}`);
    }

    if (result.stats) {
      lines.push('', 'Final Statistics:');
      lines.push(`  Total Return: ${formatPercent(result.stats.total_return)}`);
      lines.push(`  Sharpe Ratio: ${result.stats.sharpe_ratio.toFixed(2)}`);
      lines.push(`  Max Drawdown: ${formatPercent(result.stats.max_drawdown)}`);
    }
  } else {
    lines.push(chalk.red.bold('✗ Goal failed'), RULE);

    if (result.error) {
      lines.push('', formatError(`Error: ${result.error}`));
    }

    if (result.repairPlan) {
      const plan = result.repairPlan;
      lines.push('', 'Repair plan generated:');
      lines.push(`  Type: ${plan.failureType}`);
      lines.push(`  Description: ${plan.description}`);
      lines.push('', 'Suggested actions:');
      for (const action of plan.actions) {
        lines.push(`  - ${action}`);
      }
    }

    if (opts?.verbose && result.gateFailure) {
      lines.push('', result.gateFailure.summary);
    }
  }

  if (opts?.verbose) {
    lines.push('', formatInfo(`Run ID:    ${result.runId}`));
    lines.push(formatInfo(`State:     ${result.finalState}`));
    lines.push(formatInfo(`Attempts:  ${result.attempts}`));
    lines.push(formatInfo(`Duration:  ${(result.durationMs / 1000).toFixed(1)}s`));
  }

  return lines.join('\n');
}

export function formatRunRecord(record: RunRecord): string {
  const lines = [
    formatSuccess('Goal run status'),
    formatInfo(`runId: ${record.runId}`),
    formatInfo(`goal: ${record.goal}`),
    formatInfo(`status: ${record.status}`),
    formatInfo(`state: ${record.currentState}`),
    formatInfo(`attempts: ${record.attempts}`),
    formatInfo(`updatedAt: ${record.updatedAt}`),
  ];

  if (record.artifactId) {
    lines.push(formatInfo(`artifact: ${record.artifactId}`));
  }
  if (record.error) {
    lines.push(formatError(`error: ${record.error}`));
  }
  if (record.repairPlan) {
    lines.push(formatInfo(`repair plan: ${record.repairPlan.failureType} (retry from ${record.repairPlan.retryState})`));
  }

  return lines.join('\n');
}
