#!/usr/bin/env node
import { Command } from 'commander';
import { registerCommands } from './commands';
import { formatError } from './formatters';

export function createProgram(): Command {
  const program = new Command();

  program.name('goalguard').description('Goal-guarded strategy research: design, backtest, gate and commit').version('0.1.0').option('--verbose', 'Show detailed output', false);

  registerCommands(program);
  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(formatError(err instanceof Error ? err.message : String(err)));
      process.exitCode = 1;
    });
}
