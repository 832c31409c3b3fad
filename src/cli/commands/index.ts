import { Command } from 'commander';
import { registerRunCommand } from './run';
import { registerShowCommand } from './show';
import { registerStatusCommand } from './status';
import { registerValidateCommand } from './validate';

/**
 * Register all subcommands here
 */
export function registerCommands(program: Command): void {
  registerRunCommand(program);
  registerValidateCommand(program);
  registerStatusCommand(program);
  registerShowCommand(program);
}
