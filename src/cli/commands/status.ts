import path from 'node:path';
import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import { RunStore } from '../../orchestrator/run-store';
import type { RunRecord } from '../../orchestrator/run-store';
import { formatError, formatInfo, formatRunRecord } from '../formatters';

type StatusCommandOptions = {
  runId?: string;
  json?: boolean;
};

async function resolveRecord(store: RunStore, runId?: string): Promise<RunRecord | null> {
  return runId ? store.load(runId) : store.latest();
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show the latest (or a given) goal run')
    .option('--run-id <id>', 'Show status for a specific run id')
    .option('--json', 'Output status as JSON', false)
    .action(async (options: StatusCommandOptions) => {
      await executeStatusCommand(options);
    });
}

export async function executeStatusCommand(options: StatusCommandOptions, deps: { cwd?: string; env?: NodeJS.ProcessEnv } = {}): Promise<void> {
  try {
    const cwd = deps.cwd ?? process.cwd();
    const config = loadConfig({}, { cwd, env: deps.env });
    const store = new RunStore(path.resolve(cwd, config.workspace_dir));

    const record = await resolveRecord(store, options.runId);

    if (!record) {
      const msg = options.runId ? `No run found for runId: ${options.runId}` : 'No goal runs found.';
      console.log(formatInfo(msg));
      return;
    }

    if (options.json) {
      console.log(JSON.stringify(record, null, 2));
      return;
    }

    console.log(formatRunRecord(record));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(formatError(msg));
    process.exitCode = 1;
  }
}
