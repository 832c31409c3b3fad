import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import type { Config } from '../../config/validator';
import { createToolInvoker } from '../../orchestrator/runtime';
import type { ToolInvoker } from '../../tools/types';
import { formatError, formatStep } from '../formatters';
import { parseArtifactId } from '../validators';

export function registerShowCommand(program: Command): void {
  program
    .command('show')
    .description('Print a committed record from the memory store')
    .argument('<artifactId>', '64-character artifact id')
    .option('--hipcortex-cli <path>', 'Path to the hipcortex binary')
    .action(async (artifactId: string, options: { hipcortexCli?: string }) => {
      await executeShowCommand(artifactId, options);
    });
}

export async function executeShowCommand(
  artifactId: string,
  options: { hipcortexCli?: string } = {},
  deps: { cwd?: string; env?: NodeJS.ProcessEnv; createInvoker?: (config: Config) => ToolInvoker } = {},
): Promise<boolean> {
  try {
    const id = parseArtifactId(artifactId);
    const cwd = deps.cwd ?? process.cwd();
    const config = loadConfig({ memory: { cli_path: options.hipcortexCli } }, { cwd, env: deps.env });
    const invoker = deps.createInvoker ? deps.createInvoker(config) : createToolInvoker(config, cwd);

    // Reading committed records is outside any goal run, so the call goes straight to the contract
    const result = await invoker.invoke({ toolType: 'memory_show', parameters: { artifact_id: id } });
    if (!result.success) {
      console.error(formatError(`Could not show ${id}: ${result.error}`));
      process.exitCode = 1;
      return false;
    }

    const content = result.output?.content;
    console.log(formatStep(`Artifact ${id}`));
    console.log(typeof content === 'string' ? content : JSON.stringify(result.output ?? {}, null, 2));
    return true;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(formatError(msg));
    process.exitCode = 1;
    return false;
  }
}
