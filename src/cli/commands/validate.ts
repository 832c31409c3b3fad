import path from 'node:path';
import fs from 'node:fs';
import { Command } from 'commander';
import { CONFIG_FILE, loadConfig } from '../../config/loader';
import { BinaryNotFoundError } from '../../tools/errors';
import { ENGINE_BINARY, MEMORY_BINARY, locateBinary, tryLocateBinary } from '../../tools/binaries';
import { formatError, formatInfo, formatStep, formatSuccess, formatWarning } from '../formatters';

export type ValidateCommandOptions = {
  rustCli?: string;
  hipcortexCli?: string;
};

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Check that the engine and memory binaries can be found')
    .option('--rust-cli <path>', 'Path to the quant_engine binary')
    .option('--hipcortex-cli <path>', 'Path to the hipcortex binary')
    .action((options: ValidateCommandOptions) => {
      executeValidateCommand(options);
    });
}

/** Returns true when the installation is usable; sets `process.exitCode = 1` otherwise */
export function executeValidateCommand(options: ValidateCommandOptions, deps: { cwd?: string; env?: NodeJS.ProcessEnv } = {}): boolean {
  const cwd = deps.cwd ?? process.cwd();
  const locate = { cwd, pathEnv: deps.env?.PATH };

  try {
    console.log(formatStep('Validating installation...'));

    const configFile = path.join(cwd, CONFIG_FILE);
    console.log(formatInfo(`config: ${fs.existsSync(configFile) ? configFile : 'defaults'}`));

    const config = loadConfig({ engine: { cli_path: options.rustCli }, memory: { cli_path: options.hipcortexCli } }, { cwd, env: deps.env });

    const engine = locateBinary(ENGINE_BINARY, config.engine.cli_path, locate);
    console.log(formatSuccess(`✓ Engine CLI found: ${engine}`));

    const memory = tryLocateBinary(MEMORY_BINARY, config.memory.cli_path, locate);
    if (memory) {
      console.log(formatSuccess(`✓ Memory CLI found: ${memory}`));
    } else {
      console.log(formatWarning(`! ${MEMORY_BINARY} not found (optional): commits and memory lookups will fail`));
    }

    console.log(formatSuccess('✓ Installation valid'));
    return true;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(formatError(`✗ ${msg}`));
    if (err instanceof BinaryNotFoundError) {
      console.error(formatInfo('Build the binaries with: cargo build --release'));
    }
    process.exitCode = 1;
    return false;
  }
}
