import { spawn } from 'child_process';
import { CommandSpawnError } from './errors';

export interface CommandOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  cwd?: string;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

/** Signature of anything that can run a command to completion */
export type CommandRunner = (command: string, args: string[], options?: CommandOptions) => Promise<CommandOutput>;

/**
 * Run an external command to completion and capture its output.
 * Rejects only when the process cannot be started; a non-zero exit is reported
 * through `exitCode`.
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd ?? process.cwd(),
      env: options.env ?? process.env,
      timeout: options.timeoutMs,
    });

    let stdout = '';
    let stderr = '';

    child.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'ENOENT') {
        reject(new CommandSpawnError(command, new Error('not installed or not on PATH')));
      } else {
        reject(new CommandSpawnError(command, err));
      }
    });

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      if (code === null) {
        stderr += signal ? `\nterminated by ${signal}` : '';
      }
      resolve({ exitCode: code ?? 1, stdout, stderr });
    });
  });
};

/** Split a configured command line such as `cargo test --workspace` into binary and args */
export function splitCommandLine(commandLine: string): [string, string[]] {
  const parts = commandLine.trim().split(/\s+/).filter(Boolean);
  const [command, ...args] = parts;
  if (!command) {
    throw new Error('Command line is empty');
  }
  return [command, args];
}

/** Last `maxLines` lines of process output, for results and error messages */
export function tailLines(text: string, maxLines = 20): string {
  const lines = text.trimEnd().split('\n');
  return lines.slice(-maxLines).join('\n');
}
