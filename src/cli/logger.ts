import type { WorkflowLogger } from '../orchestrator/logger';
import { formatError, formatInfo, formatWarning } from './formatters';

function suffix(data?: Record<string, unknown>): string {
  return data ? ` ${JSON.stringify(data)}` : '';
}

/** Logger that writes directly to the console; info and debug lines need `--verbose` */
export class CliWorkflowLogger implements WorkflowLogger {
  constructor(
    private runId: string,
    private verbose: boolean,
  ) {}

  info(message: string, data?: Record<string, unknown>): void {
    if (this.verbose) {
      console.log(formatInfo(`[${this.runId.slice(0, 8)}] ${message}${suffix(data)}`));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    console.warn(formatWarning(`WARN: ${message}${suffix(data)}`));
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(formatError(`${message}${suffix(data)}`));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.verbose) {
      console.log(formatInfo(`DEBUG: ${message}${suffix(data)}`));
    }
  }
}
