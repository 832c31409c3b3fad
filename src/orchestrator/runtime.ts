import path from 'node:path';
import type { Config } from '../config/validator';
import { ENGINE_BINARY, MEMORY_BINARY, tryLocateBinary } from '../tools/binaries';
import { ProcessToolInvoker } from '../tools/process-invoker';
import type { ToolInvoker } from '../tools/types';
import { GoalOrchestrator } from './goal-orchestrator';
import type { WorkflowLogger } from './logger';
import { RunStore } from './run-store';

/**
 * Build the process-backed tool invoker for a resolved configuration.
 * Missing binaries are left unset; the tools that need them report
 * "<binary> not found" when called.
 */
export function createToolInvoker(config: Config, cwd: string = process.cwd()): ProcessToolInvoker {
  return new ProcessToolInvoker({
    engineCli: tryLocateBinary(ENGINE_BINARY, config.engine.cli_path, { cwd }),
    memoryCli: tryLocateBinary(MEMORY_BINARY, config.memory.cli_path, { cwd }),
    testCommand: config.engine.test_command,
    lintCommand: config.engine.lint_command,
    workdir: path.resolve(cwd, config.engine.workdir),
    timeoutMs: config.engine.timeout_ms,
    strategyDefaults: config.strategy,
  });
}

export function createGoalOrchestrator(params: { config: Config; invoker: ToolInvoker; cwd?: string; runId?: string; logger?: WorkflowLogger }): GoalOrchestrator {
  const workspaceDir = path.resolve(params.cwd ?? process.cwd(), params.config.workspace_dir);

  return new GoalOrchestrator({
    invoker: params.invoker,
    runId: params.runId,
    workspaceDir,
    maxRetries: params.config.reflexion.max_retries,
    maxDrawdownLimit: params.config.gates.max_drawdown_limit,
    determinismRuns: params.config.gates.determinism_runs,
    strictMode: params.config.strict_mode,
    searchMemory: params.config.memory.search_before_generate,
    logger: params.logger,
    store: new RunStore(workspaceDir),
  });
}
