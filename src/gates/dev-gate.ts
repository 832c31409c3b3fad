import type { ToolInvoker } from '../tools/types';
import type { WorkflowLogger } from '../orchestrator/logger';
import { silentLogger } from '../orchestrator/logger';
import { buildGateResult } from './gate-result';
import type { Gate, GateContext, GateResult } from './types';

export const DEFAULT_DETERMINISM_RUNS = 3;

export interface DevGateOptions {
  determinismRuns?: number;
  logger?: WorkflowLogger;
}

/**
 * Development gate: tests, determinism and lint. Every check runs on every
 * call; failures accumulate so one run reports all of them.
 */
export class DevGate implements Gate {
  readonly name = 'DevGate';

  private determinismRuns: number;
  private logger: WorkflowLogger;

  constructor(
    private invoker: ToolInvoker,
    options: DevGateOptions = {},
  ) {
    this.determinismRuns = options.determinismRuns ?? DEFAULT_DETERMINISM_RUNS;
    this.logger = options.logger ?? silentLogger;
  }

  async run(context: GateContext): Promise<GateResult> {
    const checks: Record<string, boolean> = {};
    const errors: string[] = [];
    const details: GateResult['details'] = {};

    // 1. Tests
    this.logger.info('Running tests');
    const tests = await this.invoker.invoke({ toolType: 'run_tests', parameters: {} });
    checks.tests_pass = tests.success;
    if (!tests.success) errors.push(`Tests failed: ${tests.error}`);
    details.tests_pass = tests.output;

    // 2. Determinism
    this.logger.info('Checking determinism');
    const specPath = typeof context.spec_path === 'string' && context.spec_path ? context.spec_path : undefined;
    const dataPath = typeof context.data_path === 'string' && context.data_path ? context.data_path : undefined;
    if (specPath && dataPath) {
      const determinism = await this.invoker.invoke({
        toolType: 'check_determinism',
        parameters: { spec_path: specPath, data_path: dataPath, runs: this.determinismRuns },
      });
      checks.determinism = determinism.success;
      if (!determinism.success) errors.push(`Determinism check failed: ${determinism.error}`);
      details.determinism = determinism.output;
    } else {
      checks.determinism = false;
      errors.push('missing spec_path or data_path');
    }

    // 3. Lint
    this.logger.info('Running lint');
    const lint = await this.invoker.invoke({ toolType: 'lint', parameters: {} });
    checks.lint = lint.success;
    if (!lint.success) errors.push(`Lint failed: ${lint.error}`);
    details.lint = lint.output;

    return buildGateResult(checks, errors, details);
  }
}
