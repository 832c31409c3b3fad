import fs from 'fs/promises';
import path from 'path';
import { CrvReportSchema } from '../tools/schemas';
import type { ToolInvoker, ToolOutput } from '../tools/types';
import type { WorkflowLogger } from '../orchestrator/logger';
import { silentLogger } from '../orchestrator/logger';
import { buildGateResult } from './gate-result';
import type { Gate, GateContext, GateResult } from './types';

export const DEFAULT_MAX_DRAWDOWN_LIMIT = 0.25;

export const CRV_REPORT_FILE = 'crv_report.json';

export interface SupplementaryCheckOutcome {
  passed: boolean;
  error?: string;
  details?: ToolOutput;
}

/** A product-readiness check run after CRV verification */
export interface SupplementaryCheck {
  readonly name: string;
  run(outputDir: string, context: GateContext): Promise<SupplementaryCheckOutcome>;
}

/** Stand-in that always passes until a real implementation is plugged in */
export function placeholderCheck(name: string): SupplementaryCheck {
  return {
    name,
    run: async () => ({ passed: true, details: { note: 'Placeholder - not implemented yet' } }),
  };
}

export interface ProductGateOptions {
  maxDrawdownLimit?: number;
  /** Checks run after CRV; defaults to walk_forward and stress_suite placeholders */
  supplementaryChecks?: SupplementaryCheck[];
  logger?: WorkflowLogger;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Product gate: constraint/risk verification of the backtest artifacts plus
 * the supplementary readiness checks. Without an output directory no artifact
 * path can be formed, so that precondition is the one early return.
 */
export class ProductGate implements Gate {
  readonly name = 'ProductGate';

  private maxDrawdownLimit: number;
  private supplementaryChecks: SupplementaryCheck[];
  private logger: WorkflowLogger;

  constructor(
    private invoker: ToolInvoker,
    options: ProductGateOptions = {},
  ) {
    this.maxDrawdownLimit = options.maxDrawdownLimit ?? DEFAULT_MAX_DRAWDOWN_LIMIT;
    this.supplementaryChecks = options.supplementaryChecks ?? [placeholderCheck('walk_forward'), placeholderCheck('stress_suite')];
    this.logger = options.logger ?? silentLogger;
  }

  getMaxDrawdownLimit(): number {
    return this.maxDrawdownLimit;
  }

  async run(context: GateContext): Promise<GateResult> {
    const outputDir = typeof context.output_dir === 'string' && context.output_dir ? context.output_dir : undefined;
    if (!outputDir) {
      return buildGateResult({ output_dir_provided: false }, ['output_dir not provided in context']);
    }

    const checks: Record<string, boolean> = {};
    const errors: string[] = [];
    const details: GateResult['details'] = {};

    // 1. CRV verification
    this.logger.info('Running CRV verification', { outputDir, maxDrawdownLimit: this.maxDrawdownLimit });
    if (!(await fileExists(path.join(outputDir, CRV_REPORT_FILE)))) {
      checks.crv_exists = false;
      errors.push('CRV report not found');
    } else {
      const crv = await this.invoker.invoke({
        toolType: 'crv_verify',
        parameters: {
          stats_path: path.join(outputDir, 'stats.json'),
          trades_path: path.join(outputDir, 'trades.csv'),
          equity_path: path.join(outputDir, 'equity_curve.csv'),
          max_drawdown_limit: this.maxDrawdownLimit,
        },
      });
      checks.crv_pass = crv.success;
      if (!crv.success) {
        errors.push(`CRV verification failed: ${crv.error}`);
        const report = CrvReportSchema.safeParse(crv.output?.crv_report);
        if (report.success) {
          for (const violation of report.data.violations) {
            errors.push(`${violation.rule_id}: ${violation.message}`);
          }
        }
      }
      details.crv = crv.output;
    }

    // 2..n. Walk-forward, stress suite
    for (const check of this.supplementaryChecks) {
      this.logger.info(`Running ${check.name}`);
      const outcome = await check.run(outputDir, context);
      checks[check.name] = outcome.passed;
      if (!outcome.passed) errors.push(outcome.error ?? `${check.name} failed`);
      details[check.name] = outcome.details;
    }

    return buildGateResult(checks, errors, details);
  }
}
