import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { z } from 'zod';
import { BinaryNotFoundError } from './errors';
import { ARTIFACT_ID_PATTERN, canonicalJsonHash, stableHashBytes } from './hashing';
import { runCommand, splitCommandLine, tailLines } from './process-runner';
import type { CommandRunner } from './process-runner';
import {
  BacktestStatsSchema,
  BacktestToolInputSchema,
  CrvReportSchema,
  CrvVerifyToolInputSchema,
  DeterminismToolInputSchema,
  EmptyParametersSchema,
  GenerateStrategyInputSchema,
  MemoryCommitInputSchema,
  MemorySearchInputSchema,
  MemoryShowInputSchema,
  formatSchemaIssues,
} from './schemas';
import type { BacktestToolInput } from './schemas';
import { generateStrategySpec } from './strategy-generator';
import type { StrategyDefaults } from './strategy-generator';
import { ENGINE_BINARY, MEMORY_BINARY } from './binaries';
import { toolFailure, toolSuccess } from './types';
import type { ToolCall, ToolInvoker, ToolResult } from './types';

/** Files a backtest writes into its output directory */
export const BACKTEST_ARTIFACTS = ['stats.json', 'trades.csv', 'equity_curve.csv'] as const;

export interface ProcessInvokerOptions {
  /** Resolved path of the engine binary; engine tools fail when absent */
  engineCli?: string;
  /** Resolved path of the memory-store binary; memory tools fail when absent */
  memoryCli?: string;
  testCommand: string;
  lintCommand: string;
  /** Working directory for test and lint commands */
  workdir: string;
  timeoutMs?: number;
  strategyDefaults: StrategyDefaults;
  runner?: CommandRunner;
}

class ParameterError extends Error {
  constructor(toolType: string, detail: string) {
    super(`Invalid parameters for ${toolType}: ${detail}`);
    this.name = 'ParameterError';
  }
}

function parseParameters<T>(toolType: string, schema: z.ZodType<T>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ParameterError(toolType, formatSchemaIssues(parsed.error));
  }
  return parsed.data;
}

/** Decode a JSON document from tool stdout, tolerating log lines printed before it */
export function parseJsonOutput(stdout: string): unknown {
  const trimmed = stdout.trim();
  try {
    return JSON.parse(trimmed);
  } catch (error) {
    const start = trimmed.indexOf('{');
    if (start > 0) {
      return JSON.parse(trimmed.slice(start));
    }
    throw error;
  }
}

/**
 * Tool contract implementation backed by external processes: the quant engine
 * for backtests and verification, configured commands for tests and lint, and
 * the memory store for commits.
 */
export class ProcessToolInvoker implements ToolInvoker {
  private runner: CommandRunner;

  constructor(private options: ProcessInvokerOptions) {
    this.runner = options.runner ?? runCommand;
  }

  async invoke(call: ToolCall): Promise<ToolResult> {
    try {
      switch (call.toolType) {
        case 'generate_strategy':
          return await this.generateStrategy(parseParameters(call.toolType, GenerateStrategyInputSchema, call.parameters));
        case 'backtest':
          return await this.backtest(parseParameters(call.toolType, BacktestToolInputSchema, call.parameters));
        case 'run_tests':
          parseParameters(call.toolType, EmptyParametersSchema, call.parameters);
          return await this.runConfiguredCommand('Tests', this.options.testCommand);
        case 'lint':
          parseParameters(call.toolType, EmptyParametersSchema, call.parameters);
          return await this.runConfiguredCommand('Lint', this.options.lintCommand);
        case 'check_determinism':
          return await this.checkDeterminism(parseParameters(call.toolType, DeterminismToolInputSchema, call.parameters));
        case 'crv_verify':
          return await this.crvVerify(parseParameters(call.toolType, CrvVerifyToolInputSchema, call.parameters));
        case 'memory_commit':
          return await this.memoryCommit(parseParameters(call.toolType, MemoryCommitInputSchema, call.parameters));
        case 'memory_search':
          return await this.memorySearch(parseParameters(call.toolType, MemorySearchInputSchema, call.parameters));
        case 'memory_show':
          return await this.memoryShow(parseParameters(call.toolType, MemoryShowInputSchema, call.parameters));
        default: {
          const unsupported: never = call;
          return toolFailure(`Unsupported tool call: ${JSON.stringify(unsupported)}`);
        }
      }
    } catch (error) {
      return toolFailure(error instanceof Error ? error.message : String(error));
    }
  }

  // ── Strategy ────────────────────────────────────────────────────────

  private async generateStrategy(params: z.infer<typeof GenerateStrategyInputSchema>): Promise<ToolResult> {
    const spec = generateStrategySpec(params.goal, this.options.strategyDefaults);
    await fs.mkdir(path.dirname(params.spec_path), { recursive: true });
    await fs.writeFile(params.spec_path, JSON.stringify(spec, null, 2), 'utf8');
    return toolSuccess({ spec, spec_path: params.spec_path }, canonicalJsonHash(spec));
  }

  // ── Engine ──────────────────────────────────────────────────────────

  private async backtest(params: BacktestToolInput): Promise<ToolResult> {
    const engine = this.requireBinary(this.options.engineCli, ENGINE_BINARY);
    await fs.mkdir(params.output_dir, { recursive: true });

    const result = await this.runner(engine, ['backtest', '--spec', params.spec_path, '--data', params.data_path, '--output', params.output_dir], {
      timeoutMs: this.options.timeoutMs,
    });
    if (result.exitCode !== 0) {
      return toolFailure(`Backtest failed (exit ${result.exitCode}): ${tailLines(result.stderr || result.stdout, 5)}`);
    }

    const raw = await fs.readFile(path.join(params.output_dir, 'stats.json'), 'utf8');
    const stats = BacktestStatsSchema.safeParse(JSON.parse(raw));
    if (!stats.success) {
      return toolFailure(`Backtest produced invalid stats.json: ${formatSchemaIssues(stats.error)}`);
    }

    return toolSuccess({ stats: stats.data, output_dir: params.output_dir }, stableHashBytes(raw));
  }

  private async checkDeterminism(params: z.infer<typeof DeterminismToolInputSchema>): Promise<ToolResult> {
    const scratch = await fs.mkdtemp(path.join(os.tmpdir(), 'goalguard-determinism-'));
    try {
      const hashes: string[] = [];
      for (let run = 1; run <= params.runs; run++) {
        const outputDir = path.join(scratch, `run-${run}`);
        const result = await this.backtest({ spec_path: params.spec_path, data_path: params.data_path, output_dir: outputDir });
        if (!result.success) {
          return toolFailure(`Run ${run}/${params.runs} failed: ${result.error}`, { runs: params.runs, hashes });
        }
        hashes.push(await hashBacktestArtifacts(outputDir));
      }

      const deterministic = hashes.every((h) => h === hashes[0]);
      const output = { deterministic, runs: params.runs, hashes };
      if (!deterministic) {
        return toolFailure(`Backtest output differs across ${params.runs} runs`, output);
      }
      return toolSuccess(output, hashes[0]);
    } finally {
      await fs.rm(scratch, { recursive: true, force: true });
    }
  }

  private async crvVerify(params: z.infer<typeof CrvVerifyToolInputSchema>): Promise<ToolResult> {
    const engine = this.requireBinary(this.options.engineCli, ENGINE_BINARY);
    const args = [
      'crv-verify',
      '--stats',
      params.stats_path,
      '--trades',
      params.trades_path,
      '--equity',
      params.equity_path,
      '--max-drawdown',
      String(params.max_drawdown_limit),
    ];
    const result = await this.runner(engine, args, { timeoutMs: this.options.timeoutMs });

    let decoded: unknown;
    try {
      decoded = parseJsonOutput(result.stdout);
    } catch {
      return toolFailure(`CRV verifier produced unreadable output (exit ${result.exitCode}): ${tailLines(result.stderr || result.stdout, 5)}`);
    }

    const envelope = decoded !== null && typeof decoded === 'object' && 'crv_report' in decoded ? decoded.crv_report : decoded;
    const report = CrvReportSchema.safeParse(envelope);
    if (!report.success) {
      return toolFailure(`CRV verifier produced an invalid report: ${formatSchemaIssues(report.error)}`);
    }

    const output = { crv_report: report.data };
    if (result.exitCode !== 0 || !report.data.passed) {
      return toolFailure(`CRV verification failed: ${report.data.violations.length} violation(s)`, output);
    }
    return toolSuccess(output, canonicalJsonHash(report.data));
  }

  // ── Test / lint commands ────────────────────────────────────────────

  private async runConfiguredCommand(label: string, commandLine: string): Promise<ToolResult> {
    const [command, args] = splitCommandLine(commandLine);
    const result = await this.runner(command, args, { cwd: this.options.workdir, timeoutMs: this.options.timeoutMs });
    const output = {
      command: commandLine,
      exit_code: result.exitCode,
      stdout: tailLines(result.stdout),
      stderr: tailLines(result.stderr),
    };
    if (result.exitCode !== 0) {
      return toolFailure(`${label} failed with exit code ${result.exitCode}`, output);
    }
    return toolSuccess(output);
  }

  // ── Memory store ────────────────────────────────────────────────────

  private async memoryCommit(params: z.infer<typeof MemoryCommitInputSchema>): Promise<ToolResult> {
    const memory = this.requireBinary(this.options.memoryCli, MEMORY_BINARY);
    const args = ['commit', '--goal', params.goal, '--spec', params.spec_path, '--results', params.output_dir];
    for (const id of params.artifact_ids) {
      args.push('--artifact', id);
    }

    const result = await this.runner(memory, args, { timeoutMs: this.options.timeoutMs });
    if (result.exitCode !== 0) {
      return toolFailure(`Commit failed (exit ${result.exitCode}): ${tailLines(result.stderr || result.stdout, 5)}`);
    }

    const commitId = ARTIFACT_ID_PATTERN.exec(result.stdout)?.[0];
    if (!commitId) {
      return toolFailure('Commit did not report an artifact id');
    }
    return toolSuccess({ commit_id: commitId, message: result.stdout.trim() }, commitId);
  }

  private async memorySearch(params: z.infer<typeof MemorySearchInputSchema>): Promise<ToolResult> {
    const memory = this.requireBinary(this.options.memoryCli, MEMORY_BINARY);
    const args = ['search', '--query', params.query];
    if (params.limit !== undefined) {
      args.push('--limit', String(params.limit));
    }

    const result = await this.runner(memory, args, { timeoutMs: this.options.timeoutMs });
    if (result.exitCode !== 0) {
      return toolFailure(`Search failed (exit ${result.exitCode}): ${tailLines(result.stderr || result.stdout, 5)}`);
    }

    const matches = result.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter(Boolean);
    return toolSuccess({ query: params.query, matches });
  }

  private async memoryShow(params: z.infer<typeof MemoryShowInputSchema>): Promise<ToolResult> {
    const memory = this.requireBinary(this.options.memoryCli, MEMORY_BINARY);
    const result = await this.runner(memory, ['show', params.artifact_id], { timeoutMs: this.options.timeoutMs });
    if (result.exitCode !== 0) {
      return toolFailure(`Show failed (exit ${result.exitCode}): ${tailLines(result.stderr || result.stdout, 5)}`);
    }
    return toolSuccess({ artifact_id: params.artifact_id, content: result.stdout.trim() }, params.artifact_id);
  }

  private requireBinary(resolved: string | undefined, name: string): string {
    if (!resolved) {
      throw new BinaryNotFoundError(name);
    }
    return resolved;
  }
}

/** Combined hash of a backtest's output files, in a fixed order */
export async function hashBacktestArtifacts(outputDir: string): Promise<string> {
  const parts: string[] = [];
  for (const name of BACKTEST_ARTIFACTS) {
    const content = await fs.readFile(path.join(outputDir, name));
    parts.push(`${name}:${stableHashBytes(content)}`);
  }
  return stableHashBytes(parts.join('\n'));
}
