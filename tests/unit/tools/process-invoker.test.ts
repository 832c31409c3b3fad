import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ProcessToolInvoker } from '../../../src/tools/process-invoker';
import type { ProcessInvokerOptions } from '../../../src/tools/process-invoker';
import { CommandSpawnError } from '../../../src/tools/errors';
import type { ToolCall } from '../../../src/tools/types';
import { canonicalJsonHash, stableHashBytes } from '../../../src/tools/hashing';
import type { CommandOptions, CommandOutput, CommandRunner } from '../../../src/tools/process-runner';

const ENGINE = '/opt/goalguard/bin/quant_engine';
const MEMORY = '/opt/goalguard/bin/hipcortex';
const COMMIT_ID = 'c'.repeat(64);
const STATS = '{"total_return":0.12,"sharpe_ratio":1.1,"max_drawdown":0.07,"num_trades":14}';

function output(exitCode: number, stdout = '', stderr = ''): CommandOutput {
  return { exitCode, stdout, stderr };
}

function argAfter(args: string[], flag: string): string {
  const value = args[args.indexOf(flag) + 1];
  if (value === undefined) throw new Error(`missing ${flag}`);
  return value;
}

/** Fake engine: writes the backtest artifacts into `--output` */
async function writeArtifacts(args: string[], trades = 'timestamp,qty\n'): Promise<CommandOutput> {
  const dir = argAfter(args, '--output');
  await fs.writeFile(path.join(dir, 'stats.json'), STATS, 'utf8');
  await fs.writeFile(path.join(dir, 'trades.csv'), trades, 'utf8');
  await fs.writeFile(path.join(dir, 'equity_curve.csv'), 'timestamp,equity\n', 'utf8');
  return output(0, 'backtest complete');
}

describe('ProcessToolInvoker', () => {
  let tmpDir: string;
  let runner: jest.MockedFunction<CommandRunner>;

  const createInvoker = (overrides: Partial<ProcessInvokerOptions> = {}): ProcessToolInvoker =>
    new ProcessToolInvoker({
      engineCli: ENGINE,
      memoryCli: MEMORY,
      testCommand: 'cargo test --workspace',
      lintCommand: 'cargo clippy -- -D warnings',
      workdir: tmpDir,
      strategyDefaults: { symbol: 'SPY', initial_cash: 100000, seed: 42, lookback: 20, vol_target: 0.15, vol_lookback: 20 },
      runner,
      ...overrides,
    });

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'goalguard-invoker-'));
    runner = jest.fn<Promise<CommandOutput>, [string, string[], CommandOptions?]>();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('generate_strategy', () => {
    it('should write the spec and identify it by its canonical hash', async () => {
      const specPath = path.join(tmpDir, 'run', 'strategy_spec.json');

      const result = await createInvoker().invoke({ toolType: 'generate_strategy', parameters: { goal: 'trend on SPY', spec_path: specPath } });

      const written: unknown = JSON.parse(await fs.readFile(specPath, 'utf8'));
      expect(result.success).toBe(true);
      expect(result.artifactId).toBe(canonicalJsonHash(written));
      expect(result.output?.spec_path).toBe(specPath);
      expect(runner).not.toHaveBeenCalled();
    });
  });

  describe('backtest', () => {
    it('should run the engine and return the stats', async () => {
      runner.mockImplementation(async (_cmd, args) => writeArtifacts(args));
      const outputDir = path.join(tmpDir, 'out');

      const result = await createInvoker().invoke({ toolType: 'backtest', parameters: { spec_path: '/s.json', data_path: '/d.csv', output_dir: outputDir } });

      expect(runner).toHaveBeenCalledWith(ENGINE, ['backtest', '--spec', '/s.json', '--data', '/d.csv', '--output', outputDir], { timeoutMs: undefined });
      expect(result).toEqual({
        success: true,
        output: { stats: { total_return: 0.12, sharpe_ratio: 1.1, max_drawdown: 0.07, num_trades: 14 }, output_dir: outputDir },
        artifactId: stableHashBytes(STATS),
      });
    });

    it('should report a non-zero exit with the tail of stderr', async () => {
      runner.mockResolvedValue(output(2, '', 'loading data\npanic: bad data'));

      const result = await createInvoker().invoke({ toolType: 'backtest', parameters: { spec_path: '/s.json', data_path: '/d.csv', output_dir: path.join(tmpDir, 'out') } });

      expect(result).toEqual({ success: false, error: 'Backtest failed (exit 2): loading data\npanic: bad data' });
    });

    it('should fail when the engine binary was not found', async () => {
      const result = await createInvoker({ engineCli: undefined }).invoke({
        toolType: 'backtest',
        parameters: { spec_path: '/s.json', data_path: '/d.csv', output_dir: path.join(tmpDir, 'out') },
      });

      expect(result).toEqual({ success: false, error: 'quant_engine not found' });
    });

    it('should reject invalid parameters without running anything', async () => {
      const result = await createInvoker().invoke({ toolType: 'backtest', parameters: { spec_path: '', data_path: '/d.csv', output_dir: '/out' } });

      expect(result).toEqual({ success: false, error: 'Invalid parameters for backtest: spec_path: String must contain at least 1 character(s)' });
      expect(runner).not.toHaveBeenCalled();
    });

    it('should turn a process that cannot start into a failed result', async () => {
      runner.mockRejectedValue(new CommandSpawnError(ENGINE, new Error('not installed or not on PATH')));

      const result = await createInvoker().invoke({ toolType: 'backtest', parameters: { spec_path: '/s.json', data_path: '/d.csv', output_dir: path.join(tmpDir, 'out') } });

      expect(result).toEqual({ success: false, error: `Failed to start ${ENGINE}: not installed or not on PATH` });
    });
  });

  describe('check_determinism', () => {
    it('should pass when every run produces identical artifacts', async () => {
      runner.mockImplementation(async (_cmd, args) => writeArtifacts(args));

      const result = await createInvoker().invoke({ toolType: 'check_determinism', parameters: { spec_path: '/s.json', data_path: '/d.csv', runs: 3 } });

      expect(result.success).toBe(true);
      expect(runner).toHaveBeenCalledTimes(3);
      expect(result.output).toMatchObject({ deterministic: true, runs: 3 });
    });

    it('should fail when runs differ', async () => {
      let run = 0;
      runner.mockImplementation(async (_cmd, args) => {
        run += 1;
        return writeArtifacts(args, `timestamp,qty\n${run}\n`);
      });

      const result = await createInvoker().invoke({ toolType: 'check_determinism', parameters: { spec_path: '/s.json', data_path: '/d.csv', runs: 2 } });

      expect(result.success).toBe(false);
      expect(result.error).toBe('Backtest output differs across 2 runs');
      expect(result.output).toMatchObject({ deterministic: false, runs: 2 });
    });

    it('should name the run that failed', async () => {
      runner.mockImplementationOnce(async (_cmd, args) => writeArtifacts(args)).mockResolvedValueOnce(output(1, '', 'crashed'));

      const result = await createInvoker().invoke({ toolType: 'check_determinism', parameters: { spec_path: '/s.json', data_path: '/d.csv', runs: 3 } });

      expect(result.error).toBe('Run 2/3 failed: Backtest failed (exit 1): crashed');
    });
  });

  describe('crv_verify', () => {
    const parameters = { stats_path: '/o/stats.json', trades_path: '/o/trades.csv', equity_path: '/o/equity_curve.csv', max_drawdown_limit: 0.1 };

    it('should pass a clean report and identify it by hash', async () => {
      runner.mockResolvedValue(output(0, '{"crv_report":{"passed":true,"violations":[]}}'));

      const result = await createInvoker().invoke({ toolType: 'crv_verify', parameters });

      expect(runner).toHaveBeenCalledWith(
        ENGINE,
        ['crv-verify', '--stats', '/o/stats.json', '--trades', '/o/trades.csv', '--equity', '/o/equity_curve.csv', '--max-drawdown', '0.1'],
        { timeoutMs: undefined },
      );
      expect(result).toEqual({
        success: true,
        output: { crv_report: { passed: true, violations: [] } },
        artifactId: canonicalJsonHash({ passed: true, violations: [] }),
      });
    });

    it('should report violations, reading the JSON after any log lines', async () => {
      runner.mockResolvedValue(output(1, 'checking rules\n{"passed":false,"violations":[{"rule_id":"max_drawdown","severity":"error","message":"too deep"}]}'));

      const result = await createInvoker().invoke({ toolType: 'crv_verify', parameters });

      expect(result).toEqual({
        success: false,
        error: 'CRV verification failed: 1 violation(s)',
        output: { crv_report: { passed: false, violations: [{ rule_id: 'max_drawdown', severity: 'error', message: 'too deep' }] } },
      });
    });

    it('should fail on unreadable output', async () => {
      runner.mockResolvedValue(output(3, 'segfault', ''));

      const result = await createInvoker().invoke({ toolType: 'crv_verify', parameters });

      expect(result.error).toBe('CRV verifier produced unreadable output (exit 3): segfault');
    });
  });

  describe('run_tests and lint', () => {
    it('should run the configured test command in the workdir', async () => {
      runner.mockResolvedValue(output(101, 'test result: FAILED', ''));

      const result = await createInvoker().invoke({ toolType: 'run_tests', parameters: {} });

      expect(runner).toHaveBeenCalledWith('cargo', ['test', '--workspace'], { cwd: tmpDir, timeoutMs: undefined });
      expect(result).toEqual({
        success: false,
        error: 'Tests failed with exit code 101',
        output: { command: 'cargo test --workspace', exit_code: 101, stdout: 'test result: FAILED', stderr: '' },
      });
    });

    it('should succeed on a clean lint', async () => {
      runner.mockResolvedValue(output(0));

      const result = await createInvoker().invoke({ toolType: 'lint', parameters: {} });

      expect(runner).toHaveBeenCalledWith('cargo', ['clippy', '--', '-D', 'warnings'], { cwd: tmpDir, timeoutMs: undefined });
      expect(result.success).toBe(true);
    });

    it('should reject unexpected parameters without running the command', async () => {
      const call: ToolCall = JSON.parse('{"toolType":"lint","parameters":{"verbose":true}}');

      const result = await createInvoker().invoke(call);

      expect(result).toEqual({ success: false, error: "Invalid parameters for lint: Unrecognized key(s) in object: 'verbose'" });
      expect(runner).not.toHaveBeenCalled();
    });
  });

  describe('memory tools', () => {
    it('should commit and return the reported id', async () => {
      runner.mockResolvedValue(output(0, `Committed ${COMMIT_ID}\n`));

      const result = await createInvoker().invoke({
        toolType: 'memory_commit',
        parameters: { goal: 'trend on SPY', spec_path: '/s.json', output_dir: '/o', artifact_ids: ['a'.repeat(64)] },
      });

      expect(runner).toHaveBeenCalledWith(MEMORY, ['commit', '--goal', 'trend on SPY', '--spec', '/s.json', '--results', '/o', '--artifact', 'a'.repeat(64)], {
        timeoutMs: undefined,
      });
      expect(result).toEqual({ success: true, output: { commit_id: COMMIT_ID, message: `Committed ${COMMIT_ID}` }, artifactId: COMMIT_ID });
    });

    it('should fail a commit that reports no id', async () => {
      runner.mockResolvedValue(output(0, 'ok'));

      const result = await createInvoker().invoke({ toolType: 'memory_commit', parameters: { goal: 'g', spec_path: '/s.json', output_dir: '/o', artifact_ids: [] } });

      expect(result).toEqual({ success: false, error: 'Commit did not report an artifact id' });
    });

    it('should return search matches one per line', async () => {
      runner.mockResolvedValue(output(0, 'abc  first\n\n  def second \n'));

      const result = await createInvoker().invoke({ toolType: 'memory_search', parameters: { query: 'trend', limit: 5 } });

      expect(runner).toHaveBeenCalledWith(MEMORY, ['search', '--query', 'trend', '--limit', '5'], { timeoutMs: undefined });
      expect(result.output).toEqual({ query: 'trend', matches: ['abc  first', 'def second'] });
    });

    it('should show a record by id', async () => {
      runner.mockResolvedValue(output(0, '{"goal":"trend on SPY"}\n'));

      const result = await createInvoker().invoke({ toolType: 'memory_show', parameters: { artifact_id: COMMIT_ID } });

      expect(result).toEqual({ success: true, output: { artifact_id: COMMIT_ID, content: '{"goal":"trend on SPY"}' }, artifactId: COMMIT_ID });
    });

    it('should validate artifact ids before calling the store', async () => {
      const result = await createInvoker().invoke({ toolType: 'memory_show', parameters: { artifact_id: 'not-an-id' } });

      expect(result).toEqual({ success: false, error: 'Invalid parameters for memory_show: artifact_id: artifact_id must be 64 hex characters' });
      expect(runner).not.toHaveBeenCalled();
    });

    it('should fail memory tools when the store binary is missing', async () => {
      const result = await createInvoker({ memoryCli: undefined }).invoke({ toolType: 'memory_search', parameters: { query: 'trend' } });

      expect(result).toEqual({ success: false, error: 'hipcortex not found' });
    });
  });
});
