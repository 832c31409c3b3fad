import { DevGate } from '../../../src/gates/dev-gate';
import { toolFailure, toolSuccess } from '../../../src/tools/types';
import { ScriptedInvoker } from '../../helpers/scripted-invoker';

describe('DevGate', () => {
  const context = { spec_path: '/work/strategy_spec.json', data_path: '/data/spy.csv', output_dir: '/work/backtest' };
  let invoker: ScriptedInvoker;

  beforeEach(() => {
    invoker = new ScriptedInvoker().on('run_tests', toolSuccess()).on('check_determinism', toolSuccess()).on('lint', toolSuccess());
  });

  it('should pass when tests, determinism and lint all succeed', async () => {
    const result = await new DevGate(invoker).run(context);

    expect(result.passed).toBe(true);
    expect(result.checks).toEqual({ tests_pass: true, determinism: true, lint: true });
    expect(result.errors).toEqual([]);
  });

  it('should fail on a lint failure alone and report it', async () => {
    invoker.on('lint', toolFailure('3 warnings'));

    const result = await new DevGate(invoker).run(context);

    expect(result.passed).toBe(false);
    expect(result.checks).toEqual({ tests_pass: true, determinism: true, lint: false });
    expect(result.errors).toEqual(['Lint failed: 3 warnings']);
  });

  it('should run every check even after the first one fails', async () => {
    invoker.on('run_tests', toolFailure('2 tests failed')).on('check_determinism', toolFailure('hashes differ'));

    const result = await new DevGate(invoker).run(context);

    expect(invoker.toolTypes()).toEqual(['run_tests', 'check_determinism', 'lint']);
    expect(result.checks).toEqual({ tests_pass: false, determinism: false, lint: true });
    expect(result.errors).toEqual(['Tests failed: 2 tests failed', 'Determinism check failed: hashes differ']);
  });

  it('should fail determinism without invoking it when paths are missing', async () => {
    const result = await new DevGate(invoker).run({ output_dir: '/work/backtest' });

    expect(invoker.toolTypes()).toEqual(['run_tests', 'lint']);
    expect(result.passed).toBe(false);
    expect(result.checks.determinism).toBe(false);
    expect(result.errors).toEqual(['missing spec_path or data_path']);
  });

  it('should ask for the configured number of determinism runs', async () => {
    await new DevGate(invoker, { determinismRuns: 5 }).run(context);

    expect(invoker.calls[1]).toEqual({
      toolType: 'check_determinism',
      parameters: { spec_path: '/work/strategy_spec.json', data_path: '/data/spy.csv', runs: 5 },
    });
  });

  it('should keep tool output as check details', async () => {
    invoker.on('run_tests', toolFailure('Tests failed with exit code 101', { exit_code: 101 }));

    const result = await new DevGate(invoker).run(context);

    expect(result.details.tests_pass).toEqual({ exit_code: 101 });
  });
});
