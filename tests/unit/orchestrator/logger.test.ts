import { ConsoleWorkflowLogger } from '../../../src/orchestrator/logger';

describe('ConsoleWorkflowLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should prefix lines with the short run id and level', () => {
    const logger = new ConsoleWorkflowLogger('0123456789abcdef');

    expect(logger.format('INFO', 'Starting goal run')).toBe('[goalguard:01234567] INFO  Starting goal run');
    expect(logger.format('WARN', 'Gate failed', { gate: 'DevGate' })).toBe('[goalguard:01234567] WARN  Gate failed {"gate":"DevGate"}');
  });

  it('should fall back to a bare prefix without a run id', () => {
    expect(new ConsoleWorkflowLogger().format('DEBUG', 'x')).toBe('[goalguard] DEBUG x');
  });

  it('should route levels to the matching console methods', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new ConsoleWorkflowLogger('run-1');

    logger.error('Commit failed');

    expect(error).toHaveBeenCalledWith('[goalguard:run-1] ERROR Commit failed');
  });
});
