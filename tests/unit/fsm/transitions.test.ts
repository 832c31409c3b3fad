import { STATES } from '../../../src/fsm/states';
import { transitions } from '../../../src/fsm/transitions';

describe('transition table', () => {
  it('should have a row for every state', () => {
    expect(Object.keys(transitions).sort()).toEqual([...STATES].sort());
  });

  it('should only target known states', () => {
    for (const row of Object.values(transitions)) {
      for (const target of Object.values(row)) {
        expect(STATES).toContain(target);
      }
    }
  });

  it('should have no way out of error', () => {
    expect(transitions.error).toEqual({});
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(transitions)).toBe(true);
    expect(Object.isFrozen(transitions.init)).toBe(true);
  });

  it('should keep gate phases looping on themselves', () => {
    expect(transitions.dev_gate).toEqual({ check_determinism: 'dev_gate', lint: 'dev_gate', run_tests: 'dev_gate' });
    expect(transitions.product_gate).toEqual({ crv_verify: 'product_gate' });
  });
});
