import { StrictMode } from '../../../src/policy/strict-mode';

describe('StrictMode', () => {
  const idA = 'a'.repeat(64);
  const idB = '0123456789abcdef'.repeat(4);

  it('should accept an artifact response', () => {
    const strict = new StrictMode();
    expect(strict.validateResponse(strict.formatArtifactResponse([idA], 'Committed'))).toBe(true);
  });

  it('should reject text without an artifact id', () => {
    expect(new StrictMode().validateResponse('The strategy looks great')).toBe(false);
  });

  it('should reject an id buried in prose', () => {
    const response = `${idA} is the commit for a trend strategy that keeps drawdown under ten percent`;
    expect(new StrictMode().validateResponse(response)).toBe(false);
  });

  it('should not count uppercase hex as an artifact id', () => {
    expect(new StrictMode().extractArtifactIds('A'.repeat(64))).toEqual([]);
  });

  it('should accept anything when disabled', () => {
    const strict = new StrictMode(false);
    expect(strict.enabled).toBe(false);
    expect(strict.validateResponse('free text')).toBe(true);
  });

  it('should extract every id in order', () => {
    expect(new StrictMode().extractArtifactIds(`first ${idB}, then ${idA}`)).toEqual([idB, idA]);
  });

  it('should format artifact responses', () => {
    const strict = new StrictMode();

    expect(strict.formatArtifactResponse([])).toBe('No artifacts');
    expect(strict.formatArtifactResponse([idA, idB], 'Committed')).toBe(`Committed\nArtifacts:\n  ${idA}\n  ${idB}`);
    expect(strict.formatArtifactResponse([idA])).toBe(`Artifacts:\n  ${idA}`);
  });
});
