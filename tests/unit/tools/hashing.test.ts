import { canonicalJson, canonicalJsonHash, isArtifactId, stableHashBytes } from '../../../src/tools/hashing';

describe('hashing', () => {
  it('should produce the SHA-256 hex digest of the input', () => {
    expect(stableHashBytes('Hello, World!')).toBe('dffd6021bb2bd5b0af676290809ec3a53191dd81c7f70a4b28688a362182986f');
  });

  it('should hash strings and buffers alike', () => {
    expect(stableHashBytes(Buffer.from('Hello, World!', 'utf8'))).toBe(stableHashBytes('Hello, World!'));
  });

  it('should sort keys at every level and drop undefined values', () => {
    expect(canonicalJson({ b: 1, a: { d: [1, { f: 2, e: 3 }], c: undefined } })).toBe('{"a":{"d":[1,{"e":3,"f":2}]},"b":1}');
  });

  it('should give equal objects the same hash regardless of key order', () => {
    expect(canonicalJsonHash({ seed: 42, strategy: { type: 'ts_momentum', lookback: 20 } })).toBe(canonicalJsonHash({ strategy: { lookback: 20, type: 'ts_momentum' }, seed: 42 }));
  });

  it('should recognise artifact ids', () => {
    expect(isArtifactId(stableHashBytes('x'))).toBe(true);
    expect(isArtifactId('abc')).toBe(false);
    expect(isArtifactId('g'.repeat(64))).toBe(false);
  });
});
