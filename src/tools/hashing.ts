import crypto from 'crypto';

export const ARTIFACT_ID_PATTERN = /[a-f0-9]{64}/;

export function stableHashBytes(data: string | Buffer): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}

/**
 * Serialize a JSON value with object keys sorted at every level so that equal
 * values always hash to the same artifact id.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export function canonicalJsonHash(value: unknown): string {
  return stableHashBytes(canonicalJson(value));
}

export function isArtifactId(value: string): boolean {
  return value.length === 64 && ARTIFACT_ID_PATTERN.test(value);
}
