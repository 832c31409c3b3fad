import fs from 'fs';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Parse `--max-drawdown`, a fraction in (0, 1] such as 0.10 */
export function parseMaxDrawdown(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0 || parsed > 1) {
    throw new ValidationError(`Invalid max drawdown: "${value}". Expected a fraction between 0 and 1 (e.g. 0.10 for 10%)`);
  }
  return parsed;
}

export function parseMaxRetries(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ValidationError(`Invalid max retries: "${value}". Expected a non-negative integer`);
  }
  return parsed;
}

export function parseGoal(value: string): string {
  const goal = value.trim();
  if (!goal) {
    throw new ValidationError('--goal must not be empty');
  }
  return goal;
}

/**
 * Require that a path given on the command line exists.
 * @throws {ValidationError} If it does not
 */
export function requireExistingPath(flag: string, value: string): string {
  if (!fs.existsSync(value)) {
    throw new ValidationError(`${flag} path does not exist: ${value}`);
  }
  return value;
}

export function parseArtifactId(value: string): string {
  const id = value.trim().toLowerCase();
  if (!/^[a-f0-9]{64}$/.test(id)) {
    throw new ValidationError(`Invalid artifact id: "${value}". Expected 64 hex characters`);
  }
  return id;
}
