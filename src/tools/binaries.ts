import fs from 'fs';
import path from 'path';
import { BinaryNotFoundError } from './errors';

export const ENGINE_BINARY = 'quant_engine';
export const MEMORY_BINARY = 'hipcortex';

export interface LocateOptions {
  cwd?: string;
  pathEnv?: string;
}

function isExecutableFile(candidate: string): boolean {
  try {
    const stat = fs.statSync(candidate);
    if (!stat.isFile()) return false;
    fs.accessSync(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Candidate locations in lookup order: explicit path, local build output, then PATH */
export function binaryCandidates(name: string, explicitPath?: string, opts: LocateOptions = {}): string[] {
  const cwd = opts.cwd ?? process.cwd();
  const candidates: string[] = [];

  if (explicitPath) {
    candidates.push(path.resolve(cwd, explicitPath));
  }

  candidates.push(path.join(cwd, 'target', 'release', name), path.join(cwd, 'target', 'debug', name));

  const pathEnv = opts.pathEnv ?? process.env.PATH ?? '';
  for (const dir of pathEnv.split(path.delimiter).filter(Boolean)) {
    candidates.push(path.join(dir, name));
  }

  return candidates;
}

/**
 * Resolve a tool binary. An explicit path that does not point to an
 * executable is an error rather than a reason to fall back.
 * @throws BinaryNotFoundError
 */
export function locateBinary(name: string, explicitPath?: string, opts: LocateOptions = {}): string {
  if (explicitPath) {
    const resolved = path.resolve(opts.cwd ?? process.cwd(), explicitPath);
    if (isExecutableFile(resolved)) return resolved;
    throw new BinaryNotFoundError(name, [resolved]);
  }

  const candidates = binaryCandidates(name, undefined, opts);
  const found = candidates.find(isExecutableFile);
  if (!found) {
    throw new BinaryNotFoundError(name, candidates.slice(0, 2));
  }
  return found;
}

/** Like locateBinary, but returns undefined instead of throwing */
export function tryLocateBinary(name: string, explicitPath?: string, opts: LocateOptions = {}): string | undefined {
  try {
    return locateBinary(name, explicitPath, opts);
  } catch (error) {
    if (error instanceof BinaryNotFoundError) return undefined;
    throw error;
  }
}
