import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import YAML from 'yaml';
import { ConfigSchema } from './validator';
import type { Config } from './validator';
import { defaults } from './defaults';
import { formatSchemaIssues } from '../tools/schemas';

export const CONFIG_FILE = 'goalguard.yaml';

/**
 * DeepPartial allows for recursive partials of our Config type.
 * This is useful for CLI and YAML overrides.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends (infer U)[] ? DeepPartial<U>[] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export interface LoadConfigOptions {
  /** Directory holding goalguard.yaml and .env (default: process.cwd()) */
  cwd?: string;
  /** Environment to read; when given, .env is not loaded */
  env?: NodeJS.ProcessEnv;
}

export class ConfigValidationError extends Error {
  constructor(public issues: string) {
    super(`Invalid configuration: ${issues}`);
    this.name = 'ConfigValidationError';
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function numberFromEnv(value: string | undefined): number | undefined {
  return value === undefined || value.trim() === '' ? undefined : Number(value);
}

/**
 * Resolve configuration: defaults, then goalguard.yaml, then environment
 * variables, then CLI overrides, validated as a whole.
 * @throws ConfigValidationError
 */
export function loadConfig(cliOverrides: DeepPartial<Config> = {}, opts: LoadConfigOptions = {}): Config {
  const cwd = opts.cwd ?? process.cwd();

  if (!opts.env) {
    dotenv.config({ path: path.join(cwd, '.env') });
  }
  const env = opts.env ?? process.env;

  // 1. Start with Defaults
  const config: Record<string, unknown> = structuredClone(defaults);

  // 2. Override with goalguard.yaml (if exists)
  const yamlPath = path.join(cwd, CONFIG_FILE);
  if (fs.existsSync(yamlPath)) {
    const parsedYaml: unknown = YAML.parse(fs.readFileSync(yamlPath, 'utf8'));
    if (isPlainObject(parsedYaml)) {
      deepMerge(config, parsedYaml);
    }
  }

  // 3. Override with Environment Variables
  deepMerge(config, {
    engine: { cli_path: env.GOALGUARD_ENGINE_CLI },
    memory: { cli_path: env.GOALGUARD_MEMORY_CLI },
    reflexion: { max_retries: numberFromEnv(env.GOALGUARD_MAX_RETRIES) },
    workspace_dir: env.GOALGUARD_WORKSPACE_DIR,
  });

  // 4. Override with CLI Arguments
  deepMerge(config, cliOverrides);

  // 5. Validate with Zod
  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(formatSchemaIssues(result.error));
  }

  return result.data;
}

/** Deep merge for config objects; undefined source values leave the target alone */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
  for (const key of Object.keys(source)) {
    const sourceValue = source[key];

    if (isPlainObject(sourceValue)) {
      const existing = target[key];
      const nested: Record<string, unknown> = isPlainObject(existing) ? existing : {};
      target[key] = nested;
      deepMerge(nested, sourceValue);
    } else if (sourceValue !== undefined) {
      target[key] = sourceValue;
    }
  }
}
