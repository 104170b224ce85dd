/**
 * Loads and validates sync configuration files (YAML or JSON).
 *
 * Relative paths are resolved against the directory of the file; secrets
 * missing from the file are taken from the environment.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { validateSchema } from '../validation';
import type { SyncConfig } from './sync_config.types';

export const DEFAULT_CONFIG_FILENAME = 'wpt-sync.yaml';

/**
 * Error thrown when the configuration file cannot be read or parsed
 */
export class ConfigError extends Error {
  public readonly configPath: string;

  constructor(message: string, configPath: string) {
    super(message);
    this.name = 'ConfigError';
    this.configPath = configPath;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Validates a raw configuration object, applying schema defaults.
 *
 * @param baseDir - Directory relative paths are resolved against
 * @param env - Source of BUGZILLA_API_KEY, GITHUB_TOKEN and GITHUB_WEBHOOK_SECRET
 * @throws SchemaValidationError
 */
export function parseSyncConfig(
  raw: unknown,
  baseDir: string,
  env: NodeJS.ProcessEnv = process.env,
): SyncConfig {
  const config = validateSchema<SyncConfig>('sync_config', raw);
  const resolve = (p: string) => path.resolve(baseDir, p);

  const apiKey = config.tracker.apiKey ?? env['BUGZILLA_API_KEY'];
  const token = config.github.token ?? env['GITHUB_TOKEN'];
  const webhookSecret = config.github.webhookSecret ?? env['GITHUB_WEBHOOK_SECRET'];

  return {
    ...config,
    upstream: { ...config.upstream, root: resolve(config.upstream.root) },
    target: { ...config.target, root: resolve(config.target.root) },
    worktreeRoot: resolve(config.worktreeRoot),
    stateDir: resolve(config.stateDir),
    tracker: { ...config.tracker, ...(apiKey ? { apiKey } : {}) },
    github: {
      ...config.github,
      ...(token ? { token } : {}),
      ...(webhookSecret ? { webhookSecret } : {}),
    },
  };
}

/**
 * Reads a configuration file.
 *
 * @throws ConfigError if the file is missing or is not valid YAML/JSON
 * @throws SchemaValidationError if its content does not match the schema
 */
export async function loadSyncConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<SyncConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await fs.readFile(absolutePath, 'utf-8');
  } catch (error) {
    // fs errors may come from another realm, so match on shape
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigError(`Missing config at ${absolutePath}`, absolutePath);
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config at ${absolutePath} is not valid YAML: ${reason}`, absolutePath);
  }

  return parseSyncConfig(raw, path.dirname(absolutePath), env);
}
