import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { ConfigError } from '../errors.js';
import { logDebug } from './logger.js';

export type EncodingToolConfig = {
  /** Indentation used for aggregate bodies in pretty-printed declarations */
  indent?: string;
  /** Enable debug logs without env var */
  debug?: boolean;
};

export const CONFIG_FILE_NAME = 'objc-encoding.config.js';

let cached:
  | { loaded: true; config: EncodingToolConfig | null }
  | { loaded: false } = { loaded: false };

function configPath(projectRoot: string) {
  return join(projectRoot, CONFIG_FILE_NAME);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateConfig(value: unknown, path: string): EncodingToolConfig {
  if (!isRecord(value)) {
    throw new ConfigError(`Invalid ${CONFIG_FILE_NAME} at ${path}: expected an object export`);
  }
  const { indent, debug } = value;
  if (indent !== undefined && typeof indent !== 'string') {
    throw new ConfigError(`Invalid ${CONFIG_FILE_NAME} at ${path}: "indent" must be a string`);
  }
  if (debug !== undefined && typeof debug !== 'boolean') {
    throw new ConfigError(`Invalid ${CONFIG_FILE_NAME} at ${path}: "debug" must be a boolean`);
  }
  return { indent, debug };
}

/**
 * Loads optional `objc-encoding.config.js` from the project root.
 *
 * - Optional: if missing, returns null
 * - Cached: reads at most once per process
 */
export async function loadOptionalConfig(
  projectRoot: string = process.cwd(),
): Promise<EncodingToolConfig | null> {
  if (cached.loaded) return cached.config;

  const p = configPath(projectRoot);
  if (!existsSync(p)) {
    cached = { loaded: true, config: null };
    return null;
  }

  const url = pathToFileURL(resolve(p)).href;
  const mod: unknown = await import(url);
  const exported = isRecord(mod) && 'default' in mod ? mod.default : mod;
  const config = validateConfig(exported, p);
  cached = { loaded: true, config };
  logDebug('loaded config', { path: p });
  return config;
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cached = { loaded: false };
}
