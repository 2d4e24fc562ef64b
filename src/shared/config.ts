import { mkdirSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import type { DatabaseConfig } from './types.js';

/**
 * Cached debug-enabled flag.
 * Resolved once per process -- debug mode does not change at runtime.
 */
let _debugCached: boolean | null = null;

/**
 * Returns whether debug logging is enabled for this process.
 *
 * Resolution order:
 * 1. `HYPERLAYER_DEBUG` env var -- `"1"` or `"true"` enables debug mode
 * 2. `<data dir>/config.json` -- `{ "debug": true }` enables debug mode
 * 3. Default: disabled
 *
 * The result is cached after the first call.
 */
export function isDebugEnabled(): boolean {
  if (_debugCached !== null) {
    return _debugCached;
  }

  const envVal = process.env.HYPERLAYER_DEBUG;
  if (envVal === '1' || envVal === 'true') {
    _debugCached = true;
    return true;
  }

  try {
    const configPath = join(getConfigDir(), 'config.json');
    const raw = readFileSync(configPath, 'utf-8');
    const config: unknown = JSON.parse(raw);
    if (typeof config === 'object' && config !== null && 'debug' in config && config.debug === true) {
      _debugCached = true;
      return true;
    }
  } catch {
    // Config file doesn't exist or is invalid -- debug stays off
  }

  _debugCached = false;
  return false;
}

/**
 * Default busy timeout in milliseconds.
 * Must be >= 5000ms to prevent SQLITE_BUSY under concurrent load.
 */
export const DEFAULT_BUSY_TIMEOUT = 5000;

/**
 * Returns the hyperlayer data directory (default `~/.hyperlayer`),
 * creating it if needed.
 *
 * `HYPERLAYER_DATA_DIR` redirects all data storage, which is how tests
 * keep away from the real data directory.
 */
export function getConfigDir(): string {
  const dir = process.env.HYPERLAYER_DATA_DIR || join(homedir(), '.hyperlayer');
  mkdirSync(dir, { recursive: true });
  return dir;
}

/**
 * Returns the path to the hypergraph database file.
 * `HYPERLAYER_DB` overrides the default `<data dir>/hypergraph.db`.
 */
export function getDbPath(): string {
  return process.env.HYPERLAYER_DB || join(getConfigDir(), 'hypergraph.db');
}

/**
 * Returns the default database configuration.
 */
export function getDatabaseConfig(): DatabaseConfig {
  return {
    dbPath: getDbPath(),
    busyTimeout: DEFAULT_BUSY_TIMEOUT,
  };
}
