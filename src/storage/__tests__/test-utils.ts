import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { DatabaseConfig } from '../../shared/types.js';
import { openDatabase, type HyperlayerDatabase } from '../database.js';
import { SqliteHypergraphStore } from '../hypergraph-store.js';

/**
 * Creates a temporary database directory and returns a DatabaseConfig
 * pointing to it, along with a cleanup function.
 *
 * Each test should use its own temp directory to avoid cross-test interference.
 */
export function createTempDb(): {
  config: DatabaseConfig;
  dir: string;
  cleanup: () => void;
} {
  const dir = mkdtempSync(join(tmpdir(), 'hyperlayer-test-'));
  const config: DatabaseConfig = {
    dbPath: join(dir, 'test.db'),
    busyTimeout: 5000,
  };

  const cleanup = () => {
    rmSync(dir, { recursive: true, force: true });
  };

  return { config, dir, cleanup };
}

/**
 * Opens a migrated store in a fresh temp directory. `cleanup` closes the
 * database and removes the directory.
 */
export function openTempStore(): {
  hdb: HyperlayerDatabase;
  store: SqliteHypergraphStore;
  dir: string;
  cleanup: () => void;
} {
  const temp = createTempDb();
  const hdb = openDatabase(temp.config);
  const store = new SqliteHypergraphStore(hdb.db);

  const cleanup = () => {
    hdb.close();
    temp.cleanup();
  };

  return { hdb, store, dir: temp.dir, cleanup };
}
