import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { debug } from '../shared/debug.js';
import { toStoreError } from '../shared/errors.js';
import type { DatabaseConfig } from '../shared/types.js';
import { runMigrations } from './migrations.js';

const IN_MEMORY = ':memory:';

/**
 * A configured better-sqlite3 connection plus lifecycle helpers.
 */
export interface HyperlayerDatabase {
  db: Database.Database;
  close(): void;
  checkpoint(): void;
}

/**
 * Opens the hypergraph database: WAL journal, pragmas in the order SQLite
 * needs them, then pending migrations.
 *
 * One connection per process. better-sqlite3 is synchronous, so a pool
 * would only add contention.
 *
 * `:memory:` is accepted for throwaway stores; it skips WAL.
 */
export function openDatabase(config: DatabaseConfig): HyperlayerDatabase {
  const inMemory = config.dbPath === IN_MEMORY;

  let db: Database.Database;
  try {
    if (!inMemory) {
      mkdirSync(dirname(config.dbPath), { recursive: true });
    }
    db = new Database(config.dbPath);
  } catch (err) {
    throw toStoreError(`Failed to open hypergraph at ${config.dbPath}`, err);
  }

  try {
    if (!inMemory) {
      // WAL first: synchronous = NORMAL is only safe under WAL
      const journalMode = db.pragma('journal_mode = WAL', { simple: true });
      if (journalMode !== 'wal') {
        debug('db', 'WAL mode not active', { journalMode, path: config.dbPath });
      }
      db.pragma('synchronous = NORMAL');
    }

    db.pragma(`busy_timeout = ${config.busyTimeout}`);
    db.pragma('foreign_keys = ON');
    db.pragma('temp_store = MEMORY');

    runMigrations(db);
  } catch (err) {
    db.close();
    throw toStoreError(`Failed to initialise hypergraph at ${config.dbPath}`, err);
  }

  debug('db', 'Database opened', { path: config.dbPath });

  return {
    db,

    close(): void {
      if (!inMemory) {
        try {
          db.pragma('wal_checkpoint(PASSIVE)');
        } catch (err) {
          // A locked WAL must not prevent the close itself
          debug('db', 'Checkpoint before close failed', { error: String(err) });
        }
      }
      db.close();
    },

    checkpoint(): void {
      if (!inMemory) {
        db.pragma('wal_checkpoint(PASSIVE)');
      }
    },
  };
}
