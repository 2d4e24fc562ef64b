import type BetterSqlite3 from 'better-sqlite3';

/**
 * A versioned schema migration.
 * Migrations are applied in order and tracked in the _migrations table.
 */
export interface Migration {
  version: number;
  name: string;
  up: string; // SQL to execute
}

/**
 * All schema migrations in order.
 *
 * Migration 001: hyperedges table. One row per stored top-level edge, keyed
 *   by its canonical string; attributes are a JSON object in TEXT.
 * Migration 002: edge_atoms index table. One row per distinct atom (at any
 *   depth) of each edge, so pattern queries and shared-atom neighbour lookups
 *   can avoid full scans.
 */
export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'create_hyperedges',
    up: `
      CREATE TABLE hyperedges (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        edge TEXT NOT NULL UNIQUE,
        connector TEXT NOT NULL,
        arity INTEGER NOT NULL CHECK(arity >= 1),
        attrs TEXT NOT NULL DEFAULT '{}',
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX idx_hyperedges_connector ON hyperedges(connector);
    `,
  },
  {
    version: 2,
    name: 'create_edge_atoms',
    up: `
      CREATE TABLE edge_atoms (
        edge_id INTEGER NOT NULL REFERENCES hyperedges(id) ON DELETE CASCADE,
        atom TEXT NOT NULL,
        PRIMARY KEY (edge_id, atom)
      );

      CREATE INDEX idx_edge_atoms_atom ON edge_atoms(atom);
    `,
  },
];

/**
 * Applies every migration newer than the highest recorded version, each in
 * its own transaction. Safe to call on every open.
 */
export function runMigrations(db: BetterSqlite3.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const maxVersion = db
    .prepare('SELECT COALESCE(MAX(version), 0) FROM _migrations')
    .pluck()
    .get() as number;

  const insertMigration = db.prepare(
    'INSERT INTO _migrations (version, name) VALUES (?, ?)',
  );

  const applyMigration = db.transaction((m: Migration) => {
    db.exec(m.up);
    insertMigration.run(m.version, m.name);
  });

  for (const migration of MIGRATIONS) {
    if (migration.version > maxVersion) {
      applyMigration(migration);
    }
  }
}
