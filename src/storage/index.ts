export { openDatabase } from './database.js';
export type { HyperlayerDatabase } from './database.js';
export { runMigrations, MIGRATIONS } from './migrations.js';
export type { Migration } from './migrations.js';
export { SqliteHypergraphStore } from './hypergraph-store.js';
export type { BulkItem, BulkResult } from './hypergraph-store.js';
export type { HypergraphStore, StoredEdge } from './store.js';
