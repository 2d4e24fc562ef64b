import type BetterSqlite3 from 'better-sqlite3';

import { Atom } from '../hyperedge/atom.js';
import { Hyperedge } from '../hyperedge/hyperedge.js';
import { parseEdge, toEdge } from '../hyperedge/parser.js';
import { typedPredicate } from '../hyperedge/typing.js';
import { debug, debugTimed } from '../shared/debug.js';
import { HyperlayerError, InvalidArgumentError, StoreError, toStoreError } from '../shared/errors.js';
import {
  AttributesSchema,
  assertValidAttributes,
  type Attributes,
} from '../shared/types.js';
import type { HypergraphStore, StoredEdge } from './store.js';

// =============================================================================
// Raw Row Types (snake_case, matches SQL columns)
// =============================================================================

interface HyperedgeRow {
  id: number;
  edge: string;
  connector: string;
  arity: number;
  attrs: string; // JSON string
  created_at: string;
  updated_at: string;
}

// =============================================================================
// Bulk Types
// =============================================================================

/** One edge to load, in the `{ s, attrs }` shape foundation packs use. */
export interface BulkItem {
  s: string;
  attrs?: Attributes;
}

export interface BulkResult {
  inserted: number;
  updated: number;
  skipped: number;
  errors: Array<{ item: BulkItem; error: string }>;
}

// =============================================================================
// Row Mapping
// =============================================================================

/**
 * Rows are written only through this store, so a row that fails to parse is
 * corruption, reported as StoreError rather than ParseError.
 */
function rowToStoredEdge(row: HyperedgeRow): StoredEdge {
  let edge: Hyperedge;
  try {
    edge = parseEdge(row.edge);
  } catch (err) {
    throw new StoreError(`Corrupt edge row ${row.id}: '${row.edge}'`, { cause: err });
  }
  return { edge, attrs: parseAttrsColumn(row) };
}

function parseAttrsColumn(row: HyperedgeRow): Attributes {
  let raw: unknown;
  try {
    raw = JSON.parse(row.attrs);
  } catch (err) {
    throw new StoreError(`Corrupt attributes on edge row ${row.id}`, { cause: err });
  }
  const parsed = AttributesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StoreError(`Corrupt attributes on edge row ${row.id}: not a flat object`);
  }
  return parsed.data;
}

function concreteAtoms(edge: Hyperedge): Atom[] {
  return edge.atoms().filter((a) => !a.isWildcard && !a.isEllipsis);
}

// =============================================================================
// Store
// =============================================================================

/**
 * SQLite-backed hypergraph store.
 *
 * Edges are identified by their canonical string. Every distinct atom of an
 * edge (nested ones included) is indexed in `edge_atoms`; pattern queries
 * narrow candidates through that index when the pattern has a concrete atom,
 * then apply `Hyperedge.matches` to each candidate.
 *
 * Fixed statements are prepared once in the constructor. Statements whose
 * placeholder count depends on the input are prepared per call.
 */
export class SqliteHypergraphStore implements HypergraphStore {
  private readonly db: BetterSqlite3.Database;

  private readonly stmtGetByEdge: BetterSqlite3.Statement;
  private readonly stmtInsert: BetterSqlite3.Statement;
  private readonly stmtInsertAtom: BetterSqlite3.Statement;
  private readonly stmtUpdateAttrs: BetterSqlite3.Statement;
  private readonly stmtDelete: BetterSqlite3.Statement;
  private readonly stmtAll: BetterSqlite3.Statement;
  private readonly stmtAllLimited: BetterSqlite3.Statement;
  private readonly stmtCount: BetterSqlite3.Statement;
  private readonly stmtByConnector: BetterSqlite3.Statement;
  private readonly stmtAtomsByPrefix: BetterSqlite3.Statement;

  constructor(db: BetterSqlite3.Database) {
    this.db = db;

    this.stmtGetByEdge = db.prepare('SELECT * FROM hyperedges WHERE edge = ?');

    this.stmtInsert = db.prepare(`
      INSERT INTO hyperedges (edge, connector, arity, attrs)
      VALUES (?, ?, ?, ?)
    `);

    this.stmtInsertAtom = db.prepare(`
      INSERT OR IGNORE INTO edge_atoms (edge_id, atom)
      VALUES (?, ?)
    `);

    this.stmtUpdateAttrs = db.prepare(`
      UPDATE hyperedges SET attrs = ?, updated_at = datetime('now') WHERE id = ?
    `);

    this.stmtDelete = db.prepare('DELETE FROM hyperedges WHERE edge = ?');

    this.stmtAll = db.prepare('SELECT * FROM hyperedges ORDER BY id');
    this.stmtAllLimited = db.prepare('SELECT * FROM hyperedges ORDER BY id LIMIT ?');
    this.stmtCount = db.prepare('SELECT COUNT(*) FROM hyperedges').pluck();

    this.stmtByConnector = db.prepare(
      'SELECT * FROM hyperedges WHERE connector = ? ORDER BY id LIMIT ?',
    );

    this.stmtAtomsByPrefix = db
      .prepare(
        "SELECT DISTINCT atom FROM edge_atoms WHERE atom LIKE ? ESCAPE '\\' ORDER BY atom LIMIT ?",
      )
      .pluck();
  }

  // ---------------------------------------------------------------------------
  // Read surface (HypergraphStore)
  // ---------------------------------------------------------------------------

  query(pattern: Hyperedge): StoredEdge[] {
    return this.guard('Query failed', () =>
      debugTimed('store', `query ${pattern.toString()}`, () => {
        const candidates = this.candidateRows(pattern);
        const results: StoredEdge[] = [];
        for (const row of candidates) {
          const stored = rowToStoredEdge(row);
          if (stored.edge.matches(pattern)) {
            results.push(stored);
          }
        }
        return results;
      }),
    );
  }

  getAttrs(edge: Hyperedge): Attributes | undefined {
    return this.guard('Attribute lookup failed', () => {
      const row = this.getRow(edge);
      return row ? parseAttrsColumn(row) : undefined;
    });
  }

  neighborsSharingAtom(edge: Hyperedge): StoredEdge[] {
    return this.guard('Neighbour lookup failed', () => {
      const atoms = concreteAtoms(edge).map((a) => a.toString());
      if (atoms.length === 0) return [];

      const placeholders = atoms.map(() => '?').join(', ');
      const rows = this.db
        .prepare(
          `SELECT * FROM hyperedges
           WHERE id IN (SELECT edge_id FROM edge_atoms WHERE atom IN (${placeholders}))
             AND edge != ?
           ORDER BY id`,
        )
        .all(...atoms, edge.toString()) as HyperedgeRow[];

      return rows.map(rowToStoredEdge);
    });
  }

  // ---------------------------------------------------------------------------
  // Write surface
  // ---------------------------------------------------------------------------

  /**
   * Stores an edge, merging `attrs` into any attributes it already has.
   * Patterns cannot be stored.
   */
  add(value: string | Hyperedge, attrs: Attributes = {}): StoredEdge {
    const edge = toEdge(value);
    if (edge.isPattern()) {
      throw new InvalidArgumentError('edge', `cannot store a pattern: ${edge.toString()}`);
    }
    const validated = assertValidAttributes(attrs);

    return this.guard('Add failed', () => {
      this.db.transaction(() => this.writeEdge(edge, validated))();
      return { edge, attrs: this.requireAttrs(edge) };
    });
  }

  /**
   * Merges attributes into a stored edge. The edge must exist.
   */
  setAttrs(value: string | Hyperedge, attrs: Attributes): Attributes {
    const edge = toEdge(value);
    const validated = assertValidAttributes(attrs);

    return this.guard('Setting attributes failed', () => {
      const row = this.getRow(edge);
      if (!row) {
        throw new InvalidArgumentError('edge', `not stored: ${edge.toString()}`);
      }
      const merged = { ...parseAttrsColumn(row), ...validated };
      this.stmtUpdateAttrs.run(JSON.stringify(merged), row.id);
      return merged;
    });
  }

  exists(value: string | Hyperedge): boolean {
    const edge = toEdge(value);
    return this.guard('Existence check failed', () => this.getRow(edge) !== undefined);
  }

  /** Removes a stored edge. Returns false when it was not stored. */
  remove(value: string | Hyperedge): boolean {
    const edge = toEdge(value);
    return this.guard('Remove failed', () => {
      const info = this.stmtDelete.run(edge.toString());
      debug('store', 'Edge removed', { edge: edge.toString(), removed: info.changes });
      return info.changes > 0;
    });
  }

  /**
   * Adds many edges in one transaction.
   *
   * A bad item (unparsable string, invalid attributes) is recorded in
   * `errors` and the rest still load. With `upsert` off, edges that already
   * exist are skipped untouched.
   */
  bulkAdd(items: readonly BulkItem[], opts: { upsert?: boolean } = {}): BulkResult {
    const upsert = opts.upsert ?? true;
    const result: BulkResult = { inserted: 0, updated: 0, skipped: 0, errors: [] };

    const run = this.db.transaction(() => {
      for (const item of items) {
        try {
          const edge = parseEdge(item.s);
          if (edge.isPattern()) {
            throw new InvalidArgumentError('edge', `cannot store a pattern: ${item.s}`);
          }
          const attrs = assertValidAttributes(item.attrs ?? {});
          const exists = this.getRow(edge) !== undefined;

          if (exists && !upsert) {
            result.skipped++;
            continue;
          }
          this.writeEdge(edge, attrs);
          if (exists) {
            result.updated++;
          } else {
            result.inserted++;
          }
        } catch (err) {
          if (!(err instanceof HyperlayerError)) {
            throw err;
          }
          result.errors.push({ item, error: err.message });
          debug('store', 'Bulk item rejected', { s: item.s, error: err.message });
        }
      }
    });

    this.guard('Bulk add failed', () => run());

    debug('store', 'Bulk add complete', {
      inserted: result.inserted,
      updated: result.updated,
      skipped: result.skipped,
      errors: result.errors.length,
    });
    return result;
  }

  // ---------------------------------------------------------------------------
  // Inspection
  // ---------------------------------------------------------------------------

  all(limit?: number): StoredEdge[] {
    return this.guard('Listing edges failed', () => {
      const rows = (
        limit === undefined ? this.stmtAll.all() : this.stmtAllLimited.all(limit)
      ) as HyperedgeRow[];
      return rows.map(rowToStoredEdge);
    });
  }

  count(): number {
    return this.guard('Count failed', () => this.stmtCount.get() as number);
  }

  /**
   * Edges whose head atom is `connector`. An untyped connector is read as a
   * predicate (`is` becomes `is/P`).
   */
  edgesByConnector(connector: string, limit = -1): StoredEdge[] {
    const typed = typedPredicate(connector);
    return this.guard('Connector lookup failed', () => {
      const rows = this.stmtByConnector.all(typed, limit) as HyperedgeRow[];
      return rows.map(rowToStoredEdge);
    });
  }

  /**
   * Distinct atoms (canonical `label/type`) starting with `prefix`.
   * A trailing `*` on the prefix is ignored.
   */
  atomsByPrefix(prefix: string, limit = 100): string[] {
    const clean = prefix.endsWith('*') ? prefix.slice(0, -1) : prefix;
    const like = clean.replace(/[%_\\]/g, '\\$&') + '%';
    return this.guard('Atom lookup failed', () =>
      this.stmtAtomsByPrefix.all(like, limit) as string[],
    );
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private getRow(edge: Hyperedge): HyperedgeRow | undefined {
    return this.stmtGetByEdge.get(edge.toString()) as HyperedgeRow | undefined;
  }

  private requireAttrs(edge: Hyperedge): Attributes {
    const row = this.getRow(edge);
    if (!row) {
      throw new StoreError(`Edge vanished after write: ${edge.toString()}`);
    }
    return parseAttrsColumn(row);
  }

  /**
   * Inserts the edge and its atom index rows, or merges attributes into the
   * existing row. Callers run this inside a transaction.
   */
  private writeEdge(edge: Hyperedge, attrs: Attributes): void {
    const existing = this.getRow(edge);

    if (existing) {
      if (Object.keys(attrs).length > 0) {
        const merged = { ...parseAttrsColumn(existing), ...attrs };
        this.stmtUpdateAttrs.run(JSON.stringify(merged), existing.id);
      }
      return;
    }

    const info = this.stmtInsert.run(
      edge.toString(),
      edge.headAtom().toString(),
      edge.arity,
      JSON.stringify(attrs),
    );
    const edgeId = Number(info.lastInsertRowid);
    for (const a of edge.atoms()) {
      this.stmtInsertAtom.run(edgeId, a.toString());
    }
    debug('store', 'Edge stored', { edge: edge.toString(), id: edgeId });
  }

  /**
   * Narrows the scan using the pattern's concrete atoms: a candidate must
   * contain all of them. A pattern made only of wildcards scans everything.
   */
  private candidateRows(pattern: Hyperedge): HyperedgeRow[] {
    const atoms = concreteAtoms(pattern).map((a) => a.toString());
    if (atoms.length === 0) {
      return this.stmtAll.all() as HyperedgeRow[];
    }

    const placeholders = atoms.map(() => '?').join(', ');
    return this.db
      .prepare(
        `SELECT * FROM hyperedges
         WHERE id IN (
           SELECT edge_id FROM edge_atoms
           WHERE atom IN (${placeholders})
           GROUP BY edge_id
           HAVING COUNT(*) = ?
         )
         ORDER BY id`,
      )
      .all(...atoms, atoms.length) as HyperedgeRow[];
  }

  /**
   * Runs a store operation, converting driver failures to StoreError.
   * Errors already in the hyperlayer taxonomy pass through unchanged.
   */
  private guard<T>(context: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw toStoreError(context, err);
    }
  }
}
