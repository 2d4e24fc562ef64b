/**
 * KnowledgeBase: the hypergraph store, a layer registry and the reasoning
 * configuration bundled behind one object.
 *
 * Each instance owns its own LayerRegistry, so two knowledge bases over the
 * same database do not see each other's layer toggles.
 */

import type { Element } from './hyperedge/hyperedge.js';
import { Hyperedge, edge } from './hyperedge/hyperedge.js';
import { parseAtom, parseEdge, toEdge } from './hyperedge/parser.js';
import { typedConcept, typedPredicate } from './hyperedge/typing.js';
import { DEFAULT_REASONING_CONFIG, type ReasoningConfig } from './config/reasoning-config.js';
import {
  loadFoundationPack,
  type PackFormat,
  type PackLoadResult,
} from './ingestion/foundation-pack.js';
import { planToEdges } from './ingestion/plan.js';
import { LayerRegistry } from './layers/layer-registry.js';
import { reason, type ReasonOptions, type ReasoningResult } from './reasoning/multi-hop.js';
import { getDatabaseConfig } from './shared/config.js';
import { InvalidArgumentError } from './shared/errors.js';
import type { Attributes, DatabaseConfig } from './shared/types.js';
import { openDatabase, type HyperlayerDatabase } from './storage/database.js';
import {
  SqliteHypergraphStore,
  type BulkItem,
  type BulkResult,
} from './storage/hypergraph-store.js';
import type { StoredEdge } from './storage/store.js';
import { CONTEXT_SUBJECT } from './validation/rule-index.js';
import type { ValidationReport } from './validation/types.js';
import { validate, type Proposal, type ValidateOptions } from './validation/validator.js';

export const USER_LAYER = 'user';

export interface OpenOptions {
  /** Defaults to the configured database (`HYPERLAYER_DB` or the data dir). */
  database?: DatabaseConfig;
  config?: ReasoningConfig;
}

export class KnowledgeBase {
  readonly store: SqliteHypergraphStore;
  readonly layers: LayerRegistry;
  readonly config: ReasoningConfig;
  private readonly database: HyperlayerDatabase | null;

  constructor(
    store: SqliteHypergraphStore,
    config: ReasoningConfig = DEFAULT_REASONING_CONFIG,
    database: HyperlayerDatabase | null = null,
  ) {
    this.store = store;
    this.config = config;
    this.database = database;
    this.layers = new LayerRegistry(config.defaultLayers);
  }

  /**
   * Opens (and migrates) a database and wraps it. The returned instance owns
   * the connection; call `close()` when done.
   */
  static open(options: OpenOptions = {}): KnowledgeBase {
    const database = openDatabase(options.database ?? getDatabaseConfig());
    return new KnowledgeBase(
      new SqliteHypergraphStore(database.db),
      options.config ?? DEFAULT_REASONING_CONFIG,
      database,
    );
  }

  close(): void {
    this.database?.close();
  }

  // ---------------------------------------------------------------------------
  // Core operations
  // ---------------------------------------------------------------------------

  validate(proposed: Proposal | readonly Proposal[], options: ValidateOptions = {}): ValidationReport {
    return validate(this.store, this.layers, proposed, {
      ...options,
      config: options.config ?? this.config,
    });
  }

  reason(start: string | Hyperedge, options: ReasonOptions = {}): ReasoningResult[] {
    return reason(this.store, start, {
      hops: options.hops ?? this.config.defaultHops,
      limit: options.limit ?? this.config.defaultLimit,
    });
  }

  // ---------------------------------------------------------------------------
  // Writing
  // ---------------------------------------------------------------------------

  /**
   * Builds and stores `(connector args...)`. An untyped connector becomes a
   * predicate and untyped string arguments become concepts; a string starting
   * with `(` is parsed as a nested edge.
   */
  addEdge(connector: string, args: ReadonlyArray<string | Hyperedge>, attrs: Attributes = {}): Hyperedge {
    if (args.length === 0) {
      throw new InvalidArgumentError('args', 'at least one argument is required');
    }
    const elements: Element[] = [parseAtom(typedPredicate(connector))];
    for (const arg of args) {
      elements.push(toElement(arg));
    }
    return this.store.add(edge(...elements), attrs).edge;
  }

  addEdgeFromString(text: string, attrs: Attributes = {}): Hyperedge {
    return this.store.add(text, attrs).edge;
  }

  /** Stores a rule written in edge notation. `attrs.layer` makes it a rule. */
  addRule(text: string, attrs: Attributes): Hyperedge {
    return this.addEdgeFromString(text, attrs);
  }

  /** `addFact('ibuprofen', 'contraindicated', 'diabetes')` stores `(contraindicated/P ibuprofen/C diabetes/C)`. */
  addFact(subject: string, predicate: string, object: string, attrs: Attributes = {}): Hyperedge {
    return this.addEdge(predicate, [subject, object], attrs);
  }

  /**
   * Records something known about the user as `(a/P user/C <concept>/C)` in
   * the `user` layer, where the validator picks it up as context.
   */
  addUserFact(text: string, attrs: Attributes = {}, sessionId?: string): Hyperedge {
    const concept = text.trim().toLowerCase();
    if (concept.length === 0) {
      throw new InvalidArgumentError('text', 'must not be blank');
    }
    const merged: Attributes = { ...attrs, layer: USER_LAYER };
    if (sessionId) {
      merged.session_id = sessionId;
    }
    return this.addEdge('a', [CONTEXT_SUBJECT, concept], merged);
  }

  /** Candidate plan edges; nothing is stored. */
  planToEdges(steps: readonly string[], user?: string): BulkItem[] {
    return planToEdges(steps, user);
  }

  bulkAdd(items: readonly BulkItem[], upsert = true): BulkResult {
    return this.store.bulkAdd(items, { upsert });
  }

  loadFoundationPack(path: string, format: PackFormat = 'auto'): Promise<PackLoadResult> {
    return loadFoundationPack(this.store, path, format);
  }

  // ---------------------------------------------------------------------------
  // Reading
  // ---------------------------------------------------------------------------

  query(pattern: string | Hyperedge, limit?: number): StoredEdge[] {
    if (limit !== undefined && (!Number.isInteger(limit) || limit <= 0)) {
      throw new InvalidArgumentError('limit', `must be a positive integer, got ${limit}`);
    }
    const results = this.store.query(toEdge(pattern));
    return limit === undefined ? results : results.slice(0, limit);
  }

  count(): number {
    return this.store.count();
  }
}

function toElement(arg: string | Hyperedge): Element {
  if (arg instanceof Hyperedge) return arg;
  const text = arg.trim();
  return text.startsWith('(') ? parseEdge(text) : parseAtom(typedConcept(text));
}
