import type { Hyperedge } from '../hyperedge/hyperedge.js';
import type { Attributes } from '../shared/types.js';

export interface StoredEdge {
  edge: Hyperedge;
  attrs: Attributes;
}

/**
 * The read surface the validator and reasoner need from a hypergraph store.
 *
 * Calls are synchronous. Failures are thrown as StoreError and are never
 * retried by callers.
 */
export interface HypergraphStore {
  /** Every stored edge matching `pattern`, in unspecified order. */
  query(pattern: Hyperedge): StoredEdge[];

  /** Attributes of a stored edge; undefined when the edge is not stored. */
  getAttrs(edge: Hyperedge): Attributes | undefined;

  /** Stored edges sharing at least one atom with `edge`, excluding `edge`. */
  neighborsSharingAtom(edge: Hyperedge): StoredEdge[];
}
