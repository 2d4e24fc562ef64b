/**
 * Bounded multi-hop reasoning over shared-atom adjacency.
 *
 * Two stored edges are adjacent when they share at least one atom. The search
 * is breadth-first, so every edge is emitted once, at the smallest hop count
 * that reaches it. `path` lists the canonical strings of the edges walked from
 * the start frontier to the result, excluding the result itself.
 *
 * The first predecessor to reach an edge wins. Which one that is depends on
 * the store's neighbour order, which the store does not promise; two runs over
 * different stores with the same content may report different (equally short)
 * paths.
 *
 * `limit` is checked after every emission, so the last layer may be cut off
 * part-way. Callers get a hard cap on result count rather than a complete
 * final layer.
 */

import type { Hyperedge } from '../hyperedge/hyperedge.js';
import { toEdge } from '../hyperedge/parser.js';
import { debug } from '../shared/debug.js';
import { InvalidArgumentError } from '../shared/errors.js';
import type { Attributes } from '../shared/types.js';
import type { HypergraphStore } from '../storage/store.js';

export const DEFAULT_HOPS = 2;
export const DEFAULT_LIMIT = 100;

export interface ReasonOptions {
  /** Maximum hop count, a positive integer. Default 2. */
  hops?: number;
  /** Maximum number of results, a positive integer. Default 100. */
  limit?: number;
}

export interface ReasoningResult {
  edge: Hyperedge;
  edgeStr: string;
  distance: number;
  path: string[];
  attrs: Attributes;
}

interface FrontierEntry {
  edge: Hyperedge;
  path: string[];
}

function assertPositiveInt(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(name, `must be a positive integer, got ${value}`);
  }
}

/**
 * Walks outward from `start`.
 *
 * - A pattern start seeds the frontier with its matches, each emitted at
 *   distance 0 with an empty path. No matches means no results.
 * - A concrete start edge is the frontier on its own. It is not emitted;
 *   its neighbours appear at distance 1 with `path = [start]`.
 */
export function reason(
  store: HypergraphStore,
  start: string | Hyperedge,
  options: ReasonOptions = {},
): ReasoningResult[] {
  const hops = options.hops ?? DEFAULT_HOPS;
  const limit = options.limit ?? DEFAULT_LIMIT;
  assertPositiveInt('hops', hops);
  assertPositiveInt('limit', limit);

  const startEdge = toEdge(start);
  const visited = new Set<string>();
  const results: ReasoningResult[] = [];
  let frontier: FrontierEntry[] = [];

  if (startEdge.isPattern()) {
    for (const { edge, attrs } of store.query(startEdge)) {
      const key = edge.toString();
      if (visited.has(key)) continue;
      visited.add(key);
      results.push({ edge, edgeStr: key, distance: 0, path: [], attrs });
      frontier.push({ edge, path: [] });
      if (results.length >= limit) {
        return finish(startEdge, results);
      }
    }
  } else {
    visited.add(startEdge.toString());
    frontier.push({ edge: startEdge, path: [] });
  }

  for (let depth = 1; depth <= hops && frontier.length > 0; depth++) {
    const next: FrontierEntry[] = [];

    for (const current of frontier) {
      const via = [...current.path, current.edge.toString()];

      for (const { edge, attrs } of store.neighborsSharingAtom(current.edge)) {
        const key = edge.toString();
        if (visited.has(key)) continue;
        visited.add(key);

        results.push({ edge, edgeStr: key, distance: depth, path: [...via], attrs });
        next.push({ edge, path: via });

        if (results.length >= limit) {
          return finish(startEdge, results);
        }
      }
    }

    frontier = next;
  }

  return finish(startEdge, results);
}

function finish(start: Hyperedge, results: ReasoningResult[]): ReasoningResult[] {
  debug('reason', 'Traversal complete', {
    start: start.toString(),
    results: results.length,
    maxDistance: results.length > 0 ? results[results.length - 1].distance : 0,
  });
  return results;
}
