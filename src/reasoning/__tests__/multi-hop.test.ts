import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { parseEdge } from '../../hyperedge/parser.js';
import { InvalidArgumentError, ParseError } from '../../shared/errors.js';
import type { SqliteHypergraphStore } from '../../storage/hypergraph-store.js';
import type { HypergraphStore } from '../../storage/store.js';
import { openTempStore } from '../../storage/__tests__/test-utils.js';
import { reason, type ReasoningResult } from '../multi-hop.js';

let store: SqliteHypergraphStore;
let cleanup: () => void;

beforeEach(() => {
  ({ store, cleanup } = openTempStore());
});

afterEach(() => {
  cleanup();
});

function summary(results: ReasoningResult[]): Array<[string, number, string[]]> {
  return results.map((r) => [r.edgeStr, r.distance, r.path]);
}

/** A store that fails on any access. */
const untouchable: HypergraphStore = {
  query: () => {
    throw new Error('store accessed');
  },
  getAttrs: () => {
    throw new Error('store accessed');
  },
  neighborsSharingAtom: () => {
    throw new Error('store accessed');
  },
};

describe('reason from a concrete edge', () => {
  it('finds the single neighbour one hop away', () => {
    store.add('(is/P a/C b/C)');
    store.add('(likes/P b/C c/C)');

    const results = reason(store, '(is/P a/C b/C)', { hops: 1 });
    expect(summary(results)).toEqual([['(likes/P b/C c/C)', 1, ['(is/P a/C b/C)']]]);
  });

  it('does not need the start edge to be stored', () => {
    store.add('(likes/P b/C c/C)');
    const results = reason(store, parseEdge('(is/P a/C b/C)'), { hops: 1 });
    expect(summary(results)).toEqual([['(likes/P b/C c/C)', 1, ['(is/P a/C b/C)']]]);
  });

  describe('on a chain', () => {
    beforeEach(() => {
      store.add('(is/P a/C b/C)');
      store.add('(r1/P b/C c/C)', { layer: 'facts' });
      store.add('(r2/P c/C d/C)');
      store.add('(r3/P d/C e/C)');
      store.add('(r4/P y/C z/C)');
    });

    it('reports breadth-first distances and predecessor paths', () => {
      const results = reason(store, '(is/P a/C b/C)', { hops: 3 });
      expect(summary(results)).toEqual([
        ['(r1/P b/C c/C)', 1, ['(is/P a/C b/C)']],
        ['(r2/P c/C d/C)', 2, ['(is/P a/C b/C)', '(r1/P b/C c/C)']],
        ['(r3/P d/C e/C)', 3, ['(is/P a/C b/C)', '(r1/P b/C c/C)', '(r2/P c/C d/C)']],
      ]);
      expect(results[0].attrs).toEqual({ layer: 'facts' });
    });

    it('stops at the hop bound', () => {
      const results = reason(store, '(is/P a/C b/C)', { hops: 2 });
      expect(results.map((r) => r.edgeStr)).toEqual(['(r1/P b/C c/C)', '(r2/P c/C d/C)']);
    });

    it('defaults to two hops', () => {
      expect(reason(store, '(is/P a/C b/C)')).toHaveLength(2);
    });
  });

  it('reports each edge once, at its shortest distance', () => {
    store.add('(is/P a/C b/C)');
    store.add('(r1/P b/C c/C)');
    store.add('(r2/P c/C a/C)');

    const results = reason(store, '(is/P a/C b/C)', { hops: 3 });
    expect(summary(results)).toEqual([
      ['(r1/P b/C c/C)', 1, ['(is/P a/C b/C)']],
      ['(r2/P c/C a/C)', 1, ['(is/P a/C b/C)']],
    ]);
  });

  it('halts at the result limit, even mid-layer', () => {
    store.add('(hub/P x/C)');
    store.add('(p1/P x/C)');
    store.add('(p2/P x/C)');
    store.add('(p3/P x/C)');

    const results = reason(store, '(hub/P x/C)', { hops: 2, limit: 2 });
    expect(results.map((r) => r.edgeStr)).toEqual(['(p1/P x/C)', '(p2/P x/C)']);
  });

  it('gives every result its own path', () => {
    store.add('(hub/P x/C)');
    store.add('(p1/P x/C)');
    store.add('(p2/P x/C)');

    const [first, second] = reason(store, '(hub/P x/C)', { hops: 1 });
    first.path.push('(other/P y/C)');
    expect(second.path).toEqual(['(hub/P x/C)']);
  });

  it('returns nothing for an isolated edge', () => {
    store.add('(is/P a/C b/C)');
    expect(reason(store, '(is/P a/C b/C)')).toEqual([]);
  });

  it('builds paths out of edges that share an atom', () => {
    store.add('(is/P a/C b/C)');
    store.add('(r1/P b/C c/C)');
    store.add('(r2/P c/C d/C)');

    for (const r of reason(store, '(is/P a/C b/C)', { hops: 2 })) {
      const chain = [...r.path, r.edgeStr].map((s) => parseEdge(s));
      for (let i = 1; i < chain.length; i++) {
        const prev = new Set(chain[i - 1].atoms().map((a) => a.toString()));
        expect(chain[i].atoms().some((a) => prev.has(a.toString()))).toBe(true);
      }
    }
  });
});

describe('reason from a pattern', () => {
  beforeEach(() => {
    store.add('(likes/P ann/C bob/C)');
    store.add('(likes/P cat/C dog/C)');
    store.add('(knows/P bob/C eve/C)');
  });

  it('emits the matches at distance 0, then their neighbours', () => {
    const results = reason(store, '(likes/P * *)', { hops: 1 });
    expect(summary(results)).toEqual([
      ['(likes/P ann/C bob/C)', 0, []],
      ['(likes/P cat/C dog/C)', 0, []],
      ['(knows/P bob/C eve/C)', 1, ['(likes/P ann/C bob/C)']],
    ]);
  });

  it('returns nothing when the pattern matches nothing', () => {
    expect(reason(store, '(hates/P * *)')).toEqual([]);
  });

  it('counts pattern matches against the limit', () => {
    expect(reason(store, '(likes/P * *)', { limit: 1 }).map((r) => r.edgeStr)).toEqual([
      '(likes/P ann/C bob/C)',
    ]);
  });
});

describe('reason argument checks', () => {
  it('rejects non-positive or fractional hops and limits before touching the store', () => {
    expect(() => reason(untouchable, '(is/P a/C)', { hops: 0 })).toThrow(InvalidArgumentError);
    expect(() => reason(untouchable, '(is/P a/C)', { hops: 1.5 })).toThrow(InvalidArgumentError);
    expect(() => reason(untouchable, '(is/P a/C)', { limit: 0 })).toThrow(InvalidArgumentError);
    expect(() => reason(untouchable, '(is/P a/C)', { limit: -3 })).toThrow(InvalidArgumentError);
  });

  it('rejects a malformed start', () => {
    expect(() => reason(untouchable, '(is/P a/C')).toThrow(ParseError);
  });

  it('propagates store failures', () => {
    expect(() => reason(untouchable, '(is/P a/C)')).toThrow('store accessed');
  });
});
