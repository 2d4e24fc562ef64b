/**
 * Rule selection over the hypergraph store.
 *
 * A rule is any stored edge carrying a `layer` attribute. It is active for a
 * call when its layer is enabled and its confidence reaches the threshold.
 * Edges in context layers are facts, not rules: they only supply concepts.
 *
 * Nothing is cached: each call re-queries the store and scans the matches
 * once. Rule sets are expected to be small next to fact stores; a store with
 * many thousands of layered edges will make every validation pay that scan.
 */

import type { Atom } from '../hyperedge/atom.js';
import type { Hyperedge } from '../hyperedge/hyperedge.js';
import { debug } from '../shared/debug.js';
import { readRuleAttributes } from '../shared/types.js';
import type { HypergraphStore } from '../storage/store.js';
import type { ActiveRule } from './types.js';

export interface RuleSelection {
  pattern: Hyperedge;
  layers: ReadonlySet<string>;
  confidenceMin: number;
}

/**
 * Queries the store with the selection pattern and keeps the active rules.
 */
export function collectActiveRules(store: HypergraphStore, selection: RuleSelection): ActiveRule[] {
  if (selection.layers.size === 0) {
    debug('rules', 'No active layers, no rules');
    return [];
  }

  const matched = store.query(selection.pattern);
  const rules: ActiveRule[] = [];

  for (const { edge, attrs } of matched) {
    const ruleAttrs = readRuleAttributes(attrs);
    if (!ruleAttrs) continue;
    if (!selection.layers.has(ruleAttrs.layer)) continue;
    if (ruleAttrs.confidence < selection.confidenceMin) continue;

    rules.push({
      rule: edge,
      connector: edge.headAtom(),
      concepts: edge.concepts(),
      layer: ruleAttrs.layer,
      mandatory: ruleAttrs.mandatory,
      confidence: ruleAttrs.confidence,
      source: ruleAttrs.source,
      extra: ruleAttrs.extra,
    });
  }

  debug('rules', 'Active rules collected', {
    pattern: selection.pattern.toString(),
    matched: matched.length,
    active: rules.length,
  });
  return rules;
}

/** Label of the subject atom user facts are stored under. */
export const CONTEXT_SUBJECT = 'user';

/**
 * Active layers minus the context layers, i.e. the layers rules come from.
 */
export function ruleLayers(
  layers: ReadonlySet<string>,
  contextLayers: readonly string[],
): Set<string> {
  return new Set([...layers].filter((l) => !contextLayers.includes(l)));
}

/**
 * Concept atoms of the facts held in context layers (e.g. what is known about
 * the user), keyed by canonical string. Only layers that are both active and
 * listed as context layers contribute. The `user` subject atom itself is
 * skipped.
 */
export function collectContextConcepts(
  store: HypergraphStore,
  pattern: Hyperedge,
  layers: ReadonlySet<string>,
  contextLayers: readonly string[],
): Map<string, Atom> {
  const concepts = new Map<string, Atom>();
  const wanted = contextLayers.filter((l) => layers.has(l));
  if (wanted.length === 0) {
    return concepts;
  }

  for (const { edge, attrs } of store.query(pattern)) {
    const ruleAttrs = readRuleAttributes(attrs);
    if (!ruleAttrs || !wanted.includes(ruleAttrs.layer)) continue;
    for (const c of edge.concepts()) {
      if (c.label === CONTEXT_SUBJECT) continue;
      concepts.set(c.toString(), c);
    }
  }

  debug('rules', 'Context concepts collected', {
    layers: wanted,
    concepts: concepts.size,
  });
  return concepts;
}
