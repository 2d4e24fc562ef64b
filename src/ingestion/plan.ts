/**
 * Converts free-text plan steps into candidate hyperedges.
 *
 * Each step becomes `(verb/P user/C object/C)`: the first word is the verb,
 * the remaining words joined with underscores are the object. The result is
 * meant to be validated before it is stored.
 */

import { typedConcept, typedPredicate } from '../hyperedge/typing.js';
import type { BulkItem } from '../storage/hypergraph-store.js';

export const PLAN_LAYER = 'plan';

/**
 * Plan step text to bulk items in the `plan` layer. Words are lowercased and
 * stripped of parentheses and slashes. Blank steps are dropped; a one-word
 * step has no object and becomes `(verb/P user/C)`.
 */
export function planToEdges(steps: readonly string[], user = 'user'): BulkItem[] {
  const subject = typedConcept(user);
  const items: BulkItem[] = [];

  for (const step of steps) {
    const words = step
      .trim()
      .split(/\s+/)
      .map((w) => w.replace(/[()/]/g, '').toLowerCase())
      .filter((w) => w.length > 0);
    if (words.length === 0) continue;

    const [verb, ...rest] = words;
    const parts = [typedPredicate(verb), subject];
    if (rest.length > 0) {
      parts.push(typedConcept(rest.join('_')));
    }

    items.push({
      s: `(${parts.join(' ')})`,
      attrs: { layer: PLAN_LAYER, original_text: step.trim() },
    });
  }

  return items;
}
