import { describe, it, expect } from 'vitest';

import { parseEdge } from '../../hyperedge/parser.js';
import { PLAN_LAYER, planToEdges } from '../plan.js';

describe('planToEdges', () => {
  it('turns each step into a plan-layer edge', () => {
    expect(planToEdges(['Take aspirin', 'walk'])).toEqual([
      { s: '(take/P user/C aspirin/C)', attrs: { layer: PLAN_LAYER, original_text: 'Take aspirin' } },
      { s: '(walk/P user/C)', attrs: { layer: PLAN_LAYER, original_text: 'walk' } },
    ]);
  });

  it('joins multi-word objects and drops blank steps', () => {
    const items = planToEdges(['  eat   whole grain bread ', '   ', '']);
    expect(items.map((i) => i.s)).toEqual(['(eat/P user/C whole_grain_bread/C)']);
    expect(items[0].attrs?.original_text).toBe('eat   whole grain bread');
  });

  it('strips characters atoms cannot hold', () => {
    const [item] = planToEdges(['Eat (sugary) food/snacks']);
    expect(item.s).toBe('(eat/P user/C sugary_foodsnacks/C)');
    expect(parseEdge(item.s).arity).toBe(3);
  });

  it('uses the given subject', () => {
    expect(planToEdges(['rest'], 'patient')[0].s).toBe('(rest/P patient/C)');
  });
});
