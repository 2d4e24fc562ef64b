import { describe, it, expect } from 'vitest';

import { Atom, atom, ellipsis, wildcard } from '../atom.js';
import { Hyperedge, edge } from '../hyperedge.js';
import { parseAtom, parseEdge, toEdge } from '../parser.js';
import { typedConcept, typedPredicate } from '../typing.js';
import { HyperlayerError, InvalidArgumentError, ParseError } from '../../shared/errors.js';

function parseErrorOf(text: string): ParseError {
  try {
    parseEdge(text);
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error(`expected '${text}' to fail`);
}

// =============================================================================
// Atoms
// =============================================================================

describe('Atom', () => {
  it('renders label/type and exposes the main type', () => {
    const a = atom('paris', 'Cp.s');
    expect(a.toString()).toBe('paris/Cp.s');
    expect(a.mainType).toBe('C');
    expect(a.isConcept).toBe(true);
    expect(a.isPredicate).toBe(false);
  });

  it('compares label and full type code', () => {
    expect(atom('a', 'C').equals(atom('a', 'C'))).toBe(true);
    expect(atom('a', 'C').equals(atom('a', 'Cp'))).toBe(false);
    expect(atom('a', 'C').equals(atom('b', 'C'))).toBe(false);
  });

  it('allows untyped wildcards and ellipses only', () => {
    expect(wildcard().toString()).toBe('*');
    expect(wildcard('P').toString()).toBe('*/P');
    expect(ellipsis().toString()).toBe('...');
    expect(() => new Atom('sky', null)).toThrow(InvalidArgumentError);
    expect(() => new Atom('...', 'C')).toThrow(InvalidArgumentError);
  });

  it('rejects labels with whitespace or parentheses', () => {
    expect(() => atom('blue sky', 'C')).toThrow(InvalidArgumentError);
    expect(() => atom('a(b', 'C')).toThrow(InvalidArgumentError);
  });

  it('does not treat a concept-typed wildcard as a concept', () => {
    expect(wildcard('C').isConcept).toBe(false);
  });
});

// =============================================================================
// Parsing and rendering
// =============================================================================

describe('parseEdge', () => {
  it('round-trips canonical text', () => {
    const text = '(is/P (of/B capital/C france/C) paris/C)';
    expect(parseEdge(text).toString()).toBe(text);
  });

  it('normalizes whitespace', () => {
    expect(parseEdge('  ( is/P   sky/C\n\tblue/C )  ').toString()).toBe('(is/P sky/C blue/C)');
  });

  it('parses patterns', () => {
    const p = parseEdge('(*/P * ...)');
    expect(p.isPattern()).toBe(true);
    expect(p.toString()).toBe('(*/P * ...)');
  });

  it('reports the offset of an untyped atom', () => {
    const err = parseErrorOf('(is/P sky blue/C)');
    expect(err.offset).toBe(6);
    expect(err.input).toBe('(is/P sky blue/C)');
    expect(err.message).toBe("Atom 'sky' has no type at offset 6 in '(is/P sky blue/C)'");
    expect(err).toBeInstanceOf(HyperlayerError);
  });

  it('rejects a missing closing parenthesis', () => {
    expect(parseErrorOf('(is/P a/C').offset).toBe(9);
  });

  it('rejects text after the edge', () => {
    expect(parseErrorOf('(is/P a/C))').offset).toBe(10);
    expect(parseErrorOf('(is/P a/C) (b/P c/C)').offset).toBe(11);
  });

  it('rejects an empty edge, empty input and bare atoms', () => {
    expect(parseErrorOf('()').message).toContain('Empty edge');
    expect(parseErrorOf('   ').message).toContain('Empty input');
    expect(parseErrorOf('is/P').message).toContain("Expected '('");
  });

  it('rejects an ellipsis that is not last', () => {
    expect(parseErrorOf('(is/P ... a/C)').offset).toBe(10);
    expect(parseErrorOf('(is/P ... (a/P b/C))').offset).toBe(10);
  });

  it('rejects malformed atoms', () => {
    expect(parseErrorOf('(is/P a/C/D)').message).toContain('more than one type separator');
    expect(parseErrorOf('(is/P a/1)').message).toContain("malformed type '1'");
    expect(parseErrorOf('(is/P .../C)').message).toContain('cannot carry a type');
    expect(parseErrorOf('(is/P /C)').message).toContain('empty or invalid label');
  });
});

describe('parseAtom', () => {
  it('parses typed and wildcard tokens', () => {
    expect(parseAtom('aspirin/C').equals(atom('aspirin', 'C'))).toBe(true);
    expect(parseAtom('*/C').isWildcard).toBe(true);
    expect(parseAtom('...').isEllipsis).toBe(true);
  });
});

describe('toEdge', () => {
  it('passes edges through and parses strings', () => {
    const e = edge(atom('is', 'P'), atom('a', 'C'));
    expect(toEdge(e)).toBe(e);
    expect(toEdge('(is/P a/C)').equals(e)).toBe(true);
  });
});

// =============================================================================
// Structure
// =============================================================================

describe('Hyperedge structure', () => {
  const e = parseEdge('(is/P (of/B capital/C france/C) paris/C france/C)');

  it('exposes connector, args and arity', () => {
    expect(e.connector.toString()).toBe('is/P');
    expect(e.args.map((a) => a.toString())).toEqual([
      '(of/B capital/C france/C)',
      'paris/C',
      'france/C',
    ]);
    expect(e.arity).toBe(4);
  });

  it('collects atoms at every depth, de-duplicated in first-appearance order', () => {
    expect(e.atoms().map((a) => a.toString())).toEqual([
      'is/P',
      'of/B',
      'capital/C',
      'france/C',
      'paris/C',
    ]);
    expect(e.concepts().map((a) => a.toString())).toEqual(['capital/C', 'france/C', 'paris/C']);
  });

  it('finds the head atom through nested connectors', () => {
    expect(parseEdge('((not/M is/P) sky/C green/C)').headAtom().toString()).toBe('not/M');
  });

  it('is immutable', () => {
    expect(Object.isFrozen(e.elements)).toBe(true);
  });

  it('rejects empty edges and misplaced ellipses on construction', () => {
    expect(() => new Hyperedge([])).toThrow(InvalidArgumentError);
    expect(() => edge(atom('is', 'P'), ellipsis(), atom('a', 'C'))).toThrow(InvalidArgumentError);
  });
});

// =============================================================================
// Matching
// =============================================================================

describe('Hyperedge.matches', () => {
  const fact = parseEdge('(capital_of/P paris/C france/C)');

  it('matches wildcards and exact atoms', () => {
    expect(fact.matches(parseEdge('(capital_of/P * *)'))).toBe(true);
    expect(fact.matches(parseEdge('(capital_of/P paris/C france/C)'))).toBe(true);
    expect(fact.matches(parseEdge('(capital_of/P * berlin/C)'))).toBe(false);
  });

  it('requires identical types on exact atoms', () => {
    expect(fact.matches(parseEdge('(capital_of/C * *)'))).toBe(false);
  });

  it('is asymmetric', () => {
    const pattern = parseEdge('(*/P paris/C france/C)');
    expect(fact.matches(pattern)).toBe(true);
    expect(pattern.matches(fact)).toBe(false);
  });

  it('matches typed wildcards by type prefix', () => {
    expect(parseEdge('(is/P paris/Cp)').matches(parseEdge('(is/P */C)'))).toBe(true);
    expect(parseEdge('(is/P paris/Mp)').matches(parseEdge('(is/P */C)'))).toBe(false);
    expect(parseEdge('((not/M is/P) a/C)').matches(parseEdge('(*/P ...)'))).toBe(false);
  });

  it('checks arity unless the pattern ends in an ellipsis', () => {
    expect(fact.matches(parseEdge('(capital_of/P *)'))).toBe(false);
    expect(fact.matches(parseEdge('(*/P ...)'))).toBe(true);
    expect(fact.matches(parseEdge('(capital_of/P paris/C france/C ...)'))).toBe(true);
    expect(parseEdge('(is/P a/C)').matches(parseEdge('(is/P a/C b/C ...)'))).toBe(false);
  });

  it('lets a bare wildcard match a nested edge', () => {
    const says = parseEdge('(says/P (is/P a/C b/C) c/C)');
    expect(says.matches(parseEdge('(says/P * c/C)'))).toBe(true);
    expect(says.matches(parseEdge('(says/P (is/P * b/C) ...)'))).toBe(true);
    expect(says.matches(parseEdge('(says/P */C c/C)'))).toBe(false);
  });
});

// =============================================================================
// Auto-typing
// =============================================================================

describe('typing helpers', () => {
  it('types bare words and keeps typed text', () => {
    expect(typedConcept('blood pressure')).toBe('blood_pressure/C');
    expect(typedConcept(' aspirin/Cp ')).toBe('aspirin/Cp');
    expect(typedPredicate('is')).toBe('is/P');
    expect(typedPredicate('treats/Pd')).toBe('treats/Pd');
  });
});
