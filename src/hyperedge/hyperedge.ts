import { InvalidArgumentError } from '../shared/errors.js';
import { Atom } from './atom.js';

export type Element = Atom | Hyperedge;

/**
 * An ordered, non-empty, immutable sequence of atoms and nested hyperedges.
 * Position 0 is the connector.
 *
 * Nested edges are owned by exactly one parent, so the structure is a tree.
 * The canonical string is computed once at construction and doubles as the
 * identity key (visited sets, store rows).
 */
export class Hyperedge {
  readonly elements: readonly Element[];
  private readonly text: string;

  constructor(elements: readonly Element[]) {
    if (elements.length === 0) {
      throw new InvalidArgumentError('hyperedge', 'must have at least one element');
    }
    elements.forEach((el, i) => {
      if (el instanceof Atom && el.isEllipsis && i !== elements.length - 1) {
        throw new InvalidArgumentError('hyperedge', "'...' is only allowed as the last element");
      }
    });
    this.elements = Object.freeze([...elements]);
    this.text = `(${this.elements.map((el) => el.toString()).join(' ')})`;
  }

  get connector(): Element {
    return this.elements[0];
  }

  get args(): readonly Element[] {
    return this.elements.slice(1);
  }

  get arity(): number {
    return this.elements.length;
  }

  /**
   * The connector atom, descending through nested connectors:
   * for `((not/M is/P) sky/C green/C)` this is `not/M`.
   */
  headAtom(): Atom {
    const first = this.connector;
    return first instanceof Atom ? first : first.headAtom();
  }

  /**
   * Every atom at every depth, de-duplicated, in order of first appearance.
   */
  atoms(): Atom[] {
    const seen = new Map<string, Atom>();
    const walk = (edge: Hyperedge): void => {
      for (const el of edge.elements) {
        if (el instanceof Atom) {
          const key = el.toString();
          if (!seen.has(key)) seen.set(key, el);
        } else {
          walk(el);
        }
      }
    };
    walk(this);
    return [...seen.values()];
  }

  /** Concept atoms (main type `C`), de-duplicated. */
  concepts(): Atom[] {
    return this.atoms().filter((a) => a.isConcept);
  }

  /** True when any element, at any depth, is a wildcard or ellipsis. */
  isPattern(): boolean {
    return this.elements.some((el) =>
      el instanceof Atom ? el.isWildcard || el.isEllipsis : el.isPattern(),
    );
  }

  /**
   * Pattern match. `pattern` may contain wildcards anywhere.
   *
   * An exact pattern atom must be identical including its type:
   * `capital_of/P` never matches `capital_of/C`. The bare wildcard matches
   * anything; a typed wildcard matches atoms whose type code starts with its
   * type.
   */
  matches(pattern: Hyperedge): boolean {
    return matchSequence(this.elements, pattern.elements);
  }

  equals(other: Hyperedge): boolean {
    return this.text === other.text;
  }

  toString(): string {
    return this.text;
  }
}

function matchSequence(items: readonly Element[], patterns: readonly Element[]): boolean {
  const last = patterns[patterns.length - 1];
  const open = last instanceof Atom && last.isEllipsis;
  const fixed = open ? patterns.slice(0, -1) : patterns;

  if (open ? items.length < fixed.length : items.length !== fixed.length) {
    return false;
  }
  return fixed.every((p, i) => matchElement(items[i], p));
}

function matchElement(item: Element, pattern: Element): boolean {
  if (pattern instanceof Atom) {
    if (pattern.isWildcard) {
      if (pattern.type === null) return true;
      return item instanceof Atom && item.type !== null && item.type.startsWith(pattern.type);
    }
    return item instanceof Atom && item.equals(pattern);
  }
  return item instanceof Hyperedge && matchSequence(item.elements, pattern.elements);
}

export function edge(...elements: Element[]): Hyperedge {
  return new Hyperedge(elements);
}
