import { InvalidArgumentError } from '../shared/errors.js';

// =============================================================================
// Atom Grammar
// =============================================================================

/** Matches any element (atom or nested edge). Pattern-only. */
export const WILDCARD = '*';

/** As the last element of a pattern, matches any number of trailing elements. */
export const ELLIPSIS = '...';

/** Labels: anything except whitespace, parentheses and the type separator. */
export const LABEL_RE = /^[^\s()/]+$/;

/** Type codes: a main-type letter, then an optional subtype tail (e.g. `Pd.so`). */
export const TYPE_RE = /^[A-Za-z][A-Za-z0-9.|-]*$/;

/**
 * Main atom types. Only `P` and `C` carry meaning for validation; the others
 * are listed so callers can type atoms consistently.
 */
export const ATOM_TYPES = {
  P: 'predicate',
  C: 'concept',
  M: 'modifier',
  B: 'builder',
  T: 'trigger',
  J: 'conjunction',
  R: 'relation',
  S: 'specifier',
  X: 'excluded',
} as const;

// =============================================================================
// Atom
// =============================================================================

/**
 * A typed token: `label/type`.
 *
 * Concrete atoms always carry a type. The wildcard `*` may be untyped (any
 * element) or typed (the wildcard followed by `/P` matches any atom whose type
 * code starts with `P`). The ellipsis is always untyped.
 */
export class Atom {
  readonly label: string;
  readonly type: string | null;

  constructor(label: string, type: string | null) {
    if (label === ELLIPSIS) {
      if (type !== null) {
        throw new InvalidArgumentError('atom', `'${ELLIPSIS}' cannot carry a type`);
      }
    } else if (label !== WILDCARD) {
      if (!LABEL_RE.test(label)) {
        throw new InvalidArgumentError('atom', `bad label '${label}'`);
      }
      if (type === null) {
        throw new InvalidArgumentError('atom', `'${label}' has no type`);
      }
    }
    if (type !== null && !TYPE_RE.test(type)) {
      throw new InvalidArgumentError('atom', `bad type '${type}' on '${label}'`);
    }
    this.label = label;
    this.type = type;
  }

  /** First character of the type code, or null for an untyped wildcard. */
  get mainType(): string | null {
    return this.type === null ? null : this.type.charAt(0);
  }

  get isWildcard(): boolean {
    return this.label === WILDCARD;
  }

  get isEllipsis(): boolean {
    return this.label === ELLIPSIS;
  }

  get isConcept(): boolean {
    return !this.isWildcard && this.mainType === 'C';
  }

  get isPredicate(): boolean {
    return !this.isWildcard && this.mainType === 'P';
  }

  equals(other: Atom): boolean {
    return this.label === other.label && this.type === other.type;
  }

  toString(): string {
    return this.type === null ? this.label : `${this.label}/${this.type}`;
  }
}

export function atom(label: string, type: string): Atom {
  return new Atom(label, type);
}

export function wildcard(type: string | null = null): Atom {
  return new Atom(WILDCARD, type);
}

export function ellipsis(): Atom {
  return new Atom(ELLIPSIS, null);
}
