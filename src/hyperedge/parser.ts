/**
 * Canonical string form of hyperedges.
 *
 *   (connector/P arg1/C (nested/P x/C y/C))
 *
 * Tokens are separated by any run of whitespace; rendering always uses a
 * single space, so `parseEdge(e.toString())` reproduces `e` exactly.
 */

import { ParseError } from '../shared/errors.js';
import { Atom, ELLIPSIS, LABEL_RE, TYPE_RE, WILDCARD } from './atom.js';
import { Hyperedge, type Element } from './hyperedge.js';

const WHITESPACE_RE = /\s/;
const DELIMITER_RE = /[\s()]/;

/**
 * Parses a single atom token: `label/type`, a bare or typed wildcard, or `...`.
 * `offset` is only used to position error messages inside a larger input.
 */
export function parseAtom(token: string, input: string = token, offset = 0): Atom {
  if (token === WILDCARD || token === ELLIPSIS) {
    return new Atom(token, null);
  }

  const slash = token.indexOf('/');
  if (slash === -1) {
    throw new ParseError(`Atom '${token}' has no type`, input, offset);
  }
  if (token.indexOf('/', slash + 1) !== -1) {
    throw new ParseError(`Atom '${token}' has more than one type separator`, input, offset);
  }

  const label = token.slice(0, slash);
  const type = token.slice(slash + 1);

  if (label === ELLIPSIS) {
    throw new ParseError(`'${ELLIPSIS}' cannot carry a type`, input, offset);
  }
  if (label !== WILDCARD && !LABEL_RE.test(label)) {
    throw new ParseError(`Atom '${token}' has an empty or invalid label`, input, offset);
  }
  if (!TYPE_RE.test(type)) {
    throw new ParseError(`Atom '${token}' has a malformed type '${type}'`, input, offset + slash + 1);
  }
  return new Atom(label, type);
}

/**
 * Parses the canonical string form of a hyperedge or pattern.
 *
 * Fails with ParseError on unbalanced parentheses, empty edges, a bare atom
 * outside any edge, text after the closing parenthesis, malformed atoms, or
 * an ellipsis that is not the last element.
 */
export function parseEdge(text: string): Hyperedge {
  const stack: Array<{ elements: Element[]; open: number }> = [];
  let result: Hyperedge | null = null;
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);

    if (WHITESPACE_RE.test(ch)) {
      i++;
      continue;
    }

    if (result !== null) {
      throw new ParseError('Unexpected text after edge', text, i);
    }

    if (ch === '(') {
      stack.push({ elements: [], open: i });
      i++;
      continue;
    }

    if (ch === ')') {
      const frame = stack.pop();
      if (!frame) {
        throw new ParseError("Unbalanced ')'", text, i);
      }
      if (frame.elements.length === 0) {
        throw new ParseError('Empty edge', text, frame.open);
      }
      const closed = new Hyperedge(frame.elements);
      const parent = stack[stack.length - 1];
      if (parent) {
        const last = parent.elements[parent.elements.length - 1];
        if (last instanceof Atom && last.isEllipsis) {
          throw new ParseError(`'${ELLIPSIS}' must be the last element`, text, frame.open);
        }
        parent.elements.push(closed);
      } else {
        result = closed;
      }
      i++;
      continue;
    }

    const start = i;
    while (i < text.length && !DELIMITER_RE.test(text.charAt(i))) {
      i++;
    }
    const token = text.slice(start, i);
    const frame = stack[stack.length - 1];
    if (!frame) {
      throw new ParseError(`Expected '(' before '${token}'`, text, start);
    }
    const last = frame.elements[frame.elements.length - 1];
    if (last instanceof Atom && last.isEllipsis) {
      throw new ParseError(`'${ELLIPSIS}' must be the last element`, text, start);
    }
    frame.elements.push(parseAtom(token, text, start));
  }

  if (stack.length > 0) {
    throw new ParseError("Unbalanced '(': missing ')'", text, text.length);
  }
  if (result === null) {
    throw new ParseError('Empty input', text, 0);
  }
  return result;
}

/**
 * Accepts either form, parsing strings. Keeps call sites that take
 * `string | Hyperedge` to one line.
 */
export function toEdge(value: string | Hyperedge): Hyperedge {
  return typeof value === 'string' ? parseEdge(value) : value;
}
