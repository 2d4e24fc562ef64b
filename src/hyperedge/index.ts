export { Atom, atom, wildcard, ellipsis, WILDCARD, ELLIPSIS, ATOM_TYPES } from './atom.js';
export { Hyperedge, edge } from './hyperedge.js';
export type { Element } from './hyperedge.js';
export { parseEdge, parseAtom, toEdge } from './parser.js';
export { typedConcept, typedPredicate } from './typing.js';
