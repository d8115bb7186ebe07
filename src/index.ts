/**
 * @module persistent-hash-trie
 * Immutable, structurally shared Set and Map built on a hash-array-mapped trie.
 */

export { PersistentSet, emptySet, singleton } from './set';
export { PersistentMap, emptyMap } from './map';
export { KeysView } from './keys-view';
export { Tuple, hashValue, areEqual, compare } from './hash';
export type { Primitive, Structural, Value } from './hash';
export { contains, hasFastContainment } from './containment';
export type { FastContainment } from './containment';
export { HashPath, BITS, WIDTH, MAX_DEPTH } from './hash-path';
export { TrieNode, NodeKind } from './node';
export type { Entry, Unit } from './node';
export { Builder } from './builder';
export { subtract, union, intersect, filterNode } from './algebra';
export { InvariantViolation } from './errors';
export { settings, configure, resetSettings } from './config';
export type { TrieSettings } from './config';
