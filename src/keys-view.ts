/**
 * @module persistent-hash-trie/keys-view
 */

import { FastContainment } from './containment';
import { hashValue, Value } from './hash';
import { HashPath } from './hash-path';
import { TrieNode } from './node';

/**
 * The keys of a PersistentMap, seen as a set.
 * Exposes the map's root so that set algebra can run node against node,
 * ignoring the map's values.
 */
export class KeysView<K extends Value, V> implements Iterable<K>, FastContainment<K> {
    readonly #root: TrieNode<K, V>;

    constructor(root: TrieNode<K, V>) {
        this.#root = root;
    }

    get root(): TrieNode<K, V> { return this.#root; }
    get size(): number { return this.#root.count; }
    isEmpty(): boolean { return this.#root.count === 0; }

    has(key: K): boolean {
        return this.#root.containsKey(HashPath.top, key, hashValue(key));
    }

    fastContains(key: K): boolean { return this.has(key); }

    *[Symbol.iterator](): Iterator<K> {
        for (const e of this.#root.entries()) yield e.key;
    }

    toString(): string { return `Keys{${this.size}}`; }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
