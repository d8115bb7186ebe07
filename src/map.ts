/**
 * @module persistent-hash-trie/map
 * @description
 * Immutable hash map backed by the same trie nodes as PersistentSet.
 * Only keys take part in hashing and placement; values ride along in the entries.
 */

import { filterNode, subtract } from './algebra';
import { Builder } from './builder';
import { settings } from './config';
import { areEqual, hashValue, Structural, Value } from './hash';
import { HashPath } from './hash-path';
import { KeysView } from './keys-view';
import { Entry, TrieNode } from './node';
import { PersistentSet } from './set';

/**
 * @template K Key type (must be a Value).
 * @template V Value type (must be a Value, so that maps hash and compare by content).
 */
export class PersistentMap<K extends Value, V extends Value> implements Structural, Iterable<[K, V]> {
    #root: TrieNode<K, V>;
    #cachedHash: number | null = null;

    constructor(entries: Iterable<readonly [K, V]> = []) {
        let root = TrieNode.empty<K, V>();
        for (const [key, value] of entries) {
            root = root.inserting(HashPath.top, { key, value, hash: hashValue(key) }, true);
        }
        this.#root = root;
    }

    static from<K extends Value, V extends Value>(entries: Iterable<readonly [K, V]>): PersistentMap<K, V> {
        return new PersistentMap(entries);
    }

    /** Wraps an already validated root without re-checking it. */
    static fromNewRoot<K extends Value, V extends Value>(root: TrieNode<K, V>): PersistentMap<K, V> {
        const m = new PersistentMap<K, V>();
        m.#root = root;
        return m;
    }

    #wrap(root: TrieNode<K, V>): PersistentMap<K, V> {
        if (root === this.#root) return this;
        if (settings.checkInvariants) root.fullInvariantCheck();
        return PersistentMap.fromNewRoot(root);
    }

    #finish(builder: Builder<K, V> | undefined): PersistentMap<K, V> {
        if (!builder) return this;
        return this.#wrap(builder.finalize(HashPath.top));
    }

    get root(): TrieNode<K, V> { return this.#root; }
    get size(): number { return this.#root.count; }
    isEmpty(): boolean { return this.#root.count === 0; }

    get(key: K): V | undefined {
        return this.#root.find(HashPath.top, key, hashValue(key))?.value;
    }

    has(key: K): boolean {
        return this.#root.containsKey(HashPath.top, key, hashValue(key));
    }

    /**
     * Associates `value` with `key`.
     * Returns this map when the key already holds the identical value.
     * @complexity O(depth)
     */
    set(key: K, value: V): PersistentMap<K, V> {
        const entry: Entry<K, V> = { key, value, hash: hashValue(key) };
        return this.#wrap(this.#root.inserting(HashPath.top, entry, true));
    }

    delete(key: K): PersistentMap<K, V> {
        return this.#wrap(this.#root.removing(HashPath.top, key, hashValue(key)));
    }

    /**
     * Drops every key yielded by `keys`.
     * A PersistentSet or another map's keys are subtracted node against node.
     */
    removingKeys(keys: Iterable<K>): PersistentMap<K, V> {
        if (keys instanceof PersistentSet || keys instanceof KeysView) {
            const trie: TrieNode<K, unknown> = keys.root;
            return this.#finish(subtract(HashPath.top, this.#root, trie));
        }
        let root = this.#root;
        for (const key of keys) root = root.removing(HashPath.top, key, hashValue(key));
        return this.#wrap(root);
    }

    filter(predicate: (value: V, key: K) => boolean): PersistentMap<K, V> {
        return this.#finish(filterNode(HashPath.top, this.#root, e => predicate(e.value, e.key)));
    }

    get keys(): KeysView<K, V> { return new KeysView(this.#root); }

    *values(): IterableIterator<V> {
        for (const e of this.#root.entries()) yield e.value;
    }

    *entries(): IterableIterator<[K, V]> {
        for (const e of this.#root.entries()) yield [e.key, e.value];
    }

    [Symbol.iterator](): Iterator<[K, V]> { return this.entries(); }

    /** Order-independent hash code (XOR of mixed key and value hashes). */
    get hashCode(): number {
        if (this.#cachedHash !== null) return this.#cachedHash;
        let h = 0;
        for (const e of this.#root.entries()) {
            h ^= Math.imul(e.hash, 31) ^ hashValue(e.value);
        }
        this.#cachedHash = h >>> 0;
        return this.#cachedHash;
    }

    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof PersistentMap)) return false;
        if (this.size !== other.size) return false;
        if (this.hashCode !== other.hashCode) return false;
        const theirs: TrieNode<Value, Value> = other.root;
        for (const e of this.#root.entries()) {
            const match = theirs.find(HashPath.top, e.key, e.hash);
            if (match === undefined || !areEqual(e.value, match.value)) return false;
        }
        return true;
    }

    toString(): string { return `Map{${this.size}}`; }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

/** Creates an empty PersistentMap. */
export function emptyMap<K extends Value, V extends Value>(): PersistentMap<K, V> {
    return new PersistentMap<K, V>();
}
