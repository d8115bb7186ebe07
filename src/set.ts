/**
 * @module persistent-hash-trie/set
 * @description
 * Immutable hash set backed by a hash-array-mapped trie.
 *
 * * Features:
 * - Every update returns a new set; unchanged sub-trees are shared with the old one.
 * - Updates that change nothing return the very same set.
 * - Value Semantics: sets are Structural, so sets of sets work.
 */

import { filterNode, intersect, subtract, union } from './algebra';
import { Builder } from './builder';
import { settings } from './config';
import { contains, FastContainment, hasFastContainment } from './containment';
import { compare, hashValue, Structural, Value } from './hash';
import { HashPath } from './hash-path';
import { KeysView } from './keys-view';
import { Entry, TrieNode, Unit } from './node';

function entryOf<T extends Value>(element: T): Entry<T, Unit> {
    return { key: element, value: undefined, hash: hashValue(element) };
}

function rootOf<T extends Value>(elements: Iterable<T>): TrieNode<T, Unit> {
    let root = TrieNode.empty<T, Unit>();
    for (const e of elements) root = root.inserting(HashPath.top, entryOf(e), false);
    return root;
}

export class PersistentSet<T extends Value> implements Structural, Iterable<T>, FastContainment<T> {
    #root: TrieNode<T, Unit>;
    #hashCode: number | null = null;

    constructor(...elements: T[]) {
        this.#root = rootOf(elements);
    }

    static from<U extends Value>(elements: Iterable<U>): PersistentSet<U> {
        return PersistentSet.fromNewRoot(rootOf(elements));
    }

    static of<U extends Value>(...elements: U[]): PersistentSet<U> {
        return new PersistentSet<U>(...elements);
    }

    /**
     * Wraps a root that is already known to satisfy the trie invariants.
     * No re-validation happens here.
     */
    static fromNewRoot<U extends Value>(root: TrieNode<U, Unit>): PersistentSet<U> {
        const s = new PersistentSet<U>();
        s.#root = root;
        return s;
    }

    #finish(builder: Builder<T, Unit> | undefined): PersistentSet<T> {
        if (!builder) return this;
        const root = builder.finalize(HashPath.top);
        if (settings.checkInvariants) root.fullInvariantCheck();
        return PersistentSet.fromNewRoot(root);
    }

    #wrap(root: TrieNode<T, Unit>): PersistentSet<T> {
        if (root === this.#root) return this;
        if (settings.checkInvariants) root.fullInvariantCheck();
        return PersistentSet.fromNewRoot(root);
    }

    // ========================================================================
    // QUERIES
    // ========================================================================

    get root(): TrieNode<T, Unit> { return this.#root; }
    get size(): number { return this.#root.count; }
    isEmpty(): boolean { return this.#root.count === 0; }

    has(element: T): boolean {
        return this.#root.containsKey(HashPath.top, element, hashValue(element));
    }

    fastContains(element: T): boolean { return this.has(element); }

    /** Some element of the set, or undefined when empty. */
    first(): T | undefined {
        for (const e of this.#root.entries()) return e.key;
        return undefined;
    }

    /** Order-independent hash code (XOR of the element hashes). */
    get hashCode(): number {
        if (this.#hashCode === null) {
            let h = 0;
            for (const e of this.#root.entries()) h ^= e.hash;
            this.#hashCode = h >>> 0;
        }
        return this.#hashCode;
    }

    // ========================================================================
    // POINT UPDATES
    // ========================================================================

    inserting(element: T): PersistentSet<T> {
        return this.#wrap(this.#root.inserting(HashPath.top, entryOf(element), false));
    }

    removing(element: T): PersistentSet<T> {
        return this.#wrap(this.#root.removing(HashPath.top, element, hashValue(element)));
    }

    // ========================================================================
    // SET ALGEBRA
    // ========================================================================

    union(other: PersistentSet<T>): PersistentSet<T> {
        return this.#finish(union(HashPath.top, this.#root, other.#root));
    }

    intersection(other: PersistentSet<T>): PersistentSet<T> {
        return this.#finish(intersect(HashPath.top, this.#root, other.#root));
    }

    symmetricDifference(other: PersistentSet<T>): PersistentSet<T> {
        return this.subtracting(other).union(other.subtracting(this));
    }

    /**
     * Returns the elements of this set that do not occur in `other`.
     *
     *     new PersistentSet(1, 2, 3, 4).subtracting(new PersistentSet(0, 2, 4, 6)) // {1, 3}
     *     new PersistentSet(1, 2, 3, 4).subtracting([0, 2, 4, 6])                 // {1, 3}
     *
     * - A PersistentSet or the keys of a PersistentMap are subtracted node against node,
     *   linking untouched sub-trees of this set directly into the result.
     * - An iterable with a fast membership hook filters this set through it.
     * - Any other iterable is consumed once, removing its items one by one.
     *
     * @complexity O(this.size + other.size) worst case for tries; O(n) in the items of a plain iterable.
     */
    subtracting(other: Iterable<T>): PersistentSet<T> {
        if (other instanceof PersistentSet || other instanceof KeysView) {
            const trie: TrieNode<T, unknown> = other.root;
            return this.#finish(subtract(HashPath.top, this.#root, trie));
        }

        const probe = this.first();
        if (probe === undefined) return this;

        if (hasFastContainment(other) && other.fastContains(probe) !== undefined) {
            return this.filter(e => !contains(other, e));
        }

        let root = this.#root;
        for (const item of other) {
            root = root.removing(HashPath.top, item, hashValue(item));
        }
        return this.#wrap(root);
    }

    filter(predicate: (element: T) => boolean): PersistentSet<T> {
        return this.#finish(filterNode(HashPath.top, this.#root, e => predicate(e.key)));
    }

    isSubsetOf(other: PersistentSet<T>): boolean {
        if (this.size > other.size) return false;
        return this.subtracting(other).isEmpty();
    }

    isSupersetOf(other: PersistentSet<T>): boolean {
        return other.isSubsetOf(this);
    }

    /** True when nothing of this set occurs in `other`. */
    isDisjointFrom(other: PersistentSet<T>): boolean {
        if (this.isEmpty() || other.isEmpty()) return true;
        return subtract(HashPath.top, this.#root, other.#root) === undefined;
    }

    // ========================================================================
    // VALUE SEMANTICS
    // ========================================================================

    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof PersistentSet)) return false;
        if (this.size !== other.size) return false;
        if (this.hashCode !== other.hashCode) return false;
        if (this.isEmpty()) return true;
        const rest = subtract(HashPath.top, this.#root, other.#root);
        return rest !== undefined && rest.finalize(HashPath.top).count === 0;
    }

    *[Symbol.iterator](): Iterator<T> {
        for (const e of this.#root.entries()) yield e.key;
    }

    toString(): string {
        const sorted = [...this].sort(compare);
        return `{${sorted.map(String).join(', ')}}`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

/** Creates an empty PersistentSet. */
export function emptySet<T extends Value>(): PersistentSet<T> { return new PersistentSet<T>(); }

/** Creates a PersistentSet containing a single element. */
export function singleton<T extends Value>(element: T): PersistentSet<T> { return new PersistentSet<T>(element); }
