/**
 * @module persistent-hash-trie/node
 * @description
 * The trie node shared by PersistentSet and PersistentMap.
 *
 * * Layout (per level):
 * - `dataMap`: bitmap of the slots holding an inline entry.
 * - `nodeMap`: bitmap of the slots holding a child node.
 * - `items` / `children`: packed in ascending slot order.
 * - Collision buckets hold entries that share one full hash, unordered.
 *
 * * Invariants:
 * - Every non-root node holds at least two entries.
 * - Collision buckets are never the root and hold >= 2 pairwise unequal entries.
 * - An entry sits in the slot its hash selects at every level above it.
 */

import { Builder } from './builder';
import { InvariantViolation } from './errors';
import { areEqual, Value } from './hash';
import { bitIndex, HashPath, popcount, WIDTH } from './hash-path';

/** Payload of the set variant. */
export type Unit = undefined;

export interface Entry<K extends Value, V> {
    readonly key: K;
    readonly value: V;
    /** Full hash of `key`, computed once when the entry is created. */
    readonly hash: number;
}

export enum NodeKind {
    Branch = 0,
    Collision = 1,
}

// ============================================================================
// 1. NODE
// ============================================================================

export class TrieNode<K extends Value, V> {
    readonly kind: NodeKind;
    readonly dataMap: number;
    readonly nodeMap: number;
    readonly items: ReadonlyArray<Entry<K, V>>;
    readonly children: ReadonlyArray<TrieNode<K, V>>;
    /** Number of entries stored in this sub-tree. */
    readonly count: number;

    constructor(
        kind: NodeKind,
        dataMap: number,
        nodeMap: number,
        items: ReadonlyArray<Entry<K, V>>,
        children: ReadonlyArray<TrieNode<K, V>>,
        count: number
    ) {
        this.kind = kind;
        this.dataMap = dataMap;
        this.nodeMap = nodeMap;
        this.items = items;
        this.children = children;
        this.count = count;
    }

    static empty<K extends Value, V>(): TrieNode<K, V> {
        return new TrieNode<K, V>(NodeKind.Branch, 0, 0, [], [], 0);
    }

    static collision<K extends Value, V>(items: ReadonlyArray<Entry<K, V>>): TrieNode<K, V> {
        return new TrieNode<K, V>(NodeKind.Collision, 0, 0, items, [], items.length);
    }

    /**
     * Builds the node at `path` holding two entries with unequal keys.
     * Descends while their chunks agree; equal full hashes form a collision bucket.
     */
    static pair<K extends Value, V>(path: HashPath, a: Entry<K, V>, b: Entry<K, V>): TrieNode<K, V> {
        if (a.hash === b.hash) return TrieNode.collision([a, b]);
        const sa = path.slot(a.hash);
        const sb = path.slot(b.hash);
        if (sa === sb) {
            const child = TrieNode.pair(path.descend(), a, b);
            return new TrieNode<K, V>(NodeKind.Branch, 0, 1 << sa, [], [child], 2);
        }
        const items = sa < sb ? [a, b] : [b, a];
        return new TrieNode<K, V>(NodeKind.Branch, (1 << sa) | (1 << sb), 0, items, [], 2);
    }

    /**
     * Wraps a collision bucket and an entry with a different hash into a branch at `path`.
     */
    static around<K extends Value, V>(path: HashPath, bucket: TrieNode<K, V>, entry: Entry<K, V>): TrieNode<K, V> {
        const sb = path.slot(bucket.collisionHash);
        const se = path.slot(entry.hash);
        const count = bucket.count + 1;
        if (sb === se) {
            const child = TrieNode.around(path.descend(), bucket, entry);
            return new TrieNode<K, V>(NodeKind.Branch, 0, 1 << sb, [], [child], count);
        }
        return new TrieNode<K, V>(NodeKind.Branch, 1 << se, 1 << sb, [entry], [bucket], count);
    }

    get isCollision(): boolean { return this.kind === NodeKind.Collision; }

    /** Shared hash of a collision bucket. */
    get collisionHash(): number { return this.items[0].hash; }

    /** The single entry of a node holding exactly one; such nodes fold into their parent. */
    get soleEntry(): Entry<K, V> | undefined {
        return this.count === 1 ? this.items[0] : undefined;
    }

    // ========================================================================
    // 2. LOOKUP
    // ========================================================================

    find(path: HashPath, key: K, hash: number): Entry<K, V> | undefined {
        let node: TrieNode<K, V> = this;
        let level = path;
        while (true) {
            if (node.kind === NodeKind.Collision) {
                if (node.count === 0 || node.collisionHash !== hash) return undefined;
                for (const e of node.items) {
                    if (areEqual(e.key, key)) return e;
                }
                return undefined;
            }
            const bit = 1 << level.slot(hash);
            if ((node.dataMap & bit) !== 0) {
                const e = node.items[bitIndex(node.dataMap, bit)];
                return e.hash === hash && areEqual(e.key, key) ? e : undefined;
            }
            if ((node.nodeMap & bit) === 0) return undefined;
            node = node.children[bitIndex(node.nodeMap, bit)];
            level = level.descend();
        }
    }

    containsKey(path: HashPath, key: K, hash: number): boolean {
        return this.find(path, key, hash) !== undefined;
    }

    // ========================================================================
    // 3. POINT UPDATES
    // ========================================================================

    /**
     * Returns a node that also holds `entry`.
     * An existing key keeps its entry unless `replace` is set and the value differs;
     * in that case `this` comes back unchanged.
     * @complexity O(depth)
     */
    inserting(path: HashPath, entry: Entry<K, V>, replace: boolean): TrieNode<K, V> {
        if (this.kind === NodeKind.Collision) {
            if (entry.hash !== this.collisionHash) return TrieNode.around(path, this, entry);
            const builder = Builder.fromExisting(this);
            for (let i = 0; i < this.items.length; i++) {
                const current = this.items[i];
                if (!areEqual(current.key, entry.key)) continue;
                if (!replace || current.value === entry.value) return this;
                builder.removeSlot(i);
                builder.insert(i, entry);
                return builder.finalize(path);
            }
            builder.insert(this.items.length, entry);
            return builder.finalize(path);
        }

        const slot = path.slot(entry.hash);
        const bit = 1 << slot;

        if ((this.dataMap & bit) !== 0) {
            const current = this.items[bitIndex(this.dataMap, bit)];
            const builder = Builder.fromExisting(this);
            if (current.hash === entry.hash && areEqual(current.key, entry.key)) {
                if (!replace || current.value === entry.value) return this;
                builder.removeSlot(slot);
                builder.insert(slot, entry);
            } else {
                builder.replaceChild(slot, TrieNode.pair(path.descend(), current, entry));
            }
            return builder.finalize(path);
        }

        if ((this.nodeMap & bit) !== 0) {
            const child = this.children[bitIndex(this.nodeMap, bit)];
            const updated = child.inserting(path.descend(), entry, replace);
            if (updated === child) return this;
            const builder = Builder.fromExisting(this);
            builder.replaceChild(slot, updated);
            return builder.finalize(path);
        }

        const builder = Builder.fromExisting(this);
        builder.insert(slot, entry);
        return builder.finalize(path);
    }

    /**
     * Returns a node without `key`. An absent key returns `this` without allocating.
     * A child left with one entry folds back into this node as an inline entry.
     * @complexity O(depth)
     */
    removing(path: HashPath, key: K, hash: number): TrieNode<K, V> {
        if (this.kind === NodeKind.Collision) {
            if (this.count === 0 || hash !== this.collisionHash) return this;
            for (let i = 0; i < this.items.length; i++) {
                if (!areEqual(this.items[i].key, key)) continue;
                const builder = Builder.fromExisting(this);
                builder.removeSlot(i);
                return builder.finalize(path);
            }
            return this;
        }

        const slot = path.slot(hash);
        const bit = 1 << slot;

        if ((this.dataMap & bit) !== 0) {
            const current = this.items[bitIndex(this.dataMap, bit)];
            if (current.hash !== hash || !areEqual(current.key, key)) return this;
            const builder = Builder.fromExisting(this);
            builder.removeSlot(slot);
            return builder.finalize(path);
        }

        if ((this.nodeMap & bit) !== 0) {
            const child = this.children[bitIndex(this.nodeMap, bit)];
            const updated = child.removing(path.descend(), key, hash);
            if (updated === child) return this;
            const builder = Builder.fromExisting(this);
            builder.replaceChild(slot, updated);
            return builder.finalize(path);
        }

        return this;
    }

    // ========================================================================
    // 4. ITERATION
    // ========================================================================

    *entries(): IterableIterator<Entry<K, V>> {
        yield* this.items;
        for (const child of this.children) yield* child.entries();
    }

    // ========================================================================
    // 5. INVARIANT CHECKS
    // ========================================================================

    /**
     * Validates this level only: bitmaps, packed arrays, slot placement and counts.
     * Throws `InvariantViolation` on the first broken rule.
     */
    checkLevel(path: HashPath): void {
        if (this.kind === NodeKind.Collision) {
            if (this.dataMap !== 0 || this.nodeMap !== 0 || this.children.length !== 0) {
                fail(path, 'collision bucket carries bitmaps or children');
            }
            if (this.count !== this.items.length) fail(path, 'collision bucket count mismatch');
            const hash = this.count > 0 ? this.collisionHash : 0;
            for (let i = 0; i < this.items.length; i++) {
                if (this.items[i].hash !== hash) fail(path, 'collision bucket mixes hashes');
                for (let j = i + 1; j < this.items.length; j++) {
                    if (areEqual(this.items[i].key, this.items[j].key)) {
                        fail(path, 'collision bucket holds duplicate keys');
                    }
                }
            }
            return;
        }

        if (path.isExhausted) fail(path, 'branch node below the last hash level');
        if ((this.dataMap & this.nodeMap) !== 0) fail(path, 'slot marked as both entry and child');
        if (popcount(this.dataMap) !== this.items.length) fail(path, 'dataMap does not match entries');
        if (popcount(this.nodeMap) !== this.children.length) fail(path, 'nodeMap does not match children');

        let count = this.items.length;
        for (let slot = 0; slot < WIDTH; slot++) {
            const bit = 1 << slot;
            if ((this.dataMap & bit) !== 0) {
                const e = this.items[bitIndex(this.dataMap, bit)];
                if (path.slot(e.hash) !== slot) fail(path, `entry stored in slot ${slot} hashes elsewhere`);
            } else if ((this.nodeMap & bit) !== 0) {
                const child = this.children[bitIndex(this.nodeMap, bit)];
                if (child.count < 2) fail(path, `child in slot ${slot} holds fewer than two entries`);
                count += child.count;
            }
        }
        if (count !== this.count) fail(path, `count ${this.count} but ${count} entries reachable`);
    }

    /**
     * Recursively validates the whole sub-tree rooted here.
     * `prefix` holds the hash bits consumed by the levels above `path`.
     */
    fullInvariantCheck(path: HashPath = HashPath.top, prefix = 0): void {
        const isRoot = path === HashPath.top;
        if (isRoot && this.kind === NodeKind.Collision) fail(path, 'collision bucket at the root');
        if (!isRoot && this.count < 2) fail(path, 'non-root node holds fewer than two entries');

        this.checkLevel(path);

        const mask = path.prefixMask;
        for (const e of this.items) {
            if (((e.hash ^ prefix) & mask) !== 0) fail(path, 'entry hash disagrees with its path');
        }
        if (this.kind === NodeKind.Collision) return;

        const deeper = this.children.length > 0 ? path.descend() : path;
        for (let slot = 0; slot < WIDTH; slot++) {
            const bit = 1 << slot;
            if ((this.nodeMap & bit) === 0) continue;
            const child = this.children[bitIndex(this.nodeMap, bit)];
            child.fullInvariantCheck(deeper, prefix | (slot << path.shift));
        }
    }
}

function fail(path: HashPath, message: string): never {
    throw new InvariantViolation(`${message} (level ${path.level})`);
}
