/**
 * @module persistent-hash-trie/algebra
 * @description
 * Node-level set algebra. Every function walks two nodes of the same level slot by slot
 * and returns either `undefined` ("no change: keep the left node by reference")
 * or a Builder holding the new contents of that level.
 *
 * Sub-trees that do not need to change are linked into the result as they are,
 * and two operands that are the same object are resolved without descending.
 */

import { Builder } from './builder';
import { areEqual, Value } from './hash';
import { bitIndex, HashPath, WIDTH } from './hash-path';
import { Entry, NodeKind, TrieNode } from './node';

function isSameNode(a: object, b: object): boolean {
    return a === b;
}

// ============================================================================
// 1. SUBTRACTION
// ============================================================================

/**
 * Removes from `self` every key that occurs in `other`.
 * `other` may carry another payload type (e.g. the keys of a map); only keys are compared.
 */
export function subtract<K extends Value, V, W>(
    path: HashPath,
    self: TrieNode<K, V>,
    other: TrieNode<K, W>
): Builder<K, V> | undefined {
    if (self.count === 0 || other.count === 0) return undefined;
    if (isSameNode(self, other)) return Builder.empty(self.kind);

    if (self.kind === NodeKind.Collision) {
        let builder: Builder<K, V> | undefined;
        for (let i = self.items.length - 1; i >= 0; i--) {
            const e = self.items[i];
            if (!other.containsKey(path, e.key, e.hash)) continue;
            if (!builder) builder = Builder.fromExisting(self);
            builder.removeSlot(i);
        }
        return builder;
    }

    if (other.kind === NodeKind.Collision) {
        let node = self;
        for (const e of other.items) node = node.removing(path, e.key, e.hash);
        return node === self ? undefined : Builder.fromExisting(node);
    }

    let builder: Builder<K, V> | undefined;
    const theirSlots = other.dataMap | other.nodeMap;

    for (let slot = 0; slot < WIDTH; slot++) {
        const bit = 1 << slot;
        // Slots only in self stay, slots only in other are irrelevant.
        if ((theirSlots & bit) === 0) continue;

        if ((self.dataMap & bit) !== 0) {
            const mine = self.items[bitIndex(self.dataMap, bit)];
            if ((other.dataMap & bit) !== 0) {
                const theirs = other.items[bitIndex(other.dataMap, bit)];
                if (mine.hash !== theirs.hash || !areEqual(mine.key, theirs.key)) continue;
            } else {
                const theirs = other.children[bitIndex(other.nodeMap, bit)];
                if (!theirs.containsKey(path.descend(), mine.key, mine.hash)) continue;
            }
            if (!builder) builder = Builder.fromExisting(self);
            builder.removeSlot(slot);
            continue;
        }

        if ((self.nodeMap & bit) === 0) continue;

        const mine = self.children[bitIndex(self.nodeMap, bit)];
        let updated: TrieNode<K, V>;
        if ((other.dataMap & bit) !== 0) {
            const theirs = other.items[bitIndex(other.dataMap, bit)];
            updated = mine.removing(path.descend(), theirs.key, theirs.hash);
        } else {
            const theirs = other.children[bitIndex(other.nodeMap, bit)];
            const sub = subtract(path.descend(), mine, theirs);
            if (!sub) continue;
            updated = sub.finalize(path.descend());
        }
        if (updated === mine) continue;
        if (!builder) builder = Builder.fromExisting(self);
        builder.replaceChild(slot, updated);
    }

    return builder;
}

// ============================================================================
// 2. UNION
// ============================================================================

/**
 * Merges `b` into `a`. On equal keys the entry of `a` wins.
 */
export function union<K extends Value, V>(
    path: HashPath,
    a: TrieNode<K, V>,
    b: TrieNode<K, V>
): Builder<K, V> | undefined {
    if (isSameNode(a, b) || b.count === 0) return undefined;
    if (a.count === 0) return Builder.fromExisting(b);

    if (a.kind === NodeKind.Collision || b.kind === NodeKind.Collision) {
        let node = a;
        for (const e of b.entries()) node = node.inserting(path, e, false);
        return node === a ? undefined : Builder.fromExisting(node);
    }

    let builder: Builder<K, V> | undefined;
    const mySlots = a.dataMap | a.nodeMap;

    for (let slot = 0; slot < WIDTH; slot++) {
        const bit = 1 << slot;
        const inB = ((b.dataMap | b.nodeMap) & bit) !== 0;
        if (!inB) continue;

        if ((mySlots & bit) === 0) {
            if (!builder) builder = Builder.fromExisting(a);
            if ((b.dataMap & bit) !== 0) {
                builder.insert(slot, b.items[bitIndex(b.dataMap, bit)]);
            } else {
                builder.replaceChild(slot, b.children[bitIndex(b.nodeMap, bit)]);
            }
            continue;
        }

        if ((a.dataMap & bit) !== 0) {
            const mine = a.items[bitIndex(a.dataMap, bit)];
            let merged: TrieNode<K, V>;
            if ((b.dataMap & bit) !== 0) {
                const theirs = b.items[bitIndex(b.dataMap, bit)];
                if (mine.hash === theirs.hash && areEqual(mine.key, theirs.key)) continue;
                merged = TrieNode.pair(path.descend(), mine, theirs);
            } else {
                const theirs = b.children[bitIndex(b.nodeMap, bit)];
                merged = theirs.inserting(path.descend(), mine, true);
            }
            if (!builder) builder = Builder.fromExisting(a);
            builder.replaceChild(slot, merged);
            continue;
        }

        const mine = a.children[bitIndex(a.nodeMap, bit)];
        let updated: TrieNode<K, V>;
        if ((b.dataMap & bit) !== 0) {
            updated = mine.inserting(path.descend(), b.items[bitIndex(b.dataMap, bit)], false);
        } else {
            const sub = union(path.descend(), mine, b.children[bitIndex(b.nodeMap, bit)]);
            if (!sub) continue;
            updated = sub.finalize(path.descend());
        }
        if (updated === mine) continue;
        if (!builder) builder = Builder.fromExisting(a);
        builder.replaceChild(slot, updated);
    }

    return builder;
}

// ============================================================================
// 3. INTERSECTION
// ============================================================================

/**
 * Keeps the entries of `a` whose keys also occur in `b`.
 */
export function intersect<K extends Value, V, W>(
    path: HashPath,
    a: TrieNode<K, V>,
    b: TrieNode<K, W>
): Builder<K, V> | undefined {
    if (isSameNode(a, b) || a.count === 0) return undefined;
    if (b.count === 0) return Builder.empty(a.kind);

    if (a.kind === NodeKind.Collision) {
        let builder: Builder<K, V> | undefined;
        for (let i = a.items.length - 1; i >= 0; i--) {
            const e = a.items[i];
            if (b.containsKey(path, e.key, e.hash)) continue;
            if (!builder) builder = Builder.fromExisting(a);
            builder.removeSlot(i);
        }
        return builder;
    }

    if (b.kind === NodeKind.Collision) {
        const kept: Entry<K, V>[] = [];
        for (const e of b.items) {
            const found = a.find(path, e.key, e.hash);
            if (found) kept.push(found);
        }
        if (kept.length === a.count) return undefined;
        // Survivors share one hash: two or more stay a bucket, one folds into the parent.
        if (kept.length >= 2) return Builder.fromExisting(TrieNode.collision(kept));
        const builder = Builder.empty<K, V>();
        if (kept.length === 1) builder.insert(path.slot(kept[0].hash), kept[0]);
        return builder;
    }

    let builder: Builder<K, V> | undefined;
    const theirSlots = b.dataMap | b.nodeMap;

    for (let slot = 0; slot < WIDTH; slot++) {
        const bit = 1 << slot;
        if (((a.dataMap | a.nodeMap) & bit) === 0) continue;

        if ((theirSlots & bit) === 0) {
            if (!builder) builder = Builder.fromExisting(a);
            builder.removeSlot(slot);
            continue;
        }

        if ((a.dataMap & bit) !== 0) {
            const mine = a.items[bitIndex(a.dataMap, bit)];
            const kept = (b.dataMap & bit) !== 0
                ? sameKey(mine, b.items[bitIndex(b.dataMap, bit)])
                : b.children[bitIndex(b.nodeMap, bit)].containsKey(path.descend(), mine.key, mine.hash);
            if (kept) continue;
            if (!builder) builder = Builder.fromExisting(a);
            builder.removeSlot(slot);
            continue;
        }

        const mine = a.children[bitIndex(a.nodeMap, bit)];
        if ((b.dataMap & bit) !== 0) {
            const theirs = b.items[bitIndex(b.dataMap, bit)];
            const found = mine.find(path.descend(), theirs.key, theirs.hash);
            if (!builder) builder = Builder.fromExisting(a);
            builder.removeSlot(slot);
            if (found) builder.insert(slot, found);
            continue;
        }

        const sub = intersect(path.descend(), mine, b.children[bitIndex(b.nodeMap, bit)]);
        if (!sub) continue;
        if (!builder) builder = Builder.fromExisting(a);
        builder.replaceChild(slot, sub.finalize(path.descend()));
    }

    return builder;
}

function sameKey<K extends Value>(a: Entry<K, unknown>, b: Entry<K, unknown>): boolean {
    return a.hash === b.hash && areEqual(a.key, b.key);
}

// ============================================================================
// 4. FILTER
// ============================================================================

/**
 * Keeps the entries accepted by `predicate`.
 */
export function filterNode<K extends Value, V>(
    path: HashPath,
    node: TrieNode<K, V>,
    predicate: (entry: Entry<K, V>) => boolean
): Builder<K, V> | undefined {
    let builder: Builder<K, V> | undefined;

    if (node.kind === NodeKind.Collision) {
        for (let i = node.items.length - 1; i >= 0; i--) {
            if (predicate(node.items[i])) continue;
            if (!builder) builder = Builder.fromExisting(node);
            builder.removeSlot(i);
        }
        return builder;
    }

    for (let slot = 0; slot < WIDTH; slot++) {
        const bit = 1 << slot;
        if ((node.dataMap & bit) !== 0) {
            if (predicate(node.items[bitIndex(node.dataMap, bit)])) continue;
            if (!builder) builder = Builder.fromExisting(node);
            builder.removeSlot(slot);
        } else if ((node.nodeMap & bit) !== 0) {
            const sub = filterNode(path.descend(), node.children[bitIndex(node.nodeMap, bit)], predicate);
            if (!sub) continue;
            if (!builder) builder = Builder.fromExisting(node);
            builder.replaceChild(slot, sub.finalize(path.descend()));
        }
    }

    return builder;
}
