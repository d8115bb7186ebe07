/**
 * @module persistent-hash-trie/builder
 * @description
 * Transient, exclusively owned staging area for the edits to one trie level.
 *
 * * Lifecycle:
 * - Created from an existing node (or empty).
 * - Edited through slot-level operations.
 * - Finalized exactly once into an immutable TrieNode; any later call throws.
 *
 * The builder references the source node's arrays until the first write to each,
 * which copies that array once. The source node is never changed.
 */

import { settings } from './config';
import { Value } from './hash';
import { bitIndex, HashPath, WIDTH } from './hash-path';
import { Entry, NodeKind, TrieNode } from './node';

export class Builder<K extends Value, V> {
    readonly #kind: NodeKind;
    #dataMap: number;
    #nodeMap: number;
    #items: ReadonlyArray<Entry<K, V>>;
    #children: ReadonlyArray<TrieNode<K, V>>;
    #ownItems: Entry<K, V>[] | null = null;
    #ownChildren: TrieNode<K, V>[] | null = null;
    #finalized = false;

    private constructor(
        kind: NodeKind,
        dataMap: number,
        nodeMap: number,
        items: ReadonlyArray<Entry<K, V>>,
        children: ReadonlyArray<TrieNode<K, V>>
    ) {
        this.#kind = kind;
        this.#dataMap = dataMap;
        this.#nodeMap = nodeMap;
        this.#items = items;
        this.#children = children;
    }

    static fromExisting<K extends Value, V>(node: TrieNode<K, V>): Builder<K, V> {
        return new Builder(node.kind, node.dataMap, node.nodeMap, node.items, node.children);
    }

    static empty<K extends Value, V>(kind: NodeKind = NodeKind.Branch): Builder<K, V> {
        return new Builder<K, V>(kind, 0, 0, [], []);
    }

    get kind(): NodeKind { return this.#kind; }

    get isEmpty(): boolean {
        return this.#items.length === 0 && this.#children.length === 0;
    }

    /** True once an edit has forced a private copy of the source arrays. */
    get isCopied(): boolean {
        return this.#ownItems !== null || this.#ownChildren !== null;
    }

    #checkFinalized(op: string): void {
        if (this.#finalized) throw new Error(`InvalidOperation: Cannot ${op} a finalized Builder.`);
    }

    #writableItems(): Entry<K, V>[] {
        if (this.#ownItems === null) {
            this.#ownItems = this.#items.slice();
            this.#items = this.#ownItems;
        }
        return this.#ownItems;
    }

    #writableChildren(): TrieNode<K, V>[] {
        if (this.#ownChildren === null) {
            this.#ownChildren = this.#children.slice();
            this.#children = this.#ownChildren;
        }
        return this.#ownChildren;
    }

    /**
     * Places `entry` inline at `slot`, which must be free.
     * In a collision bucket `slot` is a position in the bucket.
     */
    insert(slot: number, entry: Entry<K, V>): void {
        this.#checkFinalized('insert into');
        if (this.#kind === NodeKind.Collision) {
            this.#writableItems().splice(slot, 0, entry);
            return;
        }
        const bit = 1 << slot;
        if (((this.#dataMap | this.#nodeMap) & bit) !== 0) {
            throw new Error(`InvalidOperation: Slot ${slot} is already occupied.`);
        }
        this.#writableItems().splice(bitIndex(this.#dataMap, bit), 0, entry);
        this.#dataMap |= bit;
    }

    /** Clears `slot`, whether it holds an entry or a child. */
    removeSlot(slot: number): void {
        this.#checkFinalized('remove from');
        if (this.#kind === NodeKind.Collision) {
            this.#writableItems().splice(slot, 1);
            return;
        }
        const bit = 1 << slot;
        if ((this.#dataMap & bit) !== 0) {
            this.#writableItems().splice(bitIndex(this.#dataMap, bit), 1);
            this.#dataMap ^= bit;
        } else if ((this.#nodeMap & bit) !== 0) {
            this.#writableChildren().splice(bitIndex(this.#nodeMap, bit), 1);
            this.#nodeMap ^= bit;
        } else {
            throw new Error(`InvalidOperation: Slot ${slot} is empty.`);
        }
    }

    /** Stores `child` at `slot`, replacing the entry or child held there. */
    replaceChild(slot: number, child: TrieNode<K, V>): void {
        this.#checkFinalized('replace a child in');
        if (this.#kind === NodeKind.Collision) {
            throw new Error('InvalidOperation: Collision buckets have no children.');
        }
        const bit = 1 << slot;
        if ((this.#nodeMap & bit) !== 0) {
            this.#writableChildren()[bitIndex(this.#nodeMap, bit)] = child;
            return;
        }
        if ((this.#dataMap & bit) !== 0) {
            this.#writableItems().splice(bitIndex(this.#dataMap, bit), 1);
            this.#dataMap ^= bit;
        }
        this.#writableChildren().splice(bitIndex(this.#nodeMap, bit), 0, child);
        this.#nodeMap |= bit;
    }

    /**
     * Produces the immutable node for level `path`.
     * Children left with a single entry become inline entries; empty children are dropped.
     */
    finalize(path: HashPath): TrieNode<K, V> {
        this.#checkFinalized('finalize');
        this.#finalized = true;

        if (this.#kind === NodeKind.Collision) {
            const bucket = TrieNode.collision(this.#items);
            if (settings.checkInvariants) bucket.checkLevel(path);
            return bucket;
        }

        if (this.#children.some(child => child.count < 2)) this.#collapse();

        let count = this.#items.length;
        for (const child of this.#children) count += child.count;

        const node = new TrieNode(NodeKind.Branch, this.#dataMap, this.#nodeMap, this.#items, this.#children, count);
        if (settings.checkInvariants) node.checkLevel(path);
        return node;
    }

    #collapse(): void {
        const children = this.#writableChildren();
        for (let slot = 0; slot < WIDTH; slot++) {
            const bit = 1 << slot;
            if ((this.#nodeMap & bit) === 0) continue;
            const index = bitIndex(this.#nodeMap, bit);
            const child = children[index];
            if (child.count >= 2) continue;

            children.splice(index, 1);
            this.#nodeMap ^= bit;
            const sole = child.soleEntry;
            if (sole !== undefined) {
                this.#writableItems().splice(bitIndex(this.#dataMap, bit), 0, sole);
                this.#dataMap |= bit;
            }
        }
    }
}
