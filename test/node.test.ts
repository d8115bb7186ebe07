import { HashPath, InvariantViolation, NodeKind, TrieNode, Unit } from '../src/index';
import { Colliding, entry } from './helpers';

const top = HashPath.top;

function build(...keys: (number | Colliding)[]): TrieNode<number | Colliding, Unit> {
    let root = TrieNode.empty<number | Colliding, Unit>();
    for (const k of keys) root = root.inserting(top, entry(k), false);
    return root;
}

describe('TrieNode insertion', () => {
    test('places an entry inline in the slot of its low chunk', () => {
        const root = build(1);
        expect(root.dataMap).toBe(1 << 1);
        expect(root.nodeMap).toBe(0);
        expect(root.items.map(e => e.key)).toEqual([1]);
        expect(root.count).toBe(1);
    });

    test('keeps inline entries in ascending slot order', () => {
        const root = build(9, 2, 30);
        expect(root.items.map(e => e.key)).toEqual([2, 9, 30]);
    });

    test('pushes two entries sharing a slot into a child', () => {
        const root = build(1, 33);
        expect(root.dataMap).toBe(0);
        expect(root.nodeMap).toBe(1 << 1);
        const child = root.children[0];
        expect(child.dataMap).toBe(0b11);
        expect(child.items.map(e => e.key)).toEqual([1, 33]);
        expect(root.count).toBe(2);
    });

    test('descends until the chunks differ', () => {
        const root = build(1, 1025);
        const level1 = root.children[0];
        expect(level1.nodeMap).toBe(1);
        expect(level1.dataMap).toBe(0);
        const level2 = level1.children[0];
        expect(level2.items.map(e => e.key)).toEqual([1, 1025]);
        expect(() => root.fullInvariantCheck()).not.toThrow();
    });

    test('returns the same node when the key is already present', () => {
        const root = build(1, 2, 3);
        expect(root.inserting(top, entry(2), false)).toBe(root);
        expect(root.inserting(top, entry(2), true)).toBe(root);
    });

    test('replaces the value only when asked to', () => {
        let root = TrieNode.empty<string, number>();
        root = root.inserting(top, { key: 'a', value: 1, hash: 97 }, true);
        expect(root.inserting(top, { key: 'a', value: 2, hash: 97 }, false)).toBe(root);
        const replaced = root.inserting(top, { key: 'a', value: 2, hash: 97 }, true);
        expect(replaced.items[0].value).toBe(2);
        expect(root.items[0].value).toBe(1);
    });

    test('equal full hashes form a collision bucket', () => {
        const a = new Colliding('a');
        const b = new Colliding('b');
        const root = build(a, b);
        expect(root.nodeMap).toBe(1 << 7);
        const bucket = root.children[0];
        expect(bucket.kind).toBe(NodeKind.Collision);
        expect(bucket.items.map(e => e.key)).toEqual([a, b]);
        expect(root.find(top, new Colliding('b'), 7)?.key).toBe(b);
    });

    test('a different hash meeting a bucket wraps it in a branch', () => {
        const root = build(new Colliding('a'), new Colliding('b'), 39);
        const branch = root.children[0];
        expect(branch.kind).toBe(NodeKind.Branch);
        expect(branch.dataMap).toBe(1 << 1);
        expect(branch.nodeMap).toBe(1 << 0);
        expect(branch.children[0].kind).toBe(NodeKind.Collision);
        expect(root.count).toBe(3);
        expect(() => root.fullInvariantCheck()).not.toThrow();
    });
});

describe('TrieNode removal', () => {
    test('absent keys return the same node', () => {
        const root = build(1, 33, 5);
        expect(root.removing(top, 99, 99)).toBe(root);
        expect(root.removing(top, 65, 65)).toBe(root);
    });

    test('a child left with one entry folds back inline', () => {
        const root = build(1, 33);
        const after = root.removing(top, 33, 33);
        expect(after.nodeMap).toBe(0);
        expect(after.dataMap).toBe(1 << 1);
        expect(after.items.map(e => e.key)).toEqual([1]);
        expect(after.count).toBe(1);
        expect(root.count).toBe(2);
    });

    test('collapse cascades through several levels', () => {
        const root = build(1, 1025, 7);
        const after = root.removing(top, 1025, 1025);
        expect(after.nodeMap).toBe(0);
        expect(after.items.map(e => e.key)).toEqual([1, 7]);
    });

    test('a bucket reduced to one entry becomes an inline entry', () => {
        const a = new Colliding('a');
        const b = new Colliding('b');
        const root = build(a, b);
        const after = root.removing(top, a, 7);
        expect(after.nodeMap).toBe(0);
        expect(after.dataMap).toBe(1 << 7);
        expect(after.items[0].key).toBe(b);
    });

    test('removing the last entry leaves an empty root', () => {
        const after = build(4).removing(top, 4, 4);
        expect(after.count).toBe(0);
        expect(after.dataMap).toBe(0);
    });
});

describe('fullInvariantCheck', () => {
    test('accepts tries built through the public operations', () => {
        const keys: number[] = [];
        for (let i = 0; i < 500; i++) keys.push(i * 37);
        expect(() => build(...keys).fullInvariantCheck()).not.toThrow();
    });

    test('rejects an entry stored in the wrong slot', () => {
        const bad = new TrieNode<number, Unit>(NodeKind.Branch, 1 << 1, 0, [entry(5)], [], 1);
        expect(() => bad.fullInvariantCheck()).toThrow(InvariantViolation);
    });

    test('rejects a child holding a single entry', () => {
        const child = new TrieNode<number, Unit>(NodeKind.Branch, 1 << 0, 0, [entry(1)], [], 1);
        const bad = new TrieNode<number, Unit>(NodeKind.Branch, 0, 1 << 1, [], [child], 1);
        expect(() => bad.fullInvariantCheck()).toThrow('child in slot 1 holds fewer than two entries');
    });

    test('rejects a wrong count', () => {
        const bad = new TrieNode<number, Unit>(NodeKind.Branch, 1 << 1, 0, [entry(1)], [], 2);
        expect(() => bad.fullInvariantCheck()).toThrow('count 2 but 1 entries reachable');
    });

    test('rejects a collision bucket at the root', () => {
        const bucket = TrieNode.collision([entry(new Colliding('a')), entry(new Colliding('b'))]);
        expect(() => bucket.fullInvariantCheck()).toThrow('collision bucket at the root');
    });

    test('rejects a bucket mixing hashes', () => {
        const bucket = TrieNode.collision<number | Colliding, Unit>([entry(new Colliding('a')), entry(39)]);
        const bad = new TrieNode<number | Colliding, Unit>(NodeKind.Branch, 0, 1 << 7, [], [bucket], 2);
        expect(() => bad.fullInvariantCheck()).toThrow('collision bucket mixes hashes');
    });
});
