/**
 * Timing runs for set subtraction: node against node, fast membership and plain sequences.
 * Usage: npm run bench -- --seed=12345
 */

import { FastContainment, PersistentSet } from '../src/index';

const args = process.argv.slice(2);
const seedArg = args.find(arg => arg.startsWith('--seed='));
const parsedSeed = seedArg ? Number(seedArg.split('=')[1]) : 1337;
const SEED = Number.isFinite(parsedSeed) ? parsedSeed : 1337;

function createRNG(seed: number): () => number {
    return function() {
        let t = seed += 0x6D2B79F5;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

function measure<T>(label: string, fn: () => T): T {
    const start = performance.now();
    const result = fn();
    const end = performance.now();
    console.log(`[PERF] ${label}: ${(end - start).toFixed(2)}ms`);
    return result;
}

const random = createRNG(SEED);
const N = 100_000;

console.log(`[Config] RNG Seed: ${SEED}, N = ${N}`);

const left = Array.from({ length: N }, () => Math.floor(random() * N * 4));
const right = Array.from({ length: N }, () => Math.floor(random() * N * 4));

const a = measure('build A', () => PersistentSet.from(left));
const b = measure('build B', () => PersistentSet.from(right));

const byNode = measure('A - B (trie)', () => a.subtracting(b));
const bySequence = measure('A - B (array)', () => a.subtracting(right));
const byHook = measure('A - keys of B (hook)', () => {
    const hook: Iterable<number> & FastContainment<number> = {
        fastContains: (e: number) => b.has(e),
        [Symbol.iterator]: () => b[Symbol.iterator](),
    };
    return a.subtracting(hook);
});

measure('A - A', () => a.subtracting(a));
measure('A - {one element}', () => a.subtracting(new PersistentSet(left[0])));

console.log(`[CHECK] sizes: ${byNode.size} ${bySequence.size} ${byHook.size}`);
console.log(`[CHECK] agree: ${byNode.equals(bySequence) && byNode.equals(byHook)}`);
