import { Entry, hashValue, Structural, Unit, Value } from '../src/index';

/**
 * A value with a chosen hash, for forcing elements into the same slots or buckets.
 */
export class Colliding implements Structural {
    constructor(readonly name: string, readonly hashCode: number = 7) {}

    equals(other: unknown): boolean {
        return other instanceof Colliding && other.name === this.name && other.hashCode === this.hashCode;
    }

    toString(): string { return `Colliding(${this.name})`; }
}

export function entry<T extends Value>(key: T): Entry<T, Unit> {
    return { key, value: undefined, hash: hashValue(key) };
}

/**
 * Creates a deterministic pseudo-random number generator (Mulberry32).
 * @returns A function returning a number between 0 and 1.
 */
export function createRNG(seed: number): () => number {
    return function() {
        let t = seed += 0x6D2B79F5;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export function randomInts(random: () => number, count: number, max: number): number[] {
    const out: number[] = [];
    for (let i = 0; i < count; i++) out.push(Math.floor(random() * max));
    return out;
}

export function range(start: number, end: number): number[] {
    const out: number[] = [];
    for (let i = start; i < end; i++) out.push(i);
    return out;
}

export function sorted(values: Iterable<number>): number[] {
    return [...values].sort((a, b) => a - b);
}

/**
 * A value from a small pool of hashes that agree on their low four chunks in groups,
 * so that sets of them grow chains and buckets below the fourth level.
 */
export function deepColliding(n: number): Colliding {
    return new Colliding(`c${n}`, (n % 4) | (((n >> 2) % 3) << 20));
}
