/**
 * @module persistent-hash-trie/hash-path
 * Slices a 32-bit hash into 5-bit chunks, one chunk per trie level.
 */

export const BITS = 5;
export const WIDTH = 1 << BITS;
export const MASK = WIDTH - 1;
export const HASH_WIDTH = 32;

/** Number of levels that still have unconsumed hash bits. */
export const MAX_DEPTH = Math.ceil(HASH_WIDTH / BITS);

export const popcount = (value: number): number => {
    let v = value - ((value >>> 1) & 0x55555555);
    v = (v & 0x33333333) + ((v >>> 2) & 0x33333333);
    return Math.imul((v + (v >>> 4)) & 0x0f0f0f0f, 0x01010101) >>> 24;
};

/** Position of `bit` among the set bits of `bitmap` (packed array index). */
export const bitIndex = (bitmap: number, bit: number): number => popcount(bitmap & (bit - 1));

/**
 * One level of the trie. Paths are interned: `HashPath.top.descend()` always
 * returns the same instance, so levels can be compared with `===`.
 */
export class HashPath {
    static readonly top: HashPath = new HashPath(0);

    readonly shift: number;
    #deeper: HashPath | null = null;

    private constructor(shift: number) {
        this.shift = shift;
    }

    get level(): number { return this.shift / BITS; }

    /** True once every hash bit has been consumed; only collision buckets live here. */
    get isExhausted(): boolean { return this.shift >= HASH_WIDTH; }

    /** The chunk of `hash` consumed at this level. */
    slot(hash: number): number {
        return (hash >>> this.shift) & MASK;
    }

    descend(): HashPath {
        if (this.isExhausted) {
            throw new Error('InvalidOperation: Cannot descend below an exhausted HashPath.');
        }
        if (this.#deeper === null) this.#deeper = new HashPath(this.shift + BITS);
        return this.#deeper;
    }

    /** Mask selecting the hash bits consumed by the levels above this one. */
    get prefixMask(): number {
        if (this.isExhausted) return -1;
        return (1 << this.shift) - 1;
    }

    toString(): string { return `HashPath(level ${this.level})`; }
}
