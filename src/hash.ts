/**
 * @module persistent-hash-trie/hash
 * @description
 * The value universe shared by every trie level: what can be stored,
 * how it hashes and how two values are compared.
 *
 * * Contracts:
 * - Numbers: no NaN (NaN is never equal to itself, so it can be inserted but never found).
 * - Values must not be mutated after insertion.
 * - No cycles: self-referential structures overflow on hash/equals.
 */

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

/** Primitive types hashed by content. */
export type Primitive = number | string;

/**
 * Interface for objects that support Value Semantics.
 * Anything implementing it can be an element of a PersistentSet or a key of a PersistentMap.
 */
export interface Structural {
    /** Deterministic hash; equal objects must report equal hashes. */
    readonly hashCode: number;

    /** Deep equality with another object. */
    equals(other: unknown): boolean;
}

export type Value = Primitive | Structural;

// ============================================================================
// 2. HASH ENGINE (FNV-1a)
// ============================================================================

const FNV_PRIME = 16777619;
const FNV_OFFSET = 2166136261;
const floatBuffer = new ArrayBuffer(8);
const view = new DataView(floatBuffer);

/**
 * Hashes a number using bitwise manipulation.
 * Integers hash to themselves, floats go through FNV-1a over their IEEE-754 bits.
 */
function hashNumber(val: number): number {
    if ((val | 0) === val) return val >>> 0;
    view.setFloat64(0, val, true);
    let h = FNV_OFFSET;
    h ^= view.getInt32(0, true);
    h = Math.imul(h, FNV_PRIME);
    h ^= view.getInt32(4, true);
    h = Math.imul(h, FNV_PRIME);
    return h >>> 0;
}

function hashString(str: string): number {
    let h = FNV_OFFSET;
    const len = str.length;
    for (let i = 0; i < len; i++) {
        h ^= str.charCodeAt(i);
        h = Math.imul(h, FNV_PRIME);
    }
    return h >>> 0;
}

/**
 * Computes the unsigned 32-bit hash of any `Value`.
 * Structural values delegate to their cached `.hashCode`.
 */
export function hashValue(v: Value): number {
    if (typeof v === 'number') return hashNumber(v);
    if (typeof v === 'string') return hashString(v);
    return v.hashCode >>> 0;
}

/**
 * Determines deep equality between two values.
 * Primitives compare with `===`, structural values through `equals`.
 */
export function areEqual(a: Value, b: Value): boolean {
    if (a === b) return true;
    if (typeof a === 'object' && typeof b === 'object') return a.equals(b);
    return false;
}

// ============================================================================
// 3. COMPARATOR
// ============================================================================

/**
 * Total ordering over the value universe, used for deterministic output only.
 * Numbers < Strings < Objects; objects order by hash, then by their string form.
 */
export function compare(a: Value, b: Value): number {
    if (a === b) return 0;
    if (typeof a === 'number' && typeof b === 'number') return a - b;
    if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : 1;

    const typeA = typeof a;
    const typeB = typeof b;
    if (typeA !== typeB) {
        const scoreA = (typeA === 'number') ? 1 : (typeA === 'string' ? 2 : 3);
        const scoreB = (typeB === 'number') ? 1 : (typeB === 'string' ? 2 : 3);
        return scoreA - scoreB;
    }

    const h1 = hashValue(a);
    const h2 = hashValue(b);
    if (h1 !== h2) return h1 < h2 ? -1 : 1;

    const s1 = String(a);
    const s2 = String(b);
    if (s1 === s2) return 0;
    return s1 < s2 ? -1 : 1;
}

// ============================================================================
// 4. TUPLE (Immutable)
// ============================================================================

/**
 * An immutable, fixed-length sequence of values.
 * Useful as a composite key in maps or as a set element.
 * @template T The type of the tuple elements array.
 */
export class Tuple<T extends Value[]> implements Structural, Iterable<T[number]> {
    readonly #elements: ReadonlyArray<T[number]>;
    readonly #hashCode: number;

    /**
     * Copies the input, freezes the copy and computes the hash once.
     */
    constructor(...elements: T) {
        this.#elements = Object.freeze([...elements]);

        let h = 1;
        for (const e of this.#elements) {
            h = (Math.imul(h, 31) + hashValue(e)) | 0;
        }
        this.#hashCode = h >>> 0;
    }

    get length(): number { return this.#elements.length; }
    get raw(): ReadonlyArray<T[number]> { return this.#elements; }
    get hashCode(): number { return this.#hashCode; }

    get(index: number): T[number] | undefined { return this.#elements[index]; }

    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof Tuple)) return false;
        if (this.hashCode !== other.hashCode) return false;
        const theirs: ReadonlyArray<Value> = other.raw;
        if (this.length !== theirs.length) return false;
        for (let i = 0; i < this.length; i++) {
            if (!areEqual(this.#elements[i], theirs[i])) return false;
        }
        return true;
    }

    *[Symbol.iterator](): Iterator<T[number]> { yield* this.#elements; }

    toString(): string {
        return `(${this.#elements.map(String).join(', ')})`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
