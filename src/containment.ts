/**
 * @module persistent-hash-trie/containment
 * Fast membership as an opt-in capability of iterables.
 */

import { areEqual, Value } from './hash';

/**
 * Implemented by collections that answer membership without a scan.
 * `undefined` means "cannot tell for this element".
 */
export interface FastContainment<T> {
    fastContains(element: T): boolean | undefined;
}

export function hasFastContainment<T>(value: Iterable<T>): value is Iterable<T> & FastContainment<T> {
    return typeof value === 'object' && value !== null
        && 'fastContains' in value && typeof value.fastContains === 'function';
}

/**
 * Membership in an arbitrary iterable: asks the fast hook first and falls back to
 * a linear scan with value equality when the hook has no answer.
 */
export function contains<T extends Value>(iterable: Iterable<T>, element: T): boolean {
    if (hasFastContainment(iterable)) {
        const answer = iterable.fastContains(element);
        if (answer !== undefined) return answer;
    }
    for (const item of iterable) {
        if (areEqual(item, element)) return true;
    }
    return false;
}
