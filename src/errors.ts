/**
 * Raised by the full invariant check when a node is malformed.
 * It marks a defect in the trie engine itself, never bad input.
 */
export class InvariantViolation extends Error {
    constructor(message: string) {
        super(`InvariantViolation: ${message}`);
        this.name = 'InvariantViolation';
    }
}
