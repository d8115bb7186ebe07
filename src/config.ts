/**
 * @module persistent-hash-trie/config
 * Run-time settings of the trie engine.
 */

export interface TrieSettings {
    /**
     * Re-verify every root produced by set algebra, and every node a Builder
     * finalizes, against the structural invariants. O(n) per operation.
     */
    checkInvariants: boolean;
}

function readFlag(raw: string | undefined): boolean | undefined {
    if (raw === undefined) return undefined;
    const v = raw.trim().toLowerCase();
    if (v === '1' || v === 'true') return true;
    if (v === '0' || v === 'false') return false;
    return undefined;
}

function defaultSettings(): TrieSettings {
    const flag = readFlag(process.env.TRIE_CHECK_INVARIANTS);
    return {
        checkInvariants: flag ?? process.env.NODE_ENV === 'test',
    };
}

export const settings: TrieSettings = defaultSettings();

/** Overrides settings at run time and returns a snapshot of the result. */
export function configure(options: Partial<TrieSettings>): TrieSettings {
    if (options.checkInvariants !== undefined) settings.checkInvariants = options.checkInvariants;
    return { ...settings };
}

/** Restores the settings derived from the environment. */
export function resetSettings(): TrieSettings {
    return configure(defaultSettings());
}
