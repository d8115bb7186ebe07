import { configure, resetSettings, settings } from '../src/index';

describe('settings', () => {
    const saved = process.env.TRIE_CHECK_INVARIANTS;

    afterEach(() => {
        if (saved === undefined) delete process.env.TRIE_CHECK_INVARIANTS;
        else process.env.TRIE_CHECK_INVARIANTS = saved;
        resetSettings();
    });

    test('invariant checks are on under the test environment', () => {
        delete process.env.TRIE_CHECK_INVARIANTS;
        expect(resetSettings().checkInvariants).toBe(true);
    });

    test('configure overrides and returns a snapshot', () => {
        const snapshot = configure({ checkInvariants: false });
        expect(snapshot.checkInvariants).toBe(false);
        expect(settings.checkInvariants).toBe(false);
        snapshot.checkInvariants = true;
        expect(settings.checkInvariants).toBe(false);
    });

    test('an empty override changes nothing', () => {
        const before = settings.checkInvariants;
        expect(configure({}).checkInvariants).toBe(before);
    });

    test('the environment flag wins over NODE_ENV', () => {
        process.env.TRIE_CHECK_INVARIANTS = 'false';
        expect(resetSettings().checkInvariants).toBe(false);
        process.env.TRIE_CHECK_INVARIANTS = ' TRUE ';
        expect(resetSettings().checkInvariants).toBe(true);
        process.env.TRIE_CHECK_INVARIANTS = 'maybe';
        expect(resetSettings().checkInvariants).toBe(true);
    });
});
