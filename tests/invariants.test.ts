/**
 * Vault Invariant + Store Commit Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * A draft that breaks an invariant must never replace the committed state.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { checkVaultInvariants } from '../src/capital/invariants';
import { VaultStore } from '../src/state/vaultStore';
import { ALICE, BOB, makeConfig, makePosition, makeState, T0, thrownCode } from './fixtures';

describe('checkVaultInvariants', () => {
    test('consistent state passes', () => {
        const state = makeState(
            makeConfig({ totalShares: 150n }),
            [makePosition(ALICE, 100n), makePosition(BOB, 50n)],
            150n
        );
        const result = checkVaultInvariants(state);
        expect(result.valid).toBe(true);
        expect(result.computed).toEqual({ sumShares: 150n, positionCount: 2 });
    });

    test('totalShares must equal the sum of position shares', () => {
        const state = makeState(makeConfig({ totalShares: 151n }), [makePosition(ALICE, 150n)], 150n);
        const result = checkVaultInvariants(state);
        expect(result.valid).toBe(false);
        expect(result.errors).toEqual(['INVARIANT 1 VIOLATED: totalShares (151) !== sum(shares) (150)']);
    });

    test('valuation timestamp may not move backwards', () => {
        const previous = makeState(makeConfig({ lastValuationTimestamp: T0 }));
        const next = makeState(makeConfig({ lastValuationTimestamp: T0 - 1 }));
        expect(checkVaultInvariants(next, previous).errors).toEqual([
            `INVARIANT 3 VIOLATED: lastValuationTimestamp moved back ${T0} -> ${T0 - 1}`,
        ]);
    });

    test('positions cannot exist before initialization', () => {
        const state = makeState(null, [makePosition(ALICE, 0n)]);
        expect(checkVaultInvariants(state).errors).toEqual(['positions exist before protocol initialization']);
    });
});

describe('VaultStore.transact', () => {
    test('commits the draft and stamps buffered events', () => {
        const store = new VaultStore(makeState(makeConfig()));
        const { result, events } = store.transact(T0, tx => {
            tx.config.isPaused = true;
            tx.emit({ type: 'PauseChanged', isPaused: true });
            return 'done';
        });

        expect(result).toBe('done');
        expect(store.getConfig()?.isPaused).toBe(true);
        expect(events).toHaveLength(1);
        expect(events[0].type).toBe('PauseChanged');
        expect(events[0].emittedAt).toBe(T0);
    });

    test('a thrown operation leaves the committed state untouched', () => {
        const store = new VaultStore(makeState(makeConfig()));
        expect(() =>
            store.transact(T0, tx => {
                tx.treasury.balance = 500n;
                throw new Error('abort');
            })
        ).toThrow('abort');
        expect(store.getTreasuryBalance()).toBe(0n);
    });

    test('an invariant violation aborts the commit', () => {
        const store = new VaultStore(makeState(makeConfig()));
        const code = thrownCode(() =>
            store.transact(T0, tx => {
                tx.config.totalShares = 5n;
            })
        );
        expect(code).toBe('InvariantViolation');
        expect(store.getConfig()?.totalShares).toBe(0n);
    });

    test('snapshot is an independent copy', () => {
        const store = new VaultStore(makeState(makeConfig({ totalShares: 10n }), [makePosition(ALICE, 10n)], 10n));
        const snapshot = store.snapshot();
        const position = snapshot.positions.get(ALICE);
        if (position) position.shares = 0n;
        expect(store.getPosition(ALICE)?.shares).toBe(10n);
    });

    test('uninitialized config access throws NotInitialized', () => {
        const store = new VaultStore();
        expect(thrownCode(() => store.transact(T0, tx => tx.config))).toBe('NotInitialized');
    });
});
