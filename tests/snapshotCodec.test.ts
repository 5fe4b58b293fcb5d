/**
 * Snapshot Codec Tests
 */

import {
    decodeVaultState,
    encodeVaultEvent,
    encodeVaultState,
    SnapshotDecodeError,
} from '../src/storage/snapshotCodec';
import { VaultEvent } from '../src/types';
import { ALICE, BOB, makeConfig, makePosition, makeState, T0 } from './fixtures';

const state = makeState(
    makeConfig({ totalShares: 150_000_000n, deployedCurrentValue: 20_000_000n, totalTradingDeployed: 20_000_000n }),
    [makePosition(ALICE, 100_000_000n), makePosition(BOB, 50_000_000n)],
    130_000_000n
);

describe('encodeVaultState', () => {
    test('writes bigints as decimal strings', () => {
        const snapshot = encodeVaultState(state);
        expect(snapshot.version).toBe(1);
        expect(snapshot.treasury).toEqual({ id: 'treasury', balance: '130000000' });
        expect(snapshot.config?.totalShares).toBe('150000000');
        expect(snapshot.config?.performanceFeeBps).toBe(2500);
        expect(snapshot.positions[1]).toEqual({
            owner: BOB,
            shares: '50000000',
            depositedAmount: '50000000',
            withdrawnAmount: '0',
            createdAt: T0,
            lastActivityAt: T0,
        });
    });

    test('survives JSON and decodes to the same state', () => {
        const stored: unknown = JSON.parse(JSON.stringify(encodeVaultState(state)));
        expect(decodeVaultState(stored)).toEqual(state);
    });
});

describe('decodeVaultState', () => {
    test('rejects negative amounts', () => {
        const snapshot = encodeVaultState(state);
        const tampered = { ...snapshot, treasury: { id: 'treasury', balance: '-5' } };
        expect(() => decodeVaultState(tampered)).toThrow(SnapshotDecodeError);
    });

    test('rejects duplicate owners', () => {
        const snapshot = encodeVaultState(state);
        const tampered = { ...snapshot, positions: [snapshot.positions[0], snapshot.positions[0]] };
        expect(() => decodeVaultState(tampered)).toThrow(`positions: duplicate owner ${ALICE}`);
    });

    test('reads a config stored before deployments were timestamped', () => {
        const snapshot = encodeVaultState(state);
        const legacyConfig = Object.fromEntries(
            Object.entries(snapshot.config ?? {}).filter(([key]) => key !== 'lastDeploymentTimestamp')
        );
        expect(decodeVaultState({ ...snapshot, config: legacyConfig }).config?.lastDeploymentTimestamp).toBe(0);
    });

    test('rejects an unknown version', () => {
        const snapshot = encodeVaultState(state);
        expect(() => decodeVaultState({ ...snapshot, version: 2 })).toThrow(SnapshotDecodeError);
    });
});

describe('encodeVaultEvent', () => {
    test('moves the envelope out of the payload', () => {
        const event: VaultEvent = {
            id: 'event-1',
            emittedAt: T0,
            type: 'CapitalReturned',
            amount: 99_000_000n,
            principalReturned: 90_000_000n,
            profitOrLoss: -1n,
            feeAccrued: 0n,
            totalDeployed: 0n,
            newTreasuryBalance: 109_000_000n,
        };
        expect(encodeVaultEvent(event)).toEqual({
            id: 'event-1',
            type: 'CapitalReturned',
            emitted_at: T0,
            payload: {
                amount: '99000000',
                principalReturned: '90000000',
                profitOrLoss: '-1',
                feeAccrued: '0',
                totalDeployed: '0',
                newTreasuryBalance: '109000000',
            },
        });
    });
});
