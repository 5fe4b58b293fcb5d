import { isVaultError } from '../src/core/errors';
import { ProtocolConfig, UserPosition, VaultState } from '../src/types';

export const ADMIN = 'admin-test-key';
export const OPERATOR = 'operator-test-key';
export const ALICE = 'alice-test-key';
export const BOB = 'bob-test-key';

export const T0 = 1_700_000_000;

export function makeConfig(overrides: Partial<ProtocolConfig> = {}): ProtocolConfig {
    return {
        admin: ADMIN,
        operator: OPERATOR,
        feeRecipient: ADMIN,
        treasury: 'treasury',
        totalShares: 0n,
        totalTradingDeployed: 0n,
        accumulatedFees: 0n,
        performanceFeeBps: 2500,
        isPaused: false,
        lastFeeSweep: 0,
        deployedCurrentValue: 0n,
        lastValuationTimestamp: 0,
        lastDeploymentTimestamp: 0,
        pendingUnrealizedFees: 0n,
        initializedAt: T0,
        ...overrides,
    };
}

export function makePosition(owner: string, shares: bigint): UserPosition {
    return {
        owner,
        shares,
        depositedAmount: shares,
        withdrawnAmount: 0n,
        createdAt: T0,
        lastActivityAt: T0,
    };
}

export function makeState(
    config: ProtocolConfig | null,
    positions: UserPosition[] = [],
    treasuryBalance: bigint = 0n
): VaultState {
    return {
        config,
        positions: new Map(positions.map(position => [position.owner, position])),
        treasury: { id: 'treasury', balance: treasuryBalance },
    };
}

/**
 * Run fn and return the VaultError code it throws, if any
 */
export function thrownCode(fn: () => unknown): string | undefined {
    try {
        fn();
    } catch (err) {
        if (isVaultError(err)) return err.code;
        throw err;
    }
    return undefined;
}
