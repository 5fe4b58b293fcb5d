/**
 * Dashboard Response Tests
 */

import { VaultError } from '../src/core/errors';
import { buildPositionResponse, buildStatsResponse, errorStatus } from '../src/dashboard/server';
import { ALICE } from './fixtures';

describe('buildStatsResponse', () => {
    test('serializes bigints and adds display amounts', () => {
        const response = buildStatsResponse({
            tvl: 106_750_000n,
            idleBalance: 109_000_000n,
            totalTradingDeployed: 0n,
            deployedCurrentValue: 0n,
            accumulatedFees: 2_250_000n,
            pendingUnrealizedFees: 0n,
            totalShares: 100_000_000n,
            navPerShare: 1_067_500n,
            maxDeployable: 98_100_000n,
            deploymentRatioBps: 0,
            isPaused: false,
            lastValuationTimestamp: 0,
            valuationStale: false,
        });

        expect(response).toEqual({
            tvl: '106750000',
            idleBalance: '109000000',
            totalTradingDeployed: '0',
            deployedCurrentValue: '0',
            accumulatedFees: '2250000',
            pendingUnrealizedFees: '0',
            totalShares: '100000000',
            navPerShare: '1067500',
            maxDeployable: '98100000',
            deploymentRatioBps: 0,
            isPaused: false,
            lastValuationTimestamp: 0,
            valuationStale: false,
            tvlDisplay: '106.750000',
            idleBalanceDisplay: '109.000000',
            accumulatedFeesDisplay: '2.250000',
        });
    });

    test('keeps an undefined NAV as null', () => {
        const response = buildStatsResponse({
            tvl: 0n,
            idleBalance: 0n,
            totalTradingDeployed: 0n,
            deployedCurrentValue: 0n,
            accumulatedFees: 0n,
            pendingUnrealizedFees: 0n,
            totalShares: 0n,
            navPerShare: null,
            maxDeployable: 0n,
            deploymentRatioBps: 0,
            isPaused: false,
            lastValuationTimestamp: 0,
            valuationStale: false,
        });
        expect(response.navPerShare).toBeNull();
    });
});

describe('buildPositionResponse', () => {
    test('serializes a user position', () => {
        expect(
            buildPositionResponse({
                owner: ALICE,
                shares: 10_000_000n,
                balance: 11_000_000n,
                depositedAmount: 11_000_000n,
                withdrawnAmount: 0n,
                stale: true,
            })
        ).toEqual({
            owner: ALICE,
            shares: '10000000',
            balance: '11000000',
            depositedAmount: '11000000',
            withdrawnAmount: '0',
            stale: true,
            balanceDisplay: '11.000000',
        });
    });
});

describe('errorStatus', () => {
    test('maps ledger errors to HTTP statuses', () => {
        expect(errorStatus(new VaultError('PositionNotFound', 'missing'))).toBe(404);
        expect(errorStatus(new VaultError('NotInitialized', 'not yet'))).toBe(503);
        expect(errorStatus(new VaultError('Paused', 'paused'))).toBe(400);
        expect(errorStatus(new Error('boom'))).toBe(500);
    });
});
