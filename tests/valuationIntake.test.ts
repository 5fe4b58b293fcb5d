/**
 * Valuation Intake Tests
 */

import { parseValuationReport } from '../src/services/valuationIntake';
import { T0, thrownCode } from './fixtures';

describe('parseValuationReport', () => {
    test('converts decimal strings and numbers to micro-units', () => {
        expect(
            parseValuationReport({
                deploymentId: 'deployment-7',
                orcaPositionsValue: '40.5',
                driftEquityValue: 15,
                uncollectedFees: '0',
                unrealizedPnl: '-2.25',
                timestamp: T0,
            })
        ).toEqual({
            deploymentId: 'deployment-7',
            orcaPositionsValue: 40_500_000n,
            driftEquityValue: 15_000_000n,
            uncollectedFees: 0n,
            unrealizedPnl: -2_250_000n,
            timestamp: T0,
        });
    });

    test('rejects negative component values', () => {
        expect(
            thrownCode(() =>
                parseValuationReport({
                    deploymentId: 'deployment-7',
                    orcaPositionsValue: '-1',
                    driftEquityValue: 0,
                    uncollectedFees: 0,
                    unrealizedPnl: 0,
                    timestamp: T0,
                })
            )
        ).toBe('InvalidValuation');
    });

    test('rejects missing fields and fractional timestamps', () => {
        expect(thrownCode(() => parseValuationReport({ orcaPositionsValue: 1 }))).toBe('InvalidValuation');
        expect(
            thrownCode(() =>
                parseValuationReport({
                    deploymentId: 'deployment-7',
                    orcaPositionsValue: 1,
                    driftEquityValue: 1,
                    uncollectedFees: 1,
                    unrealizedPnl: 1,
                    timestamp: 1.5,
                })
            )
        ).toBe('InvalidValuation');
    });

    test('rejects precision finer than a micro-unit', () => {
        expect(
            thrownCode(() =>
                parseValuationReport({
                    deploymentId: 'deployment-7',
                    orcaPositionsValue: '1.0000001',
                    driftEquityValue: 0,
                    uncollectedFees: 0,
                    unrealizedPnl: 0,
                    timestamp: T0,
                })
            )
        ).toBe('InvalidValuation');
    });
});
