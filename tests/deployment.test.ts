/**
 * Deployment Lifecycle Math Tests
 *
 * Ceiling: (deployed + amount) * 10000 <= 9000 * (idle + deployed)
 */

import {
    assertWithinDeploymentLimit,
    computeDeploymentRatioBps,
    computeMaxDeployable,
    computePrincipalReturned,
} from '../src/capital/deployment';
import { thrownCode } from './fixtures';

describe('deployment ceiling', () => {
    test('90% of a fresh pool is deployable', () => {
        expect(computeMaxDeployable(100_000_000n, 0n)).toBe(90_000_000n);
        expect(thrownCode(() => assertWithinDeploymentLimit(90_000_000n, 100_000_000n, 0n))).toBeUndefined();
    });

    test('one unit past the ceiling is rejected', () => {
        expect(thrownCode(() => assertWithinDeploymentLimit(90_000_001n, 100_000_000n, 0n))).toBe(
            'ExceedsDeploymentLimit'
        );
        expect(thrownCode(() => assertWithinDeploymentLimit(1n, 10_000_000n, 90_000_000n))).toBe(
            'ExceedsDeploymentLimit'
        );
    });

    test('headroom counts principal already deployed', () => {
        expect(computeMaxDeployable(50_000_000n, 50_000_000n)).toBe(40_000_000n);
        expect(computeMaxDeployable(10_000_000n, 90_000_000n)).toBe(0n);
    });

    test('ratio is reported in bps of idle plus deployed', () => {
        expect(computeDeploymentRatioBps(10_000_000n, 90_000_000n)).toBe(9000);
        expect(computeDeploymentRatioBps(75_000_000n, 25_000_000n)).toBe(2500);
        expect(computeDeploymentRatioBps(0n, 0n)).toBe(0);
    });
});

describe('computePrincipalReturned', () => {
    test('profit is carved out of the amount returned', () => {
        expect(computePrincipalReturned(99_000_000n, 9_000_000n)).toBe(90_000_000n);
    });

    test('a loss writes off more principal than was returned', () => {
        expect(computePrincipalReturned(40_000_000n, -10_000_000n)).toBe(50_000_000n);
    });

    test('profit larger than the amount returned is invalid', () => {
        expect(thrownCode(() => computePrincipalReturned(5_000_000n, 10_000_000n))).toBe('InvalidAmount');
    });
});
