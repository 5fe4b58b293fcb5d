/**
 * Share Ledger — NAV and Share Pricing
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * POOL VALUE (what all shares together are worth):
 *   poolValue = idleTreasuryBalance + deployedCurrentValue - accumulatedFees
 *
 * PRICING RULES:
 *   - totalShares == 0 → next deposit mints 1:1
 *   - deposits mint floor(amount * totalShares / poolValue), priced BEFORE the
 *     deposit lands in the treasury, so existing holders are never diluted
 *   - redemptions pay floor(shares * poolValue / totalShares)
 *   - amount-denominated withdrawals burn ceil(amount * totalShares / poolValue)
 *
 * Rounding always favours the pool, never the caller.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { VAULT_CONFIG } from '../config/constants';
import { VaultError } from '../core/errors';
import { ProtocolConfig } from '../types';
import { checkedAdd, checkedSub, mulDivCeil, mulDivFloor } from '../utils/math';

/**
 * Total distributable value backing all shares
 */
export function computePoolValue(config: ProtocolConfig, idleBalance: bigint): bigint {
    const grossValue = checkedAdd(idleBalance, config.deployedCurrentValue);
    return checkedSub(grossValue, config.accumulatedFees);
}

function assertNavDefined(totalShares: bigint, poolValue: bigint): void {
    if (totalShares === 0n) {
        throw new VaultError('UndefinedNav', 'NAV is undefined while no shares are outstanding');
    }
    if (poolValue === 0n) {
        throw new VaultError('UndefinedNav', 'NAV is undefined while the pool holds no value', {
            totalShares,
        });
    }
}

/**
 * Shares minted for a deposit, priced at the pre-deposit NAV
 */
export function computeSharesToMint(amount: bigint, totalShares: bigint, poolValue: bigint): bigint {
    if (totalShares === 0n) {
        return amount;
    }
    assertNavDefined(totalShares, poolValue);
    return mulDivFloor(amount, totalShares, poolValue);
}

/**
 * Payout for redeeming a number of shares
 */
export function computeRedemptionPayout(shares: bigint, totalShares: bigint, poolValue: bigint): bigint {
    if (totalShares === 0n) {
        throw new VaultError('UndefinedNav', 'NAV is undefined while no shares are outstanding');
    }
    return mulDivFloor(shares, poolValue, totalShares);
}

/**
 * Shares burned to pay out an exact amount
 */
export function computeSharesToBurn(amount: bigint, totalShares: bigint, poolValue: bigint): bigint {
    assertNavDefined(totalShares, poolValue);
    return mulDivCeil(amount, totalShares, poolValue);
}

/**
 * Value of one whole share unit (1e6 share micro-units), or null at zero supply
 */
export function computeNavPerShare(totalShares: bigint, poolValue: bigint): bigint | null {
    if (totalShares === 0n) return null;
    return mulDivFloor(poolValue, VAULT_CONFIG.AMOUNT_SCALE, totalShares);
}
