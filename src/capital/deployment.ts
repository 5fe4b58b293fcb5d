/**
 * Deployment Lifecycle Math
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * CEILING (checked only at the instant of deployment):
 *   (totalTradingDeployed + amount) * 10000 <= 9000 * (idle + totalTradingDeployed)
 *
 * The basis uses deployed PRINCIPAL, not the latest mark. An adverse valuation
 * after deployment can push the effective ratio above 90%; nothing corrects it.
 *
 * RETURNS:
 *   principalReturned = amountReturned - realizedPnl
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { VAULT_CONFIG } from '../config/constants';
import { VaultError } from '../core/errors';
import { checkedAdd, saturatingSub } from '../utils/math';

const { TRADING_ALLOCATION_BPS, BPS_DENOMINATOR } = VAULT_CONFIG;

/**
 * Largest amount the operator may deploy right now
 */
export function computeMaxDeployable(idleBalance: bigint, totalTradingDeployed: bigint): bigint {
    const basis = checkedAdd(idleBalance, totalTradingDeployed);
    const ceiling = (basis * TRADING_ALLOCATION_BPS) / BPS_DENOMINATOR;
    return saturatingSub(ceiling, totalTradingDeployed);
}

export function assertWithinDeploymentLimit(
    amount: bigint,
    idleBalance: bigint,
    totalTradingDeployed: bigint
): void {
    const basis = checkedAdd(idleBalance, totalTradingDeployed);
    const deployedAfter = checkedAdd(totalTradingDeployed, amount);

    if (deployedAfter * BPS_DENOMINATOR > basis * TRADING_ALLOCATION_BPS) {
        throw new VaultError('ExceedsDeploymentLimit', 'deployment would exceed the 90% allocation ceiling', {
            amount,
            idleBalance,
            totalTradingDeployed,
            maxDeployable: computeMaxDeployable(idleBalance, totalTradingDeployed),
        });
    }
}

/**
 * Principal portion of a capital return
 */
export function computePrincipalReturned(amountReturned: bigint, realizedPnl: bigint): bigint {
    const principal = amountReturned - realizedPnl;
    if (principal < 0n) {
        throw new VaultError('InvalidAmount', 'realized PnL exceeds the amount returned', {
            amountReturned,
            realizedPnl,
        });
    }
    return principal;
}

/**
 * Deployed principal as a share of idle + deployed principal, in bps
 */
export function computeDeploymentRatioBps(idleBalance: bigint, totalTradingDeployed: bigint): number {
    const basis = idleBalance + totalTradingDeployed;
    if (basis === 0n) return 0;
    return Number((totalTradingDeployed * BPS_DENOMINATOR) / basis);
}
