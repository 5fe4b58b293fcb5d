import { VAULT_CONFIG } from '../config/constants';
import { mulDivFloor } from '../utils/math';

export function isValidFeeBps(bps: number): boolean {
    return Number.isInteger(bps) && bps >= 0 && bps <= VAULT_CONFIG.MAX_FEE_BPS;
}

/**
 * floor(profit * bps / 10000); losses and zero profit carry no fee
 */
export function computePerformanceFee(profit: bigint, performanceFeeBps: number): bigint {
    if (profit <= 0n) return 0n;
    return mulDivFloor(profit, BigInt(performanceFeeBps), VAULT_CONFIG.BPS_DENOMINATOR);
}
