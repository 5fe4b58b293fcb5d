/**
 * Vault Invariants
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Checked against the draft state before every commit. A violation aborts the
 * transaction; the committed state is never touched.
 *
 * INVARIANTS (HARD RULES):
 *   1. totalShares === sum(position.shares)
 *   2. 0 <= performanceFeeBps <= 10000
 *   3. lastValuationTimestamp never decreases
 *   4. every stored monetary value lies in the u64 range
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { VAULT_CONFIG } from '../config/constants';
import { VaultError } from '../core/errors';
import { VaultState } from '../types';
import logger from '../utils/logger';
import { isValidFeeBps } from './fees';

export interface InvariantCheckResult {
    valid: boolean;
    errors: string[];
    computed: {
        sumShares: bigint;
        positionCount: number;
    };
}

function inU64(value: bigint): boolean {
    return value >= 0n && value <= VAULT_CONFIG.U64_MAX;
}

export function checkVaultInvariants(state: VaultState, previous?: VaultState): InvariantCheckResult {
    const errors: string[] = [];

    let sumShares = 0n;
    for (const position of state.positions.values()) {
        sumShares += position.shares;
        if (!inU64(position.shares)) {
            errors.push(`position ${position.owner} shares out of range: ${position.shares}`);
        }
        if (!inU64(position.depositedAmount) || !inU64(position.withdrawnAmount)) {
            errors.push(`position ${position.owner} cumulative amounts out of range`);
        }
    }

    if (!inU64(state.treasury.balance)) {
        errors.push(`treasury balance out of range: ${state.treasury.balance}`);
    }

    const config = state.config;
    if (config) {
        // INVARIANT 1
        if (config.totalShares !== sumShares) {
            errors.push(`INVARIANT 1 VIOLATED: totalShares (${config.totalShares}) !== sum(shares) (${sumShares})`);
        }

        // INVARIANT 2
        if (!isValidFeeBps(config.performanceFeeBps)) {
            errors.push(`INVARIANT 2 VIOLATED: performanceFeeBps ${config.performanceFeeBps} out of range`);
        }

        // INVARIANT 3
        const previousTimestamp = previous?.config?.lastValuationTimestamp ?? 0;
        if (config.lastValuationTimestamp < previousTimestamp) {
            errors.push(
                `INVARIANT 3 VIOLATED: lastValuationTimestamp moved back ` +
                `${previousTimestamp} -> ${config.lastValuationTimestamp}`
            );
        }

        // INVARIANT 4
        const aggregates: Array<[string, bigint]> = [
            ['totalShares', config.totalShares],
            ['totalTradingDeployed', config.totalTradingDeployed],
            ['accumulatedFees', config.accumulatedFees],
            ['deployedCurrentValue', config.deployedCurrentValue],
            ['pendingUnrealizedFees', config.pendingUnrealizedFees],
        ];
        for (const [label, value] of aggregates) {
            if (!inU64(value)) {
                errors.push(`INVARIANT 4 VIOLATED: ${label} out of range: ${value}`);
            }
        }
    } else if (state.positions.size > 0) {
        errors.push(`positions exist before protocol initialization`);
    }

    return {
        valid: errors.length === 0,
        errors,
        computed: {
            sumShares,
            positionCount: state.positions.size,
        },
    };
}

export function assertVaultInvariants(state: VaultState, previous?: VaultState): void {
    const check = checkVaultInvariants(state, previous);
    if (check.valid) return;

    const errorMsg =
        `[LEDGER-ERROR] Invariant violation detected!\n` +
        `  Errors:\n${check.errors.map(e => `    - ${e}`).join('\n')}\n` +
        `  Computed:\n` +
        `    sumShares=${check.computed.sumShares}\n` +
        `    positionCount=${check.computed.positionCount}`;
    logger.error(errorMsg);

    throw new VaultError('InvariantViolation', check.errors.join('; '), {
        violations: check.errors.length,
    });
}
