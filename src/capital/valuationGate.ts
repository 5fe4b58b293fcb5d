/**
 * Valuation Oracle Gate
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Admits mark-to-market reports for capital currently deployed off-ledger.
 *
 * ADMISSION RULES:
 *   1. |now - report.timestamp| <= 5 minutes          → else InvalidValuation
 *   2. report.timestamp >= lastValuationTimestamp     → else NonMonotonicValuation
 *   3. position, equity and fee components are >= 0  → else InvalidValuation
 *
 * EFFECT OF AN ADMITTED REPORT:
 *   deployedCurrentValue  = orcaPositionsValue + driftEquityValue + uncollectedFees
 *   pendingUnrealizedFees = fee share of max(unrealizedPnl, 0)
 *
 * Marks move the live NAV immediately. The pending fee is a marker only:
 * performance fees are charged when gains are realized on return.
 *
 * Reads flag a mark older than 24 hours as stale while capital is deployed.
 * A deployment refreshes the mark: it tracks principal until the next report.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { VAULT_CONFIG } from '../config/constants';
import { VaultError } from '../core/errors';
import { ProtocolConfig, ValuationReport } from '../types';
import { assertU64, checkedAdd } from '../utils/math';
import { computePerformanceFee } from './fees';

export const VALUATION_CONFIG = {
    toleranceSeconds: VAULT_CONFIG.VALUATION_TOLERANCE_SECONDS,
    staleAfterSeconds: VAULT_CONFIG.STALE_VALUATION_SECONDS,
    logPrefix: '[ORACLE]',
};

export interface AdmittedValuation {
    deployedCurrentValue: bigint;
    pendingUnrealizedFees: bigint;
    timestamp: number;
}

export function validateValuationReport(
    report: ValuationReport,
    now: number,
    lastValuationTimestamp: number
): void {
    if (!Number.isSafeInteger(report.timestamp) || report.timestamp < 0) {
        throw new VaultError('InvalidValuation', 'valuation timestamp is not a unix-seconds integer', {
            timestamp: report.timestamp,
        });
    }

    const drift = Math.abs(now - report.timestamp);
    if (drift > VALUATION_CONFIG.toleranceSeconds) {
        throw new VaultError('InvalidValuation', `valuation timestamp is ${drift}s away from now`, {
            now,
            timestamp: report.timestamp,
            toleranceSeconds: VALUATION_CONFIG.toleranceSeconds,
        });
    }

    if (report.timestamp < lastValuationTimestamp) {
        throw new VaultError('NonMonotonicValuation', 'valuation is older than the last admitted one', {
            timestamp: report.timestamp,
            lastValuationTimestamp,
        });
    }

    const components: Array<[string, bigint]> = [
        ['orcaPositionsValue', report.orcaPositionsValue],
        ['driftEquityValue', report.driftEquityValue],
        ['uncollectedFees', report.uncollectedFees],
    ];
    for (const [label, value] of components) {
        if (value < 0n) {
            throw new VaultError('InvalidValuation', `${label} must not be negative`, { [label]: value });
        }
        assertU64(value, label);
    }
}

/**
 * Validate a report against the current config and compute what it sets
 */
export function admitValuation(
    report: ValuationReport,
    config: ProtocolConfig,
    now: number
): AdmittedValuation {
    validateValuationReport(report, now, config.lastValuationTimestamp);

    const deployedCurrentValue = checkedAdd(
        checkedAdd(report.orcaPositionsValue, report.driftEquityValue),
        report.uncollectedFees
    );

    const unrealizedGain = report.unrealizedPnl > 0n ? report.unrealizedPnl : 0n;
    const pendingUnrealizedFees = computePerformanceFee(
        assertU64(unrealizedGain, 'unrealizedPnl'),
        config.performanceFeeBps
    );

    return {
        deployedCurrentValue,
        pendingUnrealizedFees,
        timestamp: report.timestamp,
    };
}

/**
 * Advisory staleness flag; never blocks a read
 */
export function isValuationStale(config: ProtocolConfig, now: number): boolean {
    if (config.totalTradingDeployed === 0n) return false;
    const markedAt = Math.max(config.lastValuationTimestamp, config.lastDeploymentTimestamp);
    return now - markedAt > VALUATION_CONFIG.staleAfterSeconds;
}
