/**
 * Capital Module
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Unified exports for share, fee, deployment and valuation math.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

// Share Ledger
export {
    computePoolValue,
    computeSharesToMint,
    computeRedemptionPayout,
    computeSharesToBurn,
    computeNavPerShare,
} from './shareLedger';

// Fees
export { isValidFeeBps, computePerformanceFee } from './fees';

// Deployment Ceiling
export {
    computeMaxDeployable,
    assertWithinDeploymentLimit,
    computePrincipalReturned,
    computeDeploymentRatioBps,
} from './deployment';

// Valuation Oracle Gate
export {
    VALUATION_CONFIG,
    validateValuationReport,
    admitValuation,
    isValuationStale,
} from './valuationGate';

export type { AdmittedValuation } from './valuationGate';

// Invariants
export { checkVaultInvariants, assertVaultInvariants } from './invariants';
