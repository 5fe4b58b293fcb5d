// Type Definitions for the Pooled Treasury Ledger

// ═══════════════════════════════════════════════════════════════════════════════
// CORE STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Opaque caller identity (wallet address, service principal, ...)
 */
export type Identity = string;

/**
 * Protocol-wide singleton. All monetary fields are 1e6 fixed-point micro-units.
 */
export interface ProtocolConfig {
    admin: Identity;
    operator: Identity;
    feeRecipient: Identity;
    treasury: string;

    totalShares: bigint;
    totalTradingDeployed: bigint;       // principal currently off-ledger
    accumulatedFees: bigint;            // realized, unswept performance fees
    performanceFeeBps: number;          // 0-10000
    isPaused: boolean;
    lastFeeSweep: number;               // unix seconds, 0 = never

    deployedCurrentValue: bigint;       // latest mark of deployed capital
    lastValuationTimestamp: number;     // unix seconds, 0 = never
    lastDeploymentTimestamp: number;    // unix seconds, 0 = never
    pendingUnrealizedFees: bigint;      // marker only, never deducted from NAV

    initializedAt: number;
}

export interface UserPosition {
    owner: Identity;
    shares: bigint;
    depositedAmount: bigint;
    withdrawnAmount: bigint;
    createdAt: number;
    lastActivityAt: number;
}

/**
 * Custodial balance of idle (undeployed) funds
 */
export interface TreasuryAccount {
    id: string;
    balance: bigint;
}

export interface VaultState {
    config: ProtocolConfig | null;
    positions: Map<Identity, UserPosition>;
    treasury: TreasuryAccount;
}

// ═══════════════════════════════════════════════════════════════════════════════
// OPERATION INPUTS
// ═══════════════════════════════════════════════════════════════════════════════

export interface InitializeProtocolParams {
    admin: Identity;
    operator: Identity;
    performanceFeeBps: number;
    feeRecipient?: Identity;
}

/**
 * Mark-to-market record produced by the off-chain valuation reporter
 */
export interface ValuationReport {
    deploymentId: string;
    orcaPositionsValue: bigint;
    driftEquityValue: bigint;
    uncollectedFees: bigint;
    unrealizedPnl: bigint;              // signed
    timestamp: number;                  // unix seconds
}

// ═══════════════════════════════════════════════════════════════════════════════
// OPERATION RESULTS / VIEWS
// ═══════════════════════════════════════════════════════════════════════════════

export interface DepositResult {
    sharesMinted: bigint;
    totalShares: bigint;
}

export interface WithdrawResult {
    payout: bigint;
    sharesBurned: bigint;
    remainingShares: bigint;
}

export interface ReturnCapitalResult {
    principalReturned: bigint;
    feeAccrued: bigint;
}

export interface UserBalance {
    balance: bigint;
    stale: boolean;
}

export interface ProtocolStats {
    tvl: bigint;
    idleBalance: bigint;
    totalTradingDeployed: bigint;
    deployedCurrentValue: bigint;
    accumulatedFees: bigint;
    pendingUnrealizedFees: bigint;
    totalShares: bigint;
    navPerShare: bigint | null;         // 1e6-scaled value of one whole share unit
    maxDeployable: bigint;
    deploymentRatioBps: number;
    isPaused: boolean;
    lastValuationTimestamp: number;
    valuationStale: boolean;
}

export interface UserStats {
    owner: Identity;
    shares: bigint;
    balance: bigint;
    depositedAmount: bigint;
    withdrawnAmount: bigint;
    stale: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════════
// EVENTS
// ═══════════════════════════════════════════════════════════════════════════════

export type VaultEventPayload =
    | {
        type: 'ProtocolInitialized';
        admin: Identity;
        operator: Identity;
        feeRecipient: Identity;
        performanceFeeBps: number;
    }
    | { type: 'PositionCreated'; owner: Identity }
    | {
        type: 'Deposit';
        user: Identity;
        amount: bigint;
        sharesMinted: bigint;
        treasuryBalance: bigint;
        totalShares: bigint;
    }
    | {
        type: 'Withdraw';
        user: Identity;
        amount: bigint;
        sharesBurned: bigint;
        remainingShares: bigint;
        treasuryBalance: bigint;
    }
    | {
        type: 'CapitalDeployed';
        amount: bigint;
        totalDeployed: bigint;
        treasuryRemaining: bigint;
        deployedCurrentValue: bigint;
    }
    | {
        type: 'CapitalReturned';
        amount: bigint;
        principalReturned: bigint;
        profitOrLoss: bigint;
        feeAccrued: bigint;
        totalDeployed: bigint;
        newTreasuryBalance: bigint;
    }
    | {
        type: 'ValuationUpdated';
        deploymentId: string;
        totalDeployedOriginal: bigint;
        totalDeployedCurrent: bigint;
        orcaValue: bigint;
        driftValue: bigint;
        uncollectedFees: bigint;
        unrealizedPnl: bigint;
        pendingFees: bigint;
        timestamp: number;
    }
    | { type: 'FeesSwept'; amount: bigint; recipient: Identity }
    | { type: 'PauseChanged'; isPaused: boolean }
    | { type: 'FeeRecipientChanged'; feeRecipient: Identity };

export type VaultEventType = VaultEventPayload['type'];

export type VaultEvent = VaultEventPayload & {
    id: string;
    emittedAt: number;
};

/**
 * Seconds-resolution clock, injectable for tests
 */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);
