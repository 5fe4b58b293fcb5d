// Configuration Constants for the Pooled Treasury Ledger

export const VAULT_CONFIG = {
    // Fixed-point scale
    AMOUNT_DECIMALS: 6,
    AMOUNT_SCALE: 1_000_000n,

    // Fees
    DEFAULT_PERFORMANCE_FEE_BPS: 2500, // 25%
    BPS_DENOMINATOR: 10_000n,
    MAX_FEE_BPS: 10_000,

    // Deployment ceiling (share of idle + deployed principal)
    TRADING_ALLOCATION_BPS: 9000n, // 90%

    // ═══════════════════════════════════════════════════════════════════════════
    // VALUATION FRESHNESS
    // Reports outside the tolerance window are rejected outright; marks older
    // than the staleness threshold are only flagged on reads
    // ═══════════════════════════════════════════════════════════════════════════
    VALUATION_TOLERANCE_SECONDS: 5 * 60, // 5 minutes
    STALE_VALUATION_SECONDS: 24 * 60 * 60, // 24 hours

    // Integer bounds
    U64_MAX: (1n << 64n) - 1n,
    U128_MAX: (1n << 128n) - 1n,
} as const;

export const TABLES = {
    STATE: 'vault_state',
    EVENTS: 'vault_events',
    LOGS: 'vault_logs',
} as const;

export const STATE_ROW_ID = 1;
