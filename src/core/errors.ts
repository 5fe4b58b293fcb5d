/**
 * Vault Errors
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Every rejected operation throws exactly one VaultError. The error aborts the
 * whole transaction: the draft state is discarded and no event is published.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export type VaultErrorCategory =
    | 'AuthorizationError'
    | 'StateError'
    | 'ArithmeticError'
    | 'LiquidityError'
    | 'ValuationError'
    | 'InvariantError';

export const VAULT_ERROR_CATEGORIES = {
    Unauthorized: 'AuthorizationError',

    AlreadyInitialized: 'StateError',
    NotInitialized: 'StateError',
    Paused: 'StateError',
    ZeroAmount: 'StateError',
    ZeroShares: 'StateError',
    InvalidAmount: 'StateError',
    InvalidFeeBps: 'StateError',
    PositionAlreadyExists: 'StateError',
    PositionNotFound: 'StateError',
    InsufficientShares: 'StateError',
    NothingToSweep: 'StateError',
    SlippageExceeded: 'StateError',
    UndefinedNav: 'StateError',
    ReturnExceedsDeployed: 'StateError',

    Overflow: 'ArithmeticError',

    InsufficientLiquidity: 'LiquidityError',
    ExceedsDeploymentLimit: 'LiquidityError',

    InvalidValuation: 'ValuationError',
    NonMonotonicValuation: 'ValuationError',
    StaleValuation: 'ValuationError',

    InvariantViolation: 'InvariantError',
} as const satisfies Record<string, VaultErrorCategory>;

export type VaultErrorCode = keyof typeof VAULT_ERROR_CATEGORIES;

export type VaultErrorContext = Record<string, string | number | boolean | bigint | null>;

export class VaultError extends Error {
    public readonly category: VaultErrorCategory;

    constructor(
        public readonly code: VaultErrorCode,
        message: string,
        public readonly context: VaultErrorContext = {}
    ) {
        super(`[${code}] ${message}`);
        this.name = 'VaultError';
        this.category = VAULT_ERROR_CATEGORIES[code];
    }
}

export function isVaultError(err: unknown): err is VaultError {
    return err instanceof VaultError;
}

/**
 * Throw a VaultError unless the condition holds
 */
export function ensure(
    condition: boolean,
    code: VaultErrorCode,
    message: string,
    context: VaultErrorContext = {}
): asserts condition {
    if (!condition) {
        throw new VaultError(code, message, context);
    }
}
