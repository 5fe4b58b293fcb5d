/**
 * Fixed-Point Math
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * All monetary values are unsigned bigint micro-units (1e6 scale).
 * Stored values live in the u64 range; products are computed in the u128 range.
 * Every helper throws Overflow instead of wrapping or truncating.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import BigNumber from 'bignumber.js';
import { VAULT_CONFIG } from '../config/constants';
import { VaultError } from '../core/errors';

const { U64_MAX, U128_MAX, AMOUNT_DECIMALS } = VAULT_CONFIG;

const toBigNumber = (value: string | number | bigint): BigNumber => {
    return new BigNumber(typeof value === 'bigint' ? value.toString() : value);
};

function overflow(op: string, a: bigint, b: bigint): VaultError {
    return new VaultError('Overflow', `checked ${op} out of range`, { a, b });
}

/**
 * Assert a value fits the stored u64 range
 */
export function assertU64(value: bigint, label: string = 'value'): bigint {
    if (value < 0n || value > U64_MAX) {
        throw new VaultError('Overflow', `${label} outside u64 range`, { [label]: value });
    }
    return value;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
    const result = a + b;
    if (a < 0n || b < 0n || result > U64_MAX) throw overflow('add', a, b);
    return result;
}

export function checkedSub(a: bigint, b: bigint): bigint {
    if (a < 0n || b < 0n || b > a) throw overflow('sub', a, b);
    return a - b;
}

export function saturatingSub(a: bigint, b: bigint): bigint {
    return b >= a ? 0n : a - b;
}

/**
 * floor(a * b / denominator), with the product held in the u128 range
 * and the quotient narrowed back to u64
 */
export function mulDivFloor(a: bigint, b: bigint, denominator: bigint): bigint {
    if (a < 0n || b < 0n) throw overflow('mul', a, b);
    if (denominator <= 0n) throw new VaultError('Overflow', 'division by zero', { a, b });
    const product = a * b;
    if (product > U128_MAX) throw overflow('mul', a, b);
    return assertU64(product / denominator, 'quotient');
}

/**
 * ceil(a * b / denominator)
 */
export function mulDivCeil(a: bigint, b: bigint, denominator: bigint): bigint {
    const floor = mulDivFloor(a, b, denominator);
    return (a * b) % denominator === 0n ? floor : checkedAdd(floor, 1n);
}

// ═══════════════════════════════════════════════════════════════════════════════
// DECIMAL CONVERSION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Parse a human decimal amount ("100.5") into micro-units (100500000n).
 * Rejects negatives, non-numbers and anything finer than 6 decimals.
 */
export function parseAmount(value: string | number): bigint {
    const parsed = toBigNumber(value);
    if (!parsed.isFinite() || parsed.isNegative()) {
        throw new VaultError('InvalidAmount', `not a non-negative amount: ${String(value)}`);
    }
    if ((parsed.decimalPlaces() ?? 0) > AMOUNT_DECIMALS) {
        throw new VaultError('InvalidAmount', `more than ${AMOUNT_DECIMALS} decimals: ${String(value)}`);
    }
    return assertU64(BigInt(parsed.shiftedBy(AMOUNT_DECIMALS).toFixed(0)), 'amount');
}

/**
 * Parse a signed decimal amount, used for PnL values
 */
export function parseSignedAmount(value: string | number): bigint {
    const parsed = toBigNumber(value);
    if (parsed.isNegative()) {
        return -parseAmount(parsed.negated().toFixed());
    }
    return parseAmount(parsed.toFixed());
}

/**
 * Format micro-units as a fixed 6-decimal string (106750000n → "106.750000")
 */
export function formatAmount(micro: bigint): string {
    return toBigNumber(micro).shiftedBy(-AMOUNT_DECIMALS).toFixed(AMOUNT_DECIMALS);
}
