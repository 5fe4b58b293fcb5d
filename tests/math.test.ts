/**
 * Fixed-Point Math Tests
 */

import { VAULT_CONFIG } from '../src/config/constants';
import {
    assertU64,
    checkedAdd,
    checkedSub,
    formatAmount,
    mulDivCeil,
    mulDivFloor,
    parseAmount,
    parseSignedAmount,
    saturatingSub,
} from '../src/utils/math';
import { thrownCode as codeOf } from './fixtures';

const { U64_MAX } = VAULT_CONFIG;

describe('checked arithmetic', () => {
    test('checkedAdd stays within u64', () => {
        expect(checkedAdd(2n, 3n)).toBe(5n);
        expect(checkedAdd(U64_MAX - 1n, 1n)).toBe(U64_MAX);
        expect(codeOf(() => checkedAdd(U64_MAX, 1n))).toBe('Overflow');
    });

    test('checkedSub rejects underflow', () => {
        expect(checkedSub(9n, 4n)).toBe(5n);
        expect(codeOf(() => checkedSub(1n, 2n))).toBe('Overflow');
    });

    test('saturatingSub floors at zero', () => {
        expect(saturatingSub(9n, 5n)).toBe(4n);
        expect(saturatingSub(5n, 9n)).toBe(0n);
    });

    test('assertU64 rejects negatives and values past the range', () => {
        expect(assertU64(U64_MAX)).toBe(U64_MAX);
        expect(codeOf(() => assertU64(-1n))).toBe('Overflow');
        expect(codeOf(() => assertU64(U64_MAX + 1n))).toBe('Overflow');
    });
});

describe('mulDiv', () => {
    test('floor and ceil round in opposite directions', () => {
        expect(mulDivFloor(10n, 3n, 4n)).toBe(7n);
        expect(mulDivCeil(10n, 3n, 4n)).toBe(8n);
        expect(mulDivCeil(8n, 3n, 4n)).toBe(6n);
    });

    test('wide intermediate products are allowed when the quotient fits', () => {
        expect(mulDivFloor(U64_MAX, U64_MAX, U64_MAX)).toBe(U64_MAX);
    });

    test('a quotient past u64 overflows', () => {
        expect(codeOf(() => mulDivFloor(U64_MAX, U64_MAX, 1n))).toBe('Overflow');
    });

    test('division by zero is an overflow, not a crash', () => {
        expect(codeOf(() => mulDivFloor(1n, 1n, 0n))).toBe('Overflow');
    });
});

describe('decimal conversion', () => {
    test('parseAmount converts human decimals to micro-units', () => {
        expect(parseAmount('100.5')).toBe(100_500_000n);
        expect(parseAmount(2.25)).toBe(2_250_000n);
        expect(parseAmount('0.000001')).toBe(1n);
        expect(parseAmount('0')).toBe(0n);
    });

    test('parseAmount rejects negatives, junk and sub-micro precision', () => {
        expect(codeOf(() => parseAmount('-1'))).toBe('InvalidAmount');
        expect(codeOf(() => parseAmount('abc'))).toBe('InvalidAmount');
        expect(codeOf(() => parseAmount('0.0000001'))).toBe('InvalidAmount');
    });

    test('parseSignedAmount keeps the sign', () => {
        expect(parseSignedAmount('-9.5')).toBe(-9_500_000n);
        expect(parseSignedAmount('9.5')).toBe(9_500_000n);
    });

    test('formatAmount renders six decimals', () => {
        expect(formatAmount(106_750_000n)).toBe('106.750000');
        expect(formatAmount(1n)).toBe('0.000001');
        expect(formatAmount(0n)).toBe('0.000000');
    });
});
