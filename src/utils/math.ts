import BigNumber from 'bignumber.js';
import { ValidationError } from '../core/errors';

// ═══════════════════════════════════════════════════════════════════════════════
// FIXED-POINT INTEGER MATH
// ═══════════════════════════════════════════════════════════════════════════════

export const mulDivDown = (a: bigint, b: bigint, denominator: bigint): bigint => {
    if (denominator === 0n) {
        throw new RangeError('mulDiv by zero');
    }
    return (a * b) / denominator;
};

export const mulDivUp = (a: bigint, b: bigint, denominator: bigint): bigint => {
    if (denominator === 0n) {
        throw new RangeError('mulDiv by zero');
    }
    const product = a * b;
    const quotient = product / denominator;
    return product % denominator === 0n ? quotient : quotient + 1n;
};

/** Basis-point share of an amount, rounded down */
export const applyBps = (amount: bigint, bps: number, denominator: number): bigint =>
    mulDivDown(amount, BigInt(bps), BigInt(denominator));

export const minBigInt = (a: bigint, b: bigint): bigint => (a < b ? a : b);

/** Saturating subtraction */
export const subFloor = (a: bigint, b: bigint): bigint => (a > b ? a - b : 0n);

export const sumBigInt = (values: Iterable<bigint>): bigint => {
    let total = 0n;
    for (const value of values) total += value;
    return total;
};

export const unitScale = (decimals: number): bigint => 10n ** BigInt(decimals);

// ═══════════════════════════════════════════════════════════════════════════════
// DECIMAL CONVERSION
// ═══════════════════════════════════════════════════════════════════════════════

export const toBigNumber = (value: bigint | string | number): BigNumber => {
    return new BigNumber(typeof value === 'bigint' ? value.toString() : value);
};

/**
 * Integer units -> decimal string (e.g. 1500000n, 6 -> "1.5")
 */
export const formatUnits = (amount: bigint, decimals: number): string => {
    return toBigNumber(amount).shiftedBy(-decimals).toFixed();
};

/**
 * Decimal string -> integer units, truncating anything below one unit.
 */
export const parseUnits = (value: string | number, decimals: number): bigint => {
    const parsed = toBigNumber(value);
    if (!parsed.isFinite() || parsed.isNegative()) {
        throw new ValidationError('INVALID_AMOUNT', `cannot parse ${String(value)} as a non-negative amount`, {
            value: String(value),
        });
    }
    return BigInt(parsed.shiftedBy(decimals).integerValue(BigNumber.ROUND_DOWN).toFixed(0));
};

/**
 * Change between two totals in percent, 2dp (0 when there is no baseline).
 */
export const percentageChange = (current: bigint, previous: bigint): string => {
    if (previous === 0n) return '0.00';
    return toBigNumber(current - previous)
        .div(toBigNumber(previous))
        .times(100)
        .toFixed(2);
};
