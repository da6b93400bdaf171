/**
 * Fixed-Point Math Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Integer mul/div with explicit rounding, basis points, and the bignumber.js
 * conversions between base units and decimal strings.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { ValidationError } from '../src/core/errors';
import {
    applyBps,
    formatUnits,
    minBigInt,
    mulDivDown,
    mulDivUp,
    parseUnits,
    percentageChange,
    subFloor,
    sumBigInt,
    unitScale,
} from '../src/utils/math';

describe('Fixed-point math', () => {
    describe('mulDiv', () => {
        test('rounds down and up as asked', () => {
            expect(mulDivDown(7n, 3n, 2n)).toBe(10n);
            expect(mulDivUp(7n, 3n, 2n)).toBe(11n);
        });

        test('exact division is the same both ways', () => {
            expect(mulDivDown(6n, 2n, 3n)).toBe(4n);
            expect(mulDivUp(6n, 2n, 3n)).toBe(4n);
        });

        test('zero denominator throws', () => {
            expect(() => mulDivDown(1n, 1n, 0n)).toThrow(RangeError);
            expect(() => mulDivUp(1n, 1n, 0n)).toThrow(RangeError);
        });
    });

    describe('basis points', () => {
        test('60% of 1000', () => {
            expect(applyBps(1000n, 6000, 10000)).toBe(600n);
        });

        test('rounds down', () => {
            // 999 * 3333 / 10000 = 332.9667
            expect(applyBps(999n, 3333, 10000)).toBe(332n);
        });
    });

    test('helpers', () => {
        expect(subFloor(5n, 7n)).toBe(0n);
        expect(subFloor(7n, 5n)).toBe(2n);
        expect(minBigInt(3n, 9n)).toBe(3n);
        expect(sumBigInt([1n, 2n, 3n])).toBe(6n);
        expect(unitScale(6)).toBe(1_000_000n);
    });

    describe('decimal conversion', () => {
        test('formatUnits', () => {
            expect(formatUnits(1_500_000n, 6)).toBe('1.5');
            expect(formatUnits(1n, 6)).toBe('0.000001');
            expect(formatUnits(0n, 6)).toBe('0');
            expect(formatUnits(1_060_000_000n, 6)).toBe('1060');
        });

        test('parseUnits truncates below one unit', () => {
            expect(parseUnits('1.5', 6)).toBe(1_500_000n);
            expect(parseUnits('0.0000019', 6)).toBe(1n);
            expect(parseUnits(250, 6)).toBe(250_000_000n);
        });

        test('parseUnits rejects negative and non-numeric input', () => {
            expect(() => parseUnits('-1', 6)).toThrow(ValidationError);
            expect(() => parseUnits('abc', 6)).toThrow('[INVALID_AMOUNT]');
        });

        test('percentageChange', () => {
            expect(percentageChange(1060n, 1000n)).toBe('6.00');
            expect(percentageChange(900n, 1000n)).toBe('-10.00');
            expect(percentageChange(5n, 0n)).toBe('0.00');
        });
    });
});
