import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import {
    parseAmountValue,
    toDecimalString,
    formatMoney,
    isDecimalString,
} from '../../src/utils/amount-parse.js';

function stored(value: unknown): string | null {
    const amount = parseAmountValue(value);
    return amount ? toDecimalString(amount) : null;
}

describe('parseAmountValue', () => {
    it('strips currency symbols and thousands separators', () => {
        expect(stored('$2,500.00')).toBe('2500');
        expect(stored('€1,234.50')).toBe('1234.5');
        expect(stored('£ 12')).toBe('12');
        expect(stored('¥1000')).toBe('1000');
    });

    it('keeps the sign wherever it sits around the symbol', () => {
        expect(stored('-45.00')).toBe('-45');
        expect(stored('-$45.00')).toBe('-45');
        expect(stored('$-45.00')).toBe('-45');
        expect(stored('+12.5')).toBe('12.5');
    });

    it('reads accounting parentheses as negative', () => {
        expect(stored('(45.00)')).toBe('-45');
        expect(stored('($1,200.10)')).toBe('-1200.1');
    });

    it('rejects a sign inside parentheses', () => {
        expect(parseAmountValue('(-45)')).toBeNull();
    });

    it('passes finite numbers through', () => {
        expect(stored(12.5)).toBe('12.5');
        expect(stored(-95.6)).toBe('-95.6');
        expect(stored(0)).toBe('0');
    });

    it('normalizes negative zero', () => {
        expect(stored('-0.00')).toBe('0');
    });

    it('returns null for unparseable values', () => {
        expect(parseAmountValue('abc')).toBeNull();
        expect(parseAmountValue('')).toBeNull();
        expect(parseAmountValue('$')).toBeNull();
        expect(parseAmountValue('1e5')).toBeNull();
        expect(parseAmountValue('12.5.1')).toBeNull();
        expect(parseAmountValue(Number.NaN)).toBeNull();
        expect(parseAmountValue(Number.POSITIVE_INFINITY)).toBeNull();
        expect(parseAmountValue(null)).toBeNull();
        expect(parseAmountValue(undefined)).toBeNull();
    });

    it('is stable on its own output', () => {
        expect(stored(stored('$2,500.00'))).toBe('2500');
        expect(stored(stored('-95.60'))).toBe('-95.6');
    });
});

describe('formatMoney', () => {
    it('pads to two places', () => {
        expect(formatMoney(new Decimal('2359.4'))).toBe('2359.40');
        expect(formatMoney(new Decimal(0))).toBe('0.00');
    });

    it('rounds half away from zero', () => {
        expect(formatMoney(new Decimal('0.005'))).toBe('0.01');
        expect(formatMoney(new Decimal('-0.005'))).toBe('-0.01');
        expect(formatMoney(new Decimal('1.004'))).toBe('1.00');
    });

    it('never prints negative zero', () => {
        expect(formatMoney(new Decimal('-0.001'))).toBe('0.00');
    });
});

describe('isDecimalString', () => {
    it('accepts only stored decimal strings', () => {
        expect(isDecimalString('2500')).toBe(true);
        expect(isDecimalString('-95.6')).toBe(true);
        expect(isDecimalString('$1')).toBe(false);
        expect(isDecimalString('1,000')).toBe(false);
        expect(isDecimalString(12)).toBe(false);
    });
});
