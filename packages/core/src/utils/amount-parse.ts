/**
 * Monetary value parsing.
 * Returns Decimal so nothing downstream touches a binary float.
 */

import Decimal from 'decimal.js';
import { CURRENCY_SYMBOLS, MONEY_DECIMALS } from '../types/index.js';

/**
 * Decimal for summing money. The default 20 significant digits would round
 * large totals; 1000 digits keeps any realistic sum exact.
 */
export const Money = Decimal.clone({ precision: 1000 });

const CURRENCY_PATTERN = new RegExp(`[${CURRENCY_SYMBOLS.map(escapeClassChar).join('')}]`, 'g');

const PLAIN_DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

const DECIMAL_STRING = /^-?\d+(\.\d+)?$/;

/**
 * Parse an amount cell.
 *
 * Numbers pass through. Text has whitespace, currency symbols and
 * thousands separators removed; accounting parentheses mean negative.
 * Whatever remains must be a plain decimal.
 */
export function parseAmountValue(value: unknown): Decimal | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? normalizeZero(new Decimal(value)) : null;
    }
    if (typeof value !== 'string') {
        return null;
    }

    let text = value
        .replace(/\s+/g, '')
        .replace(CURRENCY_PATTERN, '')
        .replace(/,/g, '');

    let negative = false;
    const parenthesized = text.match(/^\((.*)\)$/);
    if (parenthesized) {
        negative = true;
        text = parenthesized[1];
        if (/^[+-]/.test(text)) return null;
    }

    if (!PLAIN_DECIMAL.test(text)) {
        return null;
    }

    const amount = new Decimal(text);
    return normalizeZero(negative ? amount.negated() : amount);
}

/**
 * Plain decimal string for storage: no exponent, no trailing zeros.
 */
export function toDecimalString(amount: Decimal): string {
    return amount.toFixed();
}

/**
 * Round half-up to two places for output.
 */
export function formatMoney(amount: Decimal): string {
    const rounded = amount.toDecimalPlaces(MONEY_DECIMALS, Decimal.ROUND_HALF_UP);
    return normalizeZero(rounded).toFixed(MONEY_DECIMALS);
}

/**
 * True when the value is a stored decimal string (what the cleaner emits).
 */
export function isDecimalString(value: unknown): value is string {
    return typeof value === 'string' && DECIMAL_STRING.test(value);
}

function normalizeZero(amount: Decimal): Decimal {
    return amount.isZero() ? new Decimal(0) : amount;
}

function escapeClassChar(char: string): string {
    return char.replace(/[\\\]^-]/g, '\\$&');
}
