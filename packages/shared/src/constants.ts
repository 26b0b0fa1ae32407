/**
 * Constants for LedgerLens.
 */

/**
 * Category assigned when no keyword in the table matches a description.
 */
export const UNCATEGORIZED_CATEGORY = 'Uncategorized';

/**
 * Columns every tabular source must carry. Matched case-insensitively
 * against the source header after trimming.
 */
export const REQUIRED_COLUMNS = ['date', 'description', 'amount'] as const;

/**
 * Currency symbols stripped from textual amounts before parsing.
 */
export const CURRENCY_SYMBOLS = ['$', '€', '£', '¥', '₹', '₩'] as const;

/**
 * Money output precision. Sums are kept exact and rounded half-up
 * to this many places only when a summary is produced.
 */
export const MONEY_DECIMALS = 2;

/**
 * Two-digit years in dates are read as 20YY.
 */
export const TWO_DIGIT_YEAR_BASE = 2000;

/**
 * Stable error codes carried by every LedgerLensError.
 */
export const ERROR_CODES = {
    SOURCE_UNAVAILABLE: 'SOURCE_UNAVAILABLE',
    SCHEMA: 'SCHEMA',
    STATE: 'STATE',
    CONFIG: 'CONFIG',
} as const;
