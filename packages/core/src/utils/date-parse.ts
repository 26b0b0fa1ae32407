/**
 * Permissive date parsing for transaction exports.
 * All dates returned as UTC (00:00:00Z).
 *
 * Ambiguous numeric dates (01/05/2024) are always month/day/year.
 */

import { TWO_DIGIT_YEAR_BASE } from '../types/index.js';

const MONTH_NAMES = [
    'january', 'february', 'march', 'april', 'may', 'june',
    'july', 'august', 'september', 'october', 'november', 'december',
];

// Years that format as four digits and parse back unchanged
const MIN_YEAR = 100;
const MAX_YEAR = 9999;

// Excel serials for 1900-01-01 and 9999-12-31
const EXCEL_SERIAL_MIN = 1;
const EXCEL_SERIAL_MAX = 2958465;

/**
 * Parse a date value (Date object, Excel serial, or free-form string).
 * Returns null when the value cannot be read as a calendar date.
 */
export function parseDateValue(value: unknown): Date | null {
    if (value instanceof Date) {
        return isValidDate(value) && isSupportedYear(value.getUTCFullYear()) ? value : null;
    }
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) return null;
        if (value >= EXCEL_SERIAL_MIN && value <= EXCEL_SERIAL_MAX) {
            return excelSerialToDate(value);
        }
        // 20240105 and the like
        return parseDateString(String(value));
    }
    if (typeof value === 'string') {
        return parseDateString(value);
    }
    return null;
}

/**
 * Try each supported string layout in turn.
 */
export function parseDateString(value: string): Date | null {
    const text = value.trim();
    if (text === '') return null;

    return parseIsoDate(text)
        ?? parseCompactDate(text)
        ?? parseMdyDate(text)
        ?? parseMonthNameDate(text);
}

/**
 * Parse YYYY-MM-DD (optionally followed by a time), YYYY/MM/DD or YYYY.MM.DD.
 * The time part is ignored; the calendar date is taken as written.
 */
export function parseIsoDate(value: string): Date | null {
    const match = value.match(
        /^(\d{4})([-/.])(\d{1,2})\2(\d{1,2})(?:[T ]\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/
    );
    if (!match) return null;

    return buildUtcDate(parseInt(match[1], 10), parseInt(match[3], 10), parseInt(match[4], 10));
}

/**
 * Parse YYYYMMDD.
 */
export function parseCompactDate(value: string): Date | null {
    const match = value.match(/^(\d{4})(\d{2})(\d{2})$/);
    if (!match) return null;

    return buildUtcDate(parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10));
}

/**
 * Parse M/D/YYYY, M-D-YYYY or M.D.YYYY. Two-digit years are 20YY.
 */
export function parseMdyDate(value: string): Date | null {
    const match = value.match(/^(\d{1,2})([/.-])(\d{1,2})\2(\d{4}|\d{2})$/);
    if (!match) return null;

    const month = parseInt(match[1], 10);
    const day = parseInt(match[3], 10);
    const year = expandYear(match[4]);

    return buildUtcDate(year, month, day);
}

/**
 * Parse "Jan 5, 2024", "January 5th 2024", "5 Jan 2024" or "05-Jan-24".
 */
export function parseMonthNameDate(value: string): Date | null {
    const monthFirst = value.match(/^([a-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/i);
    if (monthFirst) {
        const month = monthFromName(monthFirst[1]);
        if (month === null) return null;
        return buildUtcDate(parseInt(monthFirst[3], 10), month, parseInt(monthFirst[2], 10));
    }

    const dayFirst = value.match(/^(\d{1,2})(?:st|nd|rd|th)?[\s-]+([a-z]+)\.?,?[\s-]+(\d{4}|\d{2})$/i);
    if (dayFirst) {
        const month = monthFromName(dayFirst[2]);
        if (month === null) return null;
        return buildUtcDate(expandYear(dayFirst[3]), month, parseInt(dayFirst[1], 10));
    }

    return null;
}

/**
 * Convert Excel serial date to JavaScript Date (UTC).
 */
export function excelSerialToDate(serial: number): Date {
    // Excel serial: days since 1899-12-30. Fractions are time of day.
    const days = Math.floor(serial);
    const utcDays = days - 25569; // Adjust to Unix epoch
    return new Date(utcDays * 86400 * 1000);
}

/**
 * Format Date as ISO YYYY-MM-DD string (UTC).
 */
export function formatIsoDate(date: Date): string {
    const year = String(date.getUTCFullYear()).padStart(4, '0');
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * Check if date is valid.
 */
export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}

function isSupportedYear(year: number): boolean {
    return year >= MIN_YEAR && year <= MAX_YEAR;
}

function expandYear(text: string): number {
    const year = parseInt(text, 10);
    return text.length === 2 ? TWO_DIGIT_YEAR_BASE + year : year;
}

function monthFromName(name: string): number | null {
    const lower = name.toLowerCase();
    if (lower.length < 3) return null;
    const index = MONTH_NAMES.findIndex((full) => full.startsWith(lower));
    return index === -1 ? null : index + 1;
}

/**
 * Build a UTC date, rejecting overflow such as Feb 30 or month 13.
 */
function buildUtcDate(year: number, month: number, day: number): Date | null {
    if (!isSupportedYear(year) || month < 1 || month > 12 || day < 1) return null;

    const date = new Date(Date.UTC(year, month - 1, day));
    if (!isValidDate(date)) return null;

    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return date;
}
