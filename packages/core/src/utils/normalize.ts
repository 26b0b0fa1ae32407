/**
 * Text normalization for matching and header lookup.
 */

/**
 * Normalize a description for keyword matching.
 *
 * Transformations:
 * - Convert to lowercase
 * - Collapse multiple whitespace to single space
 * - Trim leading/trailing whitespace
 */
export function normalizeDescription(raw: string): string {
    return raw
        .toLowerCase()
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Normalize a column header for required-column lookup.
 */
export function normalizeColumnName(raw: string): string {
    return stripBom(raw).trim().toLowerCase();
}

/**
 * Strip UTF-8 Byte Order Mark (BOM) from a string if present.
 * BOM (\uFEFF) can interfere with column header matching in CSVs.
 */
export function stripBom(value: string): string {
    if (value.startsWith('\uFEFF')) {
        return value.slice(1);
    }
    return value;
}
