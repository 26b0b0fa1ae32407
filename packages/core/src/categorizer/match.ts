/**
 * Whole-word keyword matching.
 *
 * A keyword matches only where neither neighbour of the matched phrase is
 * a letter or digit: "rent" matches "rent due" but not "a different plan".
 * Spaces inside a phrase match any run of whitespace.
 */

const WORD_CHAR = '[\\p{L}\\p{N}]';

/**
 * Compile a normalized keyword into its boundary-anchored matcher.
 * Matching is case-insensitive; descriptions are lower-cased first anyway.
 *
 * @param keyword - Keyword already passed through normalizeDescription
 */
export function compileKeyword(keyword: string): RegExp {
    const phrase = keyword
        .split(' ')
        .filter((part) => part !== '')
        .map(escapeRegExp)
        .join('\\s+');
    return new RegExp(`(?<!${WORD_CHAR})${phrase}(?!${WORD_CHAR})`, 'iu');
}

/**
 * Test a normalized description against a compiled keyword.
 */
export function matchesKeyword(normalizedDesc: string, pattern: RegExp): boolean {
    return pattern.test(normalizedDesc);
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
