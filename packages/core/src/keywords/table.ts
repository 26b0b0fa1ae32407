/**
 * Keyword Table: ordered, immutable category -> keywords configuration.
 *
 * Declaration order is the tie-break order of the categorizer, so it is
 * preserved exactly from the input. Tables are built once and passed in;
 * there is no global table.
 */

import type { ZodError } from 'zod';
import {
    ConfigError,
    KeywordEntryListSchema,
    KeywordPairListSchema,
    KeywordMapSchema,
} from '../types/index.js';
import type { KeywordEntry, KeywordTableInput } from '../types/index.js';
import { normalizeDescription } from '../utils/normalize.js';
import { compileKeyword } from '../categorizer/match.js';
import type { KeywordCategory, KeywordRule, KeywordTable } from './types.js';

/**
 * Validate and normalize untrusted input (e.g. parsed YAML) into the
 * ordered entry form.
 *
 * @throws ConfigError describing every schema issue
 */
export function parseKeywordTableInput(value: unknown): KeywordEntry[] {
    if (!Array.isArray(value)) {
        if (typeof value === 'object' && value !== null) {
            // Names are trimmed by the schema; a collision would silently merge
            assertUniqueCategories(Object.keys(value).map((key) => key.trim()));
        }
        const result = KeywordMapSchema.safeParse(value);
        if (!result.success) throw invalidTable(result.error);
        return Object.entries(result.data).map(([category, keywords]) => ({ category, keywords }));
    }

    // Pair form when every element is itself a list
    if (value.length > 0 && value.every((entry) => Array.isArray(entry))) {
        const result = KeywordPairListSchema.safeParse(value);
        if (!result.success) throw invalidTable(result.error);
        return result.data.map(([category, keywords]) => ({ category, keywords }));
    }

    const result = KeywordEntryListSchema.safeParse(value);
    if (!result.success) throw invalidTable(result.error);
    return result.data;
}

/**
 * Build a frozen keyword table.
 *
 * Keywords are lower-cased with whitespace collapsed; repeats within a
 * category are dropped (the first one already wins).
 *
 * @throws ConfigError on invalid input or duplicate category names
 */
export function createKeywordTable(input: KeywordTableInput): KeywordTable {
    const entries = parseKeywordTableInput(input);

    assertUniqueCategories(entries.map((entry) => entry.category));

    const categories: KeywordCategory[] = [];
    for (const entry of entries) {
        const rules: KeywordRule[] = [];
        const keywords = new Set<string>();
        for (const raw of entry.keywords) {
            const keyword = normalizeDescription(raw);
            if (keywords.has(keyword)) continue;
            keywords.add(keyword);
            rules.push(Object.freeze({ keyword, pattern: compileKeyword(keyword) }));
        }

        categories.push(Object.freeze({
            category: entry.category,
            keywords: Object.freeze(rules),
        }));
    }

    return Object.freeze({ categories: Object.freeze(categories) });
}

/**
 * Category names in declaration order.
 */
export function categoryNames(table: KeywordTable): string[] {
    return table.categories.map((entry) => entry.category);
}

/**
 * Plain, serializable form of a table (the input it could be rebuilt from).
 */
export function keywordTableToEntries(table: KeywordTable): KeywordEntry[] {
    return table.categories.map((entry) => ({
        category: entry.category,
        keywords: entry.keywords.map((rule) => rule.keyword),
    }));
}

function assertUniqueCategories(names: string[]): void {
    const seen = new Set<string>();
    for (const name of names) {
        if (seen.has(name)) {
            throw new ConfigError(`Duplicate category in keyword table: "${name}"`);
        }
        seen.add(name);
    }
}

function invalidTable(err: ZodError): ConfigError {
    const issues = err.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
    return new ConfigError(`Invalid keyword table: ${issues}`, { cause: err });
}
