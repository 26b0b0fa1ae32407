/**
 * Transaction categorization by ordered keyword table.
 *
 * First match wins: categories in table order, keywords in declared
 * order. When two categories both list a matching keyword the earlier
 * category is chosen. No match -> "Uncategorized".
 *
 * ARCHITECTURAL NOTE: No console.* calls. No state between calls.
 */

import { normalizeDescription } from '../utils/normalize.js';
import { isDecimalString } from '../utils/amount-parse.js';
import { assertStatus } from '../records/status.js';
import { StateError, UNCATEGORIZED_CATEGORY } from '../types/index.js';
import type { CategorizedTransaction } from '../types/index.js';
import type { CategorizedRecordSet, CleanedRecordSet } from '../records/types.js';
import type { KeywordTable } from '../keywords/types.js';
import { matchesKeyword } from './match.js';
import type { CategorizationResult, CategorizationStats, CategorizeAllResult } from './types.js';

/**
 * Categorize a single description.
 *
 * @param description - Transaction description (any case)
 * @param table - Keyword table
 * @returns The chosen category and the keyword that matched
 */
export function categorize(description: string, table: KeywordTable): CategorizationResult {
    const desc = normalizeDescription(description);

    for (const entry of table.categories) {
        for (const rule of entry.keywords) {
            if (matchesKeyword(desc, rule.pattern)) {
                return { category: entry.category, keyword: rule.keyword };
            }
        }
    }

    return { category: UNCATEGORIZED_CATEGORY, keyword: null };
}

/**
 * Categorize every record of a cleaned set.
 *
 * Returns a new categorized set; other fields are copied untouched and
 * record order is kept. A categorized set may be passed to recategorize
 * against another table.
 *
 * @throws StateError if the set was not cleaned or holds an invalid amount
 */
export function categorizeAll(
    set: CleanedRecordSet | CategorizedRecordSet,
    table: KeywordTable
): CategorizeAllResult {
    assertStatus(set, ['cleaned', 'categorized'], 'categorizeAll');

    const stats: CategorizationStats = {
        total: set.records.length,
        byCategory: {},
        uncategorized: 0,
    };

    const records: CategorizedTransaction[] = [];
    set.records.forEach((txn, index) => {
        if (!isDecimalString(txn.amount)) {
            throw new StateError(
                `categorizeAll: record ${index} has non-numeric amount "${String(txn.amount)}"; clean the records first`
            );
        }

        const { category } = categorize(txn.description, table);
        records.push({
            date: txn.date,
            description: txn.description,
            amount: txn.amount,
            extras: txn.extras,
            category,
        });

        stats.byCategory[category] = (stats.byCategory[category] ?? 0) + 1;
        if (category === UNCATEGORIZED_CATEGORY) {
            stats.uncategorized++;
        }
    });

    return { records: { status: 'categorized', records }, stats };
}
