/**
 * Per-category breakdown.
 */

import type Decimal from 'decimal.js';
import { Money, formatMoney } from '../utils/amount-parse.js';
import { MONEY_DECIMALS, StateError } from '../types/index.js';
import type { CategorySummaryRow } from '../types/index.js';
import type { CategorizedRecordSet, CleanedRecordSet } from '../records/types.js';

/**
 * Group records by category and total them.
 *
 * Rows are sorted ascending by the reported (rounded) total, most negative
 * first; equal totals keep the order in which their categories were first
 * seen.
 * An empty set yields an empty list.
 *
 * @throws StateError if a non-empty set was never categorized
 */
export function summarizeByCategory(set: CleanedRecordSet | CategorizedRecordSet): CategorySummaryRow[] {
    if (set.records.length === 0) {
        return [];
    }
    if (set.status !== 'categorized') {
        throw new StateError(
            `summarizeByCategory requires a categorized record set, got "${set.status}"`
        );
    }

    const groups = new Map<string, { total: Decimal; count: number }>();
    for (const txn of set.records) {
        if (typeof txn.category !== 'string' || txn.category === '') {
            throw new StateError('summarizeByCategory: record without a category; categorize the records first');
        }
        const group = groups.get(txn.category) ?? { total: new Money(0), count: 0 };
        group.total = group.total.plus(new Money(txn.amount));
        group.count++;
        groups.set(txn.category, group);
    }

    const rows = [...groups.entries()].map(([category, group]) => ({
        category,
        total: group.total.toDecimalPlaces(MONEY_DECIMALS, Money.ROUND_HALF_UP),
        count: group.count,
    }));

    // Array.prototype.sort is stable: ties keep first-seen order
    return rows
        .sort((a, b) => a.total.comparedTo(b.total))
        .map((row) => ({
            category: row.category,
            total_amount: formatMoney(row.total),
            count: row.count,
        }));
}
