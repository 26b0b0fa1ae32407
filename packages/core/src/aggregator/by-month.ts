/**
 * Calendar-month breakdown, chronological.
 */

import type Decimal from 'decimal.js';
import { Money, formatMoney } from '../utils/amount-parse.js';
import { assertStatus } from '../records/status.js';
import type { MonthlySummaryRow } from '../types/index.js';
import type { CategorizedRecordSet, CleanedRecordSet } from '../records/types.js';

/**
 * @throws StateError for a raw set
 */
export function summarizeByMonth(set: CleanedRecordSet | CategorizedRecordSet): MonthlySummaryRow[] {
    assertStatus(set, ['cleaned', 'categorized'], 'summarizeByMonth');

    const months = new Map<string, { income: Decimal; expenses: Decimal; count: number }>();
    for (const txn of set.records) {
        const key = txn.date.slice(0, 7);
        const month = months.get(key) ?? { income: new Money(0), expenses: new Money(0), count: 0 };
        const amount = new Money(txn.amount);
        if (amount.isNegative()) {
            month.expenses = month.expenses.plus(amount);
        } else {
            month.income = month.income.plus(amount);
        }
        month.count++;
        months.set(key, month);
    }

    return [...months.entries()]
        .sort((a, b) => a[0].localeCompare(b[0]))
        .map(([month, data]) => ({
            month,
            income: formatMoney(data.income),
            expenses: formatMoney(data.expenses),
            net: formatMoney(data.income.plus(data.expenses)),
            count: data.count,
        }));
}
