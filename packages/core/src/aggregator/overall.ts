/**
 * Overall summary: income, expenses, net, date range, count.
 *
 * Sums are kept at full precision and rounded to 2 places only on output.
 */

import { Money, formatMoney } from '../utils/amount-parse.js';
import { assertStatus } from '../records/status.js';
import type { OverallSummary } from '../types/index.js';
import type { CategorizedRecordSet, CleanedRecordSet } from '../records/types.js';

/**
 * Summarize a cleaned or categorized record set.
 *
 * An empty set yields `{ kind: 'no_data', count: 0 }`, not an error;
 * callers must branch on `kind`.
 *
 * @throws StateError for a raw set
 */
export function summarizeOverall(set: CleanedRecordSet | CategorizedRecordSet): OverallSummary {
    assertStatus(set, ['cleaned', 'categorized'], 'summarizeOverall');

    const { records } = set;
    if (records.length === 0) {
        return { kind: 'no_data', count: 0 };
    }

    let income = new Money(0);
    let expenses = new Money(0);
    let startDate = records[0].date;
    let endDate = records[0].date;

    for (const txn of records) {
        const amount = new Money(txn.amount);
        if (amount.greaterThan(0)) {
            income = income.plus(amount);
        } else if (amount.lessThan(0)) {
            expenses = expenses.plus(amount);
        }

        // ISO dates compare correctly as strings
        if (txn.date < startDate) startDate = txn.date;
        if (txn.date > endDate) endDate = txn.date;
    }

    return {
        kind: 'summary',
        total_income: formatMoney(income),
        total_expenses: formatMoney(expenses),
        net_amount: formatMoney(income.plus(expenses)),
        start_date: startDate,
        end_date: endDate,
        count: records.length,
    };
}
