/**
 * Plain-text report lines for the console.
 */

import type { OverallSummary, CategorySummaryRow } from '@ledgerlens/shared';

const LABEL_WIDTH = 16;

export function formatOverall(overall: OverallSummary): string[] {
    if (overall.kind === 'no_data') {
        return ['No data: no transactions left after cleaning.'];
    }
    return [
        labelled('Transactions', String(overall.count)),
        labelled('Period', `${overall.start_date} to ${overall.end_date}`),
        labelled('Total income', overall.total_income),
        labelled('Total expenses', overall.total_expenses),
        labelled('Net amount', overall.net_amount),
    ];
}

/**
 * One aligned line per category: name, total, (count).
 */
export function formatCategoryTable(rows: CategorySummaryRow[]): string[] {
    const nameWidth = Math.max(0, ...rows.map((row) => row.category.length));
    const amountWidth = Math.max(0, ...rows.map((row) => row.total_amount.length));

    return rows.map((row) =>
        `${row.category.padEnd(nameWidth)}  ${row.total_amount.padStart(amountWidth)}  (${row.count})`
    );
}

function labelled(label: string, value: string): string {
    return `${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
}
