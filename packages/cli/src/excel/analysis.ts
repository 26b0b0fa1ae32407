import type { Workbook, Worksheet } from 'exceljs';
import type { OverallSummary, CategorySummaryRow, MonthlySummaryRow } from '@ledgerlens/shared';
import { createWorkbook, finishSheet, moneyCell, MONEY_FORMAT } from './utils.js';

export interface AnalysisInput {
    overall: OverallSummary;
    byCategory: CategorySummaryRow[];
    byMonth: MonthlySummaryRow[];
}

/**
 * Generates the analysis workbook: Summary, By Category, By Month.
 */
export function generateAnalysisExcel(input: AnalysisInput): Workbook {
    const workbook = createWorkbook();

    addSummarySheet(workbook, input.overall);
    addCategorySheet(workbook, input.byCategory);
    addMonthSheet(workbook, input.byMonth);

    return workbook;
}

/**
 * Sheet: Summary
 * Rows: Total income, Total expenses, Net amount, Start date, End date, Transactions.
 * An empty batch gets a single "No data" row.
 */
function addSummarySheet(workbook: Workbook, overall: OverallSummary): void {
    const sheet = workbook.addWorksheet('Summary');
    sheet.columns = [
        { header: 'Metric', key: 'metric' },
        { header: 'Value', key: 'value' },
    ];

    if (overall.kind === 'no_data') {
        sheet.addRow({ metric: 'No data', value: 0 });
    } else {
        addMoneyRow(sheet, 'Total income', overall.total_income);
        addMoneyRow(sheet, 'Total expenses', overall.total_expenses);
        addMoneyRow(sheet, 'Net amount', overall.net_amount);
        sheet.addRow({ metric: 'Start date', value: overall.start_date });
        sheet.addRow({ metric: 'End date', value: overall.end_date });
        sheet.addRow({ metric: 'Transactions', value: overall.count });
    }

    finishSheet(sheet);
}

/**
 * Sheet: By Category
 * Columns: category, total_amount, transaction_count
 */
function addCategorySheet(workbook: Workbook, rows: CategorySummaryRow[]): void {
    const sheet = workbook.addWorksheet('By Category');
    sheet.columns = [
        { header: 'category', key: 'category' },
        { header: 'total_amount', key: 'total_amount' },
        { header: 'transaction_count', key: 'transaction_count' },
    ];

    for (const row of rows) {
        sheet.addRow({
            category: row.category,
            total_amount: moneyCell(row.total_amount),
            transaction_count: row.count,
        });
    }

    finishSheet(sheet, { moneyColumns: ['total_amount'] });
}

/**
 * Sheet: By Month
 * Columns: month, income, expenses, net, transaction_count
 */
function addMonthSheet(workbook: Workbook, rows: MonthlySummaryRow[]): void {
    const sheet = workbook.addWorksheet('By Month');
    sheet.columns = [
        { header: 'month', key: 'month' },
        { header: 'income', key: 'income' },
        { header: 'expenses', key: 'expenses' },
        { header: 'net', key: 'net' },
        { header: 'transaction_count', key: 'transaction_count' },
    ];

    for (const row of rows) {
        sheet.addRow({
            month: row.month,
            income: moneyCell(row.income),
            expenses: moneyCell(row.expenses),
            net: moneyCell(row.net),
            transaction_count: row.count,
        });
    }

    finishSheet(sheet, { moneyColumns: ['income', 'expenses', 'net'] });
}

function addMoneyRow(sheet: Worksheet, metric: string, value: string): void {
    const row = sheet.addRow({ metric, value: moneyCell(value) });
    row.getCell('value').numFmt = MONEY_FORMAT;
}
