import exceljs from 'exceljs';
import type { Alignment, Fill, Font, Workbook, Worksheet } from 'exceljs';
import { Decimal } from 'decimal.js';

export const MONEY_FORMAT = '#,##0.00;[Red]-#,##0.00';

const HEADER_FONT: Partial<Font> = { bold: true, color: { argb: 'FFFFFFFF' }, size: 11 };
const HEADER_FILL: Fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF4472C4' } };
const HEADER_ALIGNMENT: Partial<Alignment> = { vertical: 'middle', horizontal: 'center' };

const MIN_WIDTH = 10;
const MAX_WIDTH = 60;

export interface SheetLayout {
    /** Column keys holding money values. */
    moneyColumns?: string[];
}

export function createWorkbook(): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'LedgerLens';
    workbook.created = new Date();
    return workbook;
}

/**
 * Styles a filled sheet: frozen header, money formats, column widths.
 * Call after all rows are added.
 */
export function finishSheet(worksheet: Worksheet, layout: SheetLayout = {}): void {
    const header = worksheet.getRow(1);
    header.font = HEADER_FONT;
    header.fill = HEADER_FILL;
    header.alignment = HEADER_ALIGNMENT;
    worksheet.views = [{ state: 'frozen', xSplit: 0, ySplit: 1 }];

    for (const key of layout.moneyColumns ?? []) {
        const column = worksheet.getColumn(key);
        column.numFmt = MONEY_FORMAT;
        column.alignment = { horizontal: 'right' };
    }

    for (const column of worksheet.columns) {
        column.width = Math.min(MAX_WIDTH, Math.max(MIN_WIDTH, widestCell(column)) + 2);
    }
}

/**
 * Money strings become numbers only here, for Excel display.
 */
export function moneyCell(value: string): number {
    return new Decimal(value).toNumber();
}

function widestCell(column: Worksheet['columns'][number]): number {
    let widest = 0;
    column.eachCell?.({ includeEmpty: false }, (cell) => {
        widest = Math.max(widest, cell.text.length);
    });
    return widest;
}
