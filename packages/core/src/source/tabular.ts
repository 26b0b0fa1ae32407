/**
 * CSV / XLSX tabular source.
 *
 * Takes bytes (not a file path) to keep core headless. Every cell of a
 * text export is kept as text; the cleaner does all type coercion.
 */

import * as XLSX from 'xlsx';
import { stripBom } from '../utils/normalize.js';
import type { RawRecord, TabularData, TabularSource } from '../records/types.js';

/**
 * Read the first sheet of a workbook (or a CSV) into header + rows.
 * Throws if the bytes cannot be parsed as a spreadsheet.
 */
export function readTabular(data: ArrayBuffer | Uint8Array, name: string): TabularData {
    const bytes = data instanceof Uint8Array ? data : new Uint8Array(data);
    // Text exports are decoded as UTF-8 here so symbols like € survive
    const workbook = isBinaryWorkbook(bytes)
        ? XLSX.read(bytes, { type: 'array', raw: true })
        : XLSX.read(new TextDecoder('utf-8').decode(bytes), { type: 'string', raw: true });
    const sheetName = workbook.SheetNames[0];
    if (sheetName === undefined) {
        throw new Error(`No sheets found in ${name}`);
    }
    const sheet = workbook.Sheets[sheetName];

    // One pass over the cells: the header is the first non-blank row, and
    // records are keyed from that same row.
    const cells = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, blankrows: false, defval: '' });
    const [header = [], ...body] = cells;
    const names = columnNames(header);
    const columns = names.filter((column): column is string => column !== null);

    const rows = body.map((cellsOfRow) => {
        const row: RawRecord = {};
        names.forEach((column, index) => {
            if (column !== null) {
                row[column] = cellsOfRow[index] ?? '';
            }
        });
        return row;
    });

    return { columns, rows };
}

/**
 * Wrap an in-memory buffer as a TabularSource. Parsing happens on read().
 */
export function tabularSourceFromBuffer(data: ArrayBuffer | Uint8Array, name: string): TabularSource {
    return {
        name,
        read: () => readTabular(data, name),
    };
}

/**
 * Wrap already-materialized rows as a TabularSource.
 * Columns default to the union of row keys in first-seen order.
 */
export function tabularSourceFromRows(
    rows: RawRecord[],
    name: string,
    columns?: string[]
): TabularSource {
    return {
        name,
        read: () => ({ columns: columns ?? collectColumns(rows), rows }),
    };
}

/**
 * Header cell names by position, BOM stripped. Blank header cells map to
 * null and their column is skipped; a repeated name gets a `_1`, `_2`...
 * suffix so no cell is overwritten.
 */
function columnNames(header: unknown[]): (string | null)[] {
    const counts = new Map<string, number>();
    return header.map((cell) => {
        const name = stripBom(String(cell ?? '')).trim();
        if (name === '') return null;
        const seen = counts.get(name) ?? 0;
        counts.set(name, seen + 1);
        return seen === 0 ? name : `${name}_${seen}`;
    });
}

/**
 * XLSX (zip) or legacy XLS (OLE compound file) rather than delimited text.
 */
function isBinaryWorkbook(bytes: Uint8Array): boolean {
    const zip = bytes[0] === 0x50 && bytes[1] === 0x4b;
    const ole = bytes[0] === 0xd0 && bytes[1] === 0xcf && bytes[2] === 0x11 && bytes[3] === 0xe0;
    return zip || ole;
}

function collectColumns(rows: RawRecord[]): string[] {
    const seen = new Set<string>();
    for (const row of rows) {
        for (const key of Object.keys(row)) {
            seen.add(key);
        }
    }
    return [...seen];
}
