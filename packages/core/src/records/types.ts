/**
 * Record sets carry an explicit status tag. Each stage checks the tag
 * on entry so the load -> clean -> categorize order is enforced in one place.
 */

import type { Transaction, CategorizedTransaction, REQUIRED_COLUMNS } from '../types/index.js';

export type RecordSetStatus = 'raw' | 'cleaned' | 'categorized';

/**
 * One row from a tabular source, keyed by column header.
 */
export type RawRecord = Record<string, unknown>;

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

/**
 * Required column -> actual header name in the source.
 */
export type ColumnMap = Record<RequiredColumn, string>;

/**
 * What a tabular source yields: its header and its rows.
 */
export interface TabularData {
    columns: string[];
    rows: RawRecord[];
}

/**
 * Black-box source of rows. `read()` is the one blocking read of a run;
 * any exception it throws means the source is unavailable.
 */
export interface TabularSource {
    readonly name: string;
    read(): TabularData;
}

export interface RawRecordSet {
    status: 'raw';
    source: string;
    columns: string[];
    columnMap: ColumnMap;
    records: RawRecord[];
}

export interface CleanedRecordSet {
    status: 'cleaned';
    records: Transaction[];
}

export interface CategorizedRecordSet {
    status: 'categorized';
    records: CategorizedTransaction[];
}

export type RecordSet = RawRecordSet | CleanedRecordSet | CategorizedRecordSet;
