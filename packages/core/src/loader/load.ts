/**
 * Loader: schema check over a tabular source.
 *
 * Required columns are checked once against the header, never per row.
 * Rows are returned unchanged; values may still be arbitrary text.
 */

import { REQUIRED_COLUMNS, SchemaError, SourceUnavailableError } from '../types/index.js';
import { normalizeColumnName } from '../utils/normalize.js';
import type { ColumnMap, RawRecordSet, TabularData, TabularSource } from '../records/types.js';

/**
 * Read a source and validate its header.
 *
 * @throws SourceUnavailableError if the source cannot be read at all
 * @throws SchemaError if any required column is absent
 */
export function loadRecords(source: TabularSource): RawRecordSet {
    let data: TabularData;
    try {
        data = source.read();
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new SourceUnavailableError(
            source.name,
            `Cannot read ${source.name}: ${reason}`,
            { cause: err }
        );
    }

    const columnMap = resolveColumns(data.columns);

    return {
        status: 'raw',
        source: source.name,
        columns: data.columns,
        columnMap,
        records: data.rows,
    };
}

/**
 * Map each required column to the header that carries it.
 * Matching is case-insensitive after trimming; the first header wins.
 *
 * @throws SchemaError listing every missing column
 */
export function resolveColumns(columns: string[]): ColumnMap {
    const byName = new Map<string, string>();
    for (const column of columns) {
        const key = normalizeColumnName(column);
        if (!byName.has(key)) {
            byName.set(key, column);
        }
    }

    const missing = REQUIRED_COLUMNS.filter((required) => !byName.has(required));
    if (missing.length > 0) {
        throw new SchemaError([...missing], columns);
    }

    return {
        date: byName.get('date') ?? 'date',
        description: byName.get('description') ?? 'description',
        amount: byName.get('amount') ?? 'amount',
    };
}
