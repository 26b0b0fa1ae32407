/**
 * Cleaner: per-record type coercion and row filtering.
 *
 * Rows whose date or amount cannot be coerced are dropped and counted.
 * Coercion failures are never raised; they come back as warnings.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Warnings returned in result.
 */

import { parseDateValue, formatIsoDate } from '../utils/date-parse.js';
import { parseAmountValue, toDecimalString } from '../utils/amount-parse.js';
import { assertStatus } from '../records/status.js';
import type { Transaction } from '../types/index.js';
import type { CleanedRecordSet, ColumnMap, RawRecord, RawRecordSet } from '../records/types.js';
import type { CleanResult, RecordFields, RecordOutcome } from './types.js';

/**
 * Clean a record set.
 *
 * Accepts a raw set, or an already-cleaned one (cleaning is idempotent:
 * nothing further is dropped and no value changes). Surviving records
 * keep their original relative order.
 *
 * @throws StateError for a categorized set
 */
export function cleanRecords(set: RawRecordSet | CleanedRecordSet): CleanResult {
    assertStatus(set, ['raw', 'cleaned'], 'cleanRecords');

    let fields: RecordFields[];
    if (set.status === 'raw') {
        const { columnMap } = set;
        fields = set.records.map((row) => fieldsFromRaw(row, columnMap));
    } else {
        fields = set.records.map(fieldsFromTransaction);
    }

    const records: Transaction[] = [];
    let invalidDates = 0;
    let invalidAmounts = 0;

    for (const field of fields) {
        const outcome = cleanRecord(field);
        if (outcome.ok) {
            records.push(outcome.transaction);
            continue;
        }
        // A row missing both counts once, as a date failure.
        if (outcome.reason === 'date') {
            invalidDates++;
        } else {
            invalidAmounts++;
        }
    }

    const warnings: string[] = [];
    if (invalidDates) {
        warnings.push(`Dropped ${invalidDates} rows with invalid or missing dates`);
    }
    if (invalidAmounts) {
        warnings.push(`Dropped ${invalidAmounts} rows with invalid or missing amounts`);
    }

    return {
        records: { status: 'cleaned', records },
        droppedRows: invalidDates + invalidAmounts,
        warnings,
    };
}

/**
 * Coerce one record's fields.
 */
export function cleanRecord(fields: RecordFields): RecordOutcome {
    const date = parseDateValue(fields.date);
    if (!date) {
        return { ok: false, reason: 'date' };
    }

    const amount = parseAmountValue(fields.amount);
    if (!amount) {
        return { ok: false, reason: 'amount' };
    }

    return {
        ok: true,
        transaction: {
            date: formatIsoDate(date),
            description: normalizeDescriptionField(fields.description),
            amount: toDecimalString(amount),
            extras: fields.extras,
        },
    };
}

/**
 * Trim text; anything that isn't text becomes an empty string.
 */
export function normalizeDescriptionField(value: unknown): string {
    return typeof value === 'string' ? value.trim() : '';
}

function fieldsFromRaw(row: RawRecord, columnMap: ColumnMap): RecordFields {
    const mapped = new Set<string>([columnMap.date, columnMap.description, columnMap.amount]);

    const extras: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(row)) {
        if (!mapped.has(key)) {
            extras[key] = value;
        }
    }

    return {
        date: row[columnMap.date],
        description: row[columnMap.description],
        amount: row[columnMap.amount],
        extras,
    };
}

function fieldsFromTransaction(txn: Transaction): RecordFields {
    return {
        date: txn.date,
        description: txn.description,
        amount: txn.amount,
        extras: txn.extras,
    };
}
