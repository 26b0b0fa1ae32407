/**
 * Internal types for cleaner module.
 */

import type { Transaction } from '../types/index.js';
import type { CleanedRecordSet } from '../records/types.js';

/**
 * The fields of one record before coercion.
 */
export interface RecordFields {
    date: unknown;
    description: unknown;
    amount: unknown;
    extras: Record<string, unknown>;
}

export type RecordOutcome =
    | { ok: true; transaction: Transaction }
    | { ok: false; reason: 'date' | 'amount' };

/**
 * Cleaned records plus the non-fatal diagnostics of the run.
 */
export interface CleanResult {
    records: CleanedRecordSet;
    droppedRows: number;
    warnings: string[];
}
