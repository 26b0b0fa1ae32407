/**
 * Cleaner module: date/amount coercion and row filtering.
 */

export { cleanRecords, cleanRecord, normalizeDescriptionField } from './clean.js';
export type { CleanResult, RecordFields, RecordOutcome } from './types.js';
