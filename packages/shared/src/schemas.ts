/**
 * Zod schemas for LedgerLens data structures.
 *
 * IMPORTANT: Money is stored as plain decimal strings, never native numbers.
 * Convert to Decimal at computation boundaries, back to string at output.
 */

import { z } from 'zod';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
export const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * Decimal amount as string (never native number for money).
 */
export const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

/**
 * Money rounded for output: exactly two decimal places.
 */
export const moneyString = z.string().regex(/^-?\d+\.\d{2}$/, 'Must have exactly 2 decimal places');

const monthString = z.string().regex(/^\d{4}-\d{2}$/, 'Must be YYYY-MM format');

const categoryName = z.string().trim().min(1, 'Category name cannot be empty');

const keyword = z.string().trim().min(1, 'Keyword cannot be empty');

// ============================================================================
// Transaction Schemas
// ============================================================================

/**
 * Cleaned transaction. Date and amount are always set and valid.
 * Positive amount = inflow, negative = outflow.
 * `extras` carries the source's non-required columns unmodified.
 */
export const TransactionSchema = z.object({
    date: isoDateString,
    description: z.string(),
    amount: decimalString,
    extras: z.record(z.string(), z.unknown()),
});

export type Transaction = z.infer<typeof TransactionSchema>;

/**
 * Transaction after categorization.
 */
export const CategorizedTransactionSchema = TransactionSchema.extend({
    category: categoryName,
});

export type CategorizedTransaction = z.infer<typeof CategorizedTransactionSchema>;

// ============================================================================
// Keyword Table Schemas
// ============================================================================

export const KeywordEntrySchema = z.object({
    category: categoryName,
    keywords: z.array(keyword),
});

export type KeywordEntry = z.infer<typeof KeywordEntrySchema>;

export const KeywordEntryListSchema = z.array(KeywordEntrySchema);

export const KeywordPairListSchema = z.array(z.tuple([categoryName, z.array(keyword)]));

export const KeywordMapSchema = z.record(categoryName, z.array(keyword));

/**
 * Accepted shapes for a keyword table, all ordered:
 * - { Groceries: ['whole foods'], Rent: ['rent'] }
 * - [['Groceries', ['whole foods']], ['Rent', ['rent']]]
 * - [{ category: 'Groceries', keywords: ['whole foods'] }]
 *
 * Object form follows JS key order, so integer-like category names
 * should use one of the array forms.
 */
export const KeywordTableInputSchema = z.union([
    KeywordEntryListSchema,
    KeywordPairListSchema,
    KeywordMapSchema,
]);

export type KeywordTableInput = z.input<typeof KeywordTableInputSchema>;

// ============================================================================
// Summary Schemas
// ============================================================================

/**
 * Overall totals over a non-empty record set.
 */
export const OverallTotalsSchema = z.object({
    kind: z.literal('summary'),
    total_income: moneyString,
    total_expenses: moneyString,
    net_amount: moneyString,
    start_date: isoDateString,
    end_date: isoDateString,
    count: z.number().int().min(1),
});

export type OverallTotals = z.infer<typeof OverallTotalsSchema>;

/**
 * Result for an empty record set. Callers must branch on `kind`.
 */
export const NoDataSummarySchema = z.object({
    kind: z.literal('no_data'),
    count: z.literal(0),
});

export type NoDataSummary = z.infer<typeof NoDataSummarySchema>;

export const OverallSummarySchema = z.discriminatedUnion('kind', [
    OverallTotalsSchema,
    NoDataSummarySchema,
]);

export type OverallSummary = z.infer<typeof OverallSummarySchema>;

export const CategorySummaryRowSchema = z.object({
    category: categoryName,
    total_amount: moneyString,
    count: z.number().int().min(1),
});

export type CategorySummaryRow = z.infer<typeof CategorySummaryRowSchema>;

export const MonthlySummaryRowSchema = z.object({
    month: monthString,
    income: moneyString,
    expenses: moneyString,
    net: moneyString,
    count: z.number().int().min(1),
});

export type MonthlySummaryRow = z.infer<typeof MonthlySummaryRowSchema>;

// ============================================================================
// Run Manifest Schema
// ============================================================================

/**
 * Written next to the exported workbook for traceability.
 */
export const RunManifestSchema = z.object({
    source_file: z.string(),
    source_hash: z.string(),
    run_timestamp: z.string(),
    keywords_file: z.string(),
    record_count: z.number().int().min(0),
    dropped_rows: z.number().int().min(0),
    version: z.string(),
});

export type RunManifest = z.infer<typeof RunManifestSchema>;
