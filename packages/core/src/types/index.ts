/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    Transaction,
    CategorizedTransaction,
    KeywordEntry,
    KeywordTableInput,
    OverallTotals,
    NoDataSummary,
    OverallSummary,
    CategorySummaryRow,
    MonthlySummaryRow,
} from '@ledgerlens/shared';

export {
    TransactionSchema,
    CategorizedTransactionSchema,
    KeywordEntryListSchema,
    KeywordPairListSchema,
    KeywordMapSchema,
    UNCATEGORIZED_CATEGORY,
    REQUIRED_COLUMNS,
    CURRENCY_SYMBOLS,
    MONEY_DECIMALS,
    TWO_DIGIT_YEAR_BASE,
    SourceUnavailableError,
    SchemaError,
    StateError,
    ConfigError,
} from '@ledgerlens/shared';
