// Schemas
export {
    TransactionSchema,
    CategorizedTransactionSchema,
    KeywordEntrySchema,
    KeywordEntryListSchema,
    KeywordPairListSchema,
    KeywordMapSchema,
    KeywordTableInputSchema,
    OverallTotalsSchema,
    NoDataSummarySchema,
    OverallSummarySchema,
    CategorySummaryRowSchema,
    MonthlySummaryRowSchema,
    RunManifestSchema,
    isoDateString,
    decimalString,
    moneyString,
} from './schemas.js';

// Types
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
    RunManifest,
} from './schemas.js';

// Constants
export {
    UNCATEGORIZED_CATEGORY,
    REQUIRED_COLUMNS,
    CURRENCY_SYMBOLS,
    MONEY_DECIMALS,
    TWO_DIGIT_YEAR_BASE,
    ERROR_CODES,
} from './constants.js';

// Errors
export {
    LedgerLensError,
    SourceUnavailableError,
    SchemaError,
    StateError,
    ConfigError,
    isLedgerLensError,
} from './errors.js';
export type { ErrorCode } from './errors.js';
