// Types (re-exported from shared)
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
} from './types/index.js';

export {
    UNCATEGORIZED_CATEGORY,
    REQUIRED_COLUMNS,
    SourceUnavailableError,
    SchemaError,
    StateError,
    ConfigError,
} from './types/index.js';

// Record sets
export { assertStatus } from './records/index.js';
export type {
    RecordSetStatus,
    RawRecord,
    ColumnMap,
    TabularData,
    TabularSource,
    RawRecordSet,
    CleanedRecordSet,
    CategorizedRecordSet,
    RecordSet,
} from './records/index.js';

// Utils
export { parseDateValue, formatIsoDate, parseAmountValue, formatMoney, normalizeDescription } from './utils/index.js';

// Sources
export { readTabular, tabularSourceFromBuffer, tabularSourceFromRows } from './source/index.js';

// Stages
export { loadRecords, resolveColumns } from './loader/index.js';
export { cleanRecords } from './cleaner/index.js';
export type { CleanResult } from './cleaner/index.js';
export {
    createKeywordTable,
    parseKeywordTableInput,
    categoryNames,
    keywordTableToEntries,
    findKeywordCollisions,
    describeCollisions,
} from './keywords/index.js';
export type { KeywordTable, KeywordCollision } from './keywords/index.js';
export { categorize, categorizeAll } from './categorizer/index.js';
export type { CategorizationResult, CategorizationStats } from './categorizer/index.js';
export { summarizeOverall, summarizeByCategory, summarizeByMonth } from './aggregator/index.js';

// Pipeline
export { runPipeline } from './pipeline/index.js';
export type { PipelineResult } from './pipeline/index.js';
