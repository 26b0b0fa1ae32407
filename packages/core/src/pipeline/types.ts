import type { CategorySummaryRow, MonthlySummaryRow, OverallSummary } from '../types/index.js';
import type { CategorizedRecordSet } from '../records/types.js';
import type { CategorizationStats } from '../categorizer/types.js';

/**
 * Everything one run produces. Summaries are derived views over `records`.
 */
export interface PipelineResult {
    records: CategorizedRecordSet;
    overall: OverallSummary;
    byCategory: CategorySummaryRow[];
    byMonth: MonthlySummaryRow[];
    categorizationStats: CategorizationStats;
    droppedRows: number;
    warnings: string[];
}
