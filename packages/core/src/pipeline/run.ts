/**
 * One synchronous pass: Loader -> Cleaner -> Categorizer -> Aggregator.
 *
 * Fatal errors (SourceUnavailableError, SchemaError, StateError) propagate
 * before any summary is built, so there is never partial output.
 */

import { loadRecords } from '../loader/load.js';
import { cleanRecords } from '../cleaner/clean.js';
import { categorizeAll } from '../categorizer/categorize.js';
import { summarizeOverall } from '../aggregator/overall.js';
import { summarizeByCategory } from '../aggregator/by-category.js';
import { summarizeByMonth } from '../aggregator/by-month.js';
import type { TabularSource } from '../records/types.js';
import type { KeywordTable } from '../keywords/types.js';
import type { PipelineResult } from './types.js';

export function runPipeline(source: TabularSource, table: KeywordTable): PipelineResult {
    const raw = loadRecords(source);
    const cleaned = cleanRecords(raw);
    const { records, stats } = categorizeAll(cleaned.records, table);

    return {
        records,
        overall: summarizeOverall(records),
        byCategory: summarizeByCategory(records),
        byMonth: summarizeByMonth(records),
        categorizationStats: stats,
        droppedRows: cleaned.droppedRows,
        warnings: cleaned.warnings,
    };
}
