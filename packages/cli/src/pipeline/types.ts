import type {
    OverallSummary,
    CategorySummaryRow,
    MonthlySummaryRow,
} from '@ledgerlens/shared';
import type {
    KeywordTable,
    RawRecordSet,
    CleanedRecordSet,
    CategorizedRecordSet,
    CategorizationStats,
} from '@ledgerlens/core';
import type { Workspace, ProcessOptions } from '../types.js';

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * Summaries built by the last stage; present only after a clean run.
 */
export interface PipelineSummaries {
    overall: OverallSummary;
    byCategory: CategorySummaryRow[];
    byMonth: MonthlySummaryRow[];
}

/**
 * Central state object passed through the processing steps.
 * Each step fills in its own field; later steps require earlier ones.
 */
export interface PipelineState {
    file: string;
    workspace: Workspace;
    options: ProcessOptions;

    table?: KeywordTable;
    raw?: RawRecordSet;
    cleaned?: CleanedRecordSet;
    categorized?: CategorizedRecordSet;
    categorizationStats?: CategorizationStats;
    summaries?: PipelineSummaries;
    droppedRows: number;
    outputs: string[];

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
