import {
    summarizeOverall,
    summarizeByCategory,
    summarizeByMonth,
    StateError,
} from '@ledgerlens/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 5: Summaries
 */
export const summarizeTransactions: PipelineStep = async (state) => {
    if (!state.categorized) {
        throw new StateError('Summarize step ran before Categorize');
    }
    state.summaries = {
        overall: summarizeOverall(state.categorized),
        byCategory: summarizeByCategory(state.categorized),
        byMonth: summarizeByMonth(state.categorized),
    };
    return state;
};
