import { categorizeAll, StateError } from '@ledgerlens/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 4: Categorization
 */
export const categorizeTransactions: PipelineStep = async (state) => {
    if (!state.cleaned || !state.table) {
        throw new StateError('Categorize step ran before Clean');
    }
    const { records, stats } = categorizeAll(state.cleaned, state.table);
    state.categorized = records;
    state.categorizationStats = stats;
    return state;
};
