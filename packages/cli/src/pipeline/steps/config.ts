import { findKeywordCollisions, describeCollisions } from '@ledgerlens/core';
import type { PipelineStep } from '../types.js';
import { loadKeywordTable } from '../../workspace/config.js';

/**
 * Step 1: Keyword table
 * Loads the table and reports keywords an earlier category shadows.
 */
export const loadConfig: PipelineStep = async (state) => {
    const table = loadKeywordTable(state.workspace.keywordsPath);
    state.table = table;
    state.warnings.push(...describeCollisions(findKeywordCollisions(table)));
    return state;
};
