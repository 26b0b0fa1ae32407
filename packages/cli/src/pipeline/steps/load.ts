import { loadRecords } from '@ledgerlens/core';
import type { PipelineStep } from '../types.js';
import { fileSource } from '../../source/file.js';

/**
 * Step 2: Load
 * Reads the input file and checks its header for the required columns.
 */
export const loadInput: PipelineStep = async (state) => {
    state.raw = loadRecords(fileSource(state.file));
    if (state.raw.records.length === 0) {
        state.warnings.push(`No rows found in ${state.raw.source}`);
    }
    return state;
};
