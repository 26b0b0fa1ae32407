import { cleanRecords, StateError } from '@ledgerlens/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 3: Clean
 * Coerces dates and amounts; rows that fail are dropped and counted.
 */
export const cleanInput: PipelineStep = async (state) => {
    if (!state.raw) {
        throw new StateError('Clean step ran before Load');
    }
    const result = cleanRecords(state.raw);
    state.cleaned = result.records;
    state.droppedRows = result.droppedRows;
    state.warnings.push(...result.warnings);
    return state;
};
