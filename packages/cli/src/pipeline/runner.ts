import { isLedgerLensError } from '@ledgerlens/shared';
import type { PipelineState, PipelineStep } from './types.js';
import { loadConfig } from './steps/config.js';
import { loadInput } from './steps/load.js';
import { cleanInput } from './steps/clean.js';
import { categorizeTransactions } from './steps/categorize.js';
import { summarizeTransactions } from './steps/summarize.js';
import { exportResults } from './steps/export.js';
import { arrow, error } from '../utils/console.js';
import type { Workspace, ProcessOptions } from '../types.js';

export const STEPS: { name: string; fn: PipelineStep }[] = [
    { name: 'Keyword Table', fn: loadConfig },
    { name: 'Load', fn: loadInput },
    { name: 'Clean', fn: cleanInput },
    { name: 'Categorization', fn: categorizeTransactions },
    { name: 'Summaries', fn: summarizeTransactions },
    { name: 'Export Results', fn: exportResults },
];

/**
 * Orchestrates the execution of the processing pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 *
 * Known failures (LedgerLensError) are recorded as fatal pipeline errors;
 * anything else is a bug and propagates.
 */
export async function runPipeline(
    file: string,
    workspace: Workspace,
    options: ProcessOptions
): Promise<PipelineState> {
    let state: PipelineState = {
        file,
        workspace,
        options,
        droppedRows: 0,
        outputs: [],
        warnings: [],
        errors: [],
    };

    for (let i = 0; i < STEPS.length; i++) {
        const step = STEPS[i];
        if (!options.json) {
            arrow(`Step ${i + 1}/${STEPS.length}: ${step.name}...`);
        }

        try {
            state = await step.fn(state);
        } catch (err) {
            if (!isLedgerLensError(err)) {
                throw err;
            }
            state.errors.push({ step: step.name, message: err.message, fatal: true, error: err });
        }

        if (state.errors.some(e => e.fatal)) {
            error(`Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
