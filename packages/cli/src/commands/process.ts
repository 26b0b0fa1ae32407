import { resolve } from 'node:path';
import { resolveWorkspace } from '../workspace/paths.js';
import { runPipeline } from '../pipeline/runner.js';
import { formatOverall, formatCategoryTable } from '../report/summary.js';
import { log, success, warn, arrow, error } from '../utils/console.js';
import type { ProcessOptions } from '../types.js';

/**
 * Runs one file through the pipeline and reports the result.
 *
 * @returns Process exit code: 0 on success, 1 after a fatal error
 */
export async function processFile(file: string, options: ProcessOptions): Promise<number> {
    const path = resolve(file);
    const quiet = options.json;

    if (!quiet) {
        log(`\nLedgerLens - Processing ${file}`);
    }

    const workspace = resolveWorkspace(options);
    if (!quiet) {
        arrow(`Keyword table (${workspace.keywordsOrigin}): ${workspace.keywordsPath}`);
    }

    const state = await runPipeline(path, workspace, options);

    for (const w of state.warnings) {
        warn(w);
    }

    if (state.errors.length > 0) {
        for (const e of state.errors) {
            error(`ERROR [${e.step}]: ${e.message}`);
        }
        if (state.errors.some(e => e.fatal)) {
            if (!quiet) {
                log('\n✖ Processing failed with fatal errors.');
            }
            return 1;
        }
    }

    const summaries = state.summaries;
    if (!summaries) {
        error('Pipeline finished without summaries.');
        return 1;
    }

    if (quiet) {
        log(JSON.stringify({
            overall: summaries.overall,
            byCategory: summaries.byCategory,
            byMonth: summaries.byMonth,
            droppedRows: state.droppedRows,
        }, null, 2));
        return 0;
    }

    log('\n--- Summary ---');
    for (const line of formatOverall(summaries.overall)) {
        log(line);
    }

    if (summaries.byCategory.length > 0) {
        log('\n--- By Category ---');
        for (const line of formatCategoryTable(summaries.byCategory)) {
            log(line);
        }
    }

    log('');
    success(`Processing complete for ${file}.`);
    arrow(`Dropped rows: ${state.droppedRows}`);
    if (state.categorizationStats) {
        arrow(`Uncategorized: ${state.categorizationStats.uncategorized}`);
    }

    if (options.dryRun) {
        log('\n[DRY RUN] No files were written.');
    } else {
        arrow(`Outputs saved to: ${workspace.outputs}`);
    }

    return 0;
}
