import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { RunManifestSchema } from '@ledgerlens/shared';
import type { PipelineStep } from '../types.js';
import { generateAnalysisExcel } from '../../excel/analysis.js';
import { hashFile } from '../../utils/hash.js';
import { VERSION } from '../../version.js';

/**
 * Step 6: Export
 * Writes analysis.xlsx and the run manifest to the output directory.
 */
export const exportResults: PipelineStep = async (state) => {
    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping file export.');
        return state;
    }
    if (!state.summaries) {
        return state;
    }

    const outputPath = state.workspace.outputs;

    try {
        await mkdir(outputPath, { recursive: true });

        const workbook = generateAnalysisExcel(state.summaries);
        const workbookPath = join(outputPath, 'analysis.xlsx');
        await writeFile(workbookPath, new Uint8Array(await workbook.xlsx.writeBuffer()));
        state.outputs.push(workbookPath);

        const manifest = RunManifestSchema.parse({
            source_file: state.file,
            source_hash: await hashFile(state.file),
            run_timestamp: new Date().toISOString(),
            keywords_file: state.workspace.keywordsPath,
            record_count: state.categorized?.records.length ?? 0,
            dropped_rows: state.droppedRows,
            version: VERSION,
        });
        const manifestPath = join(outputPath, 'run_manifest.json');
        await writeFile(manifestPath, JSON.stringify(manifest, null, 2));
        state.outputs.push(manifestPath);
    } catch (err) {
        state.errors.push({
            step: 'Export Results',
            message: `Failed to export results to ${outputPath}: ${err instanceof Error ? err.message : String(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
