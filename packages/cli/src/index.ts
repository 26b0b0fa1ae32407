#!/usr/bin/env node
/**
 * LedgerLens CLI
 *
 * The CLI owns all file I/O and console output; @ledgerlens/core is
 * handed a tabular source and returns data and warnings.
 */

import { parseArgs, USAGE } from './args.js';
import { processFile } from './commands/process.js';
import { log, error } from './utils/console.js';
import { VERSION } from './version.js';

async function main(): Promise<void> {
    const parsed = parseArgs(process.argv.slice(2));

    switch (parsed.command) {
        case 'help':
            log(`LedgerLens CLI v${VERSION}\n`);
            log(USAGE);
            return;
        case 'version':
            log(VERSION);
            return;
        case 'invalid':
            error(parsed.message);
            log(USAGE);
            process.exitCode = 1;
            return;
        case 'process':
            process.exitCode = await processFile(parsed.file, parsed.options);
            return;
    }
}

main().catch((err: unknown) => {
    error(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
});
