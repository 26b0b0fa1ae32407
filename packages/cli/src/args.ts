/**
 * Command-line parsing.
 *
 * ledgerlens <file.csv|file.xlsx> [--keywords <file>] [--out <dir>] [--json] [--dry-run]
 */

import type { ProcessOptions } from './types.js';

export const DEFAULT_OUT_DIR = 'outputs';

export const USAGE = [
    'Usage: ledgerlens <file.csv|file.xlsx> [options]',
    '',
    'Options:',
    '  --keywords <file>  Keyword table (YAML). Defaults to config/keywords.yaml',
    '                     in the workspace, then the built-in table.',
    `  --out <dir>        Output directory (default: ./${DEFAULT_OUT_DIR})`,
    '  --json             Print the summaries as JSON',
    '  --dry-run          Do not write any files',
    '  --help, -h         Show this help',
    '  --version, -v      Show the version',
].join('\n');

export type ParsedArgs =
    | { command: 'help' }
    | { command: 'version' }
    | { command: 'process'; file: string; options: ProcessOptions }
    | { command: 'invalid'; message: string };

export function parseArgs(argv: string[]): ParsedArgs {
    const options: ProcessOptions = { out: DEFAULT_OUT_DIR, json: false, dryRun: false };
    const files: string[] = [];

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        switch (arg) {
            case '--help':
            case '-h':
                return { command: 'help' };
            case '--version':
            case '-v':
                return { command: 'version' };
            case '--json':
                options.json = true;
                break;
            case '--dry-run':
                options.dryRun = true;
                break;
            case '--keywords':
            case '--out': {
                const value = argv[i + 1];
                if (value === undefined || value.startsWith('--')) {
                    return { command: 'invalid', message: `Option ${arg} needs a value` };
                }
                if (arg === '--keywords') {
                    options.keywords = value;
                } else {
                    options.out = value;
                }
                i++;
                break;
            }
            default:
                if (arg.startsWith('-')) {
                    return { command: 'invalid', message: `Unknown option: ${arg}` };
                }
                files.push(arg);
        }
    }

    if (files.length === 0) {
        return { command: 'help' };
    }
    if (files.length > 1) {
        return { command: 'invalid', message: `Expected one input file, got ${files.length}` };
    }

    return { command: 'process', file: files[0], options };
}
