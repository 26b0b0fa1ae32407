import { join, dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { detectWorkspaceRoot, getWorkspaceKeywordsPath } from './detect.js';
import type { ProcessOptions, Workspace } from '../types.js';

const moduleDir = dirname(fileURLToPath(import.meta.url));

/**
 * Decides where the keyword table comes from and where outputs go.
 *
 * Keyword table precedence: --keywords, then the workspace's
 * config/keywords.yaml, then the packaged default table.
 */
export function resolveWorkspace(options: ProcessOptions, cwd: string = process.cwd()): Workspace {
    const outputs = resolve(cwd, options.out);

    if (options.keywords) {
        return {
            root: detectWorkspaceRoot(cwd),
            keywordsPath: resolve(cwd, options.keywords),
            keywordsOrigin: 'flag',
            outputs,
        };
    }

    const root = detectWorkspaceRoot(cwd);
    if (root) {
        return {
            root,
            keywordsPath: getWorkspaceKeywordsPath(root),
            keywordsOrigin: 'workspace',
            outputs,
        };
    }

    return {
        root: null,
        keywordsPath: getDefaultKeywordsPath(),
        keywordsOrigin: 'default',
        outputs,
    };
}

/**
 * Keyword table shipped with the CLI.
 */
export function getDefaultKeywordsPath(): string {
    // packages/cli/src/workspace -> packages/cli
    const pkgRoot = join(moduleDir, '..', '..');
    return join(pkgRoot, 'assets', 'default-keywords.yaml');
}
