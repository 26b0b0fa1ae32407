/**
 * LedgerLens CLI - Core Types
 */

export interface ProcessOptions {
    /** Explicit keyword table; skips workspace discovery. */
    keywords?: string;
    /** Output directory for the workbook and manifest. */
    out: string;
    json: boolean;
    dryRun: boolean;
}

export type KeywordsOrigin = 'flag' | 'workspace' | 'default';

export interface Workspace {
    /** Directory holding config/keywords.yaml, or null outside a workspace. */
    root: string | null;
    keywordsPath: string;
    keywordsOrigin: KeywordsOrigin;
    outputs: string;
}
