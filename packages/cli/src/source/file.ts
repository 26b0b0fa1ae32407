import { readFileSync } from 'node:fs';
import { basename } from 'node:path';
import { readTabular, type TabularSource } from '@ledgerlens/core';

/**
 * TabularSource over a CSV or XLSX file on disk.
 *
 * The file is read lazily so that a missing or unreadable file surfaces
 * through the loader as SourceUnavailableError.
 */
export function fileSource(path: string): TabularSource {
    const name = basename(path);
    return {
        name,
        read: () => readTabular(readFileSync(path), name),
    };
}
