import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';

/**
 * SHA-256 of some content, prefixed with 'sha256:'.
 */
export function hashContent(content: Uint8Array | string): string {
    return `sha256:${createHash('sha256').update(content).digest('hex')}`;
}

/**
 * SHA-256 of a file's content, for the run manifest.
 */
export async function hashFile(filePath: string): Promise<string> {
    return hashContent(await readFile(filePath));
}
