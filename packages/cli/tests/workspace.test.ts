import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { detectWorkspaceRoot } from '../src/workspace/detect.js';
import { resolveWorkspace } from '../src/workspace/paths.js';
import type { ProcessOptions } from '../src/types.js';

// Mocking fs to avoid actual disk I/O in simple unit tests
vi.mock('node:fs');

describe('Workspace Detection', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('should detect workspace root when config/keywords.yaml exists', () => {
        vi.mocked(fs.existsSync).mockImplementation((p) => String(p) === '/home/test/books/config/keywords.yaml');

        expect(detectWorkspaceRoot('/home/test/books')).toBe('/home/test/books');
    });

    it('should walk up to a parent workspace', () => {
        vi.mocked(fs.existsSync).mockImplementation((p) => String(p) === '/home/test/config/keywords.yaml');

        expect(detectWorkspaceRoot('/home/test/books/2024')).toBe('/home/test');
    });

    it('should return null if no workspace is found in parents', () => {
        vi.mocked(fs.existsSync).mockReturnValue(false);

        expect(detectWorkspaceRoot('/home/test')).toBeNull();
    });
});

describe('Workspace Resolution', () => {
    const options: ProcessOptions = { out: 'outputs', json: false, dryRun: false };

    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('should prefer --keywords', () => {
        vi.mocked(fs.existsSync).mockReturnValue(false);

        const workspace = resolveWorkspace({ ...options, keywords: 'my.yaml' }, '/home/test');
        expect(workspace).toEqual({
            root: null,
            keywordsPath: '/home/test/my.yaml',
            keywordsOrigin: 'flag',
            outputs: '/home/test/outputs',
        });
    });

    it('should use the workspace table when one is found', () => {
        vi.mocked(fs.existsSync).mockImplementation((p) => String(p) === '/home/test/config/keywords.yaml');

        const workspace = resolveWorkspace(options, '/home/test/books');
        expect(workspace.root).toBe('/home/test');
        expect(workspace.keywordsPath).toBe('/home/test/config/keywords.yaml');
        expect(workspace.keywordsOrigin).toBe('workspace');
        expect(workspace.outputs).toBe('/home/test/books/outputs');
    });

    it('should fall back to the packaged table', () => {
        vi.mocked(fs.existsSync).mockReturnValue(false);

        const workspace = resolveWorkspace({ ...options, out: '/tmp/reports' }, '/home/test');
        expect(workspace.keywordsOrigin).toBe('default');
        expect(workspace.keywordsPath.endsWith(path.join('assets', 'default-keywords.yaml'))).toBe(true);
        expect(workspace.outputs).toBe('/tmp/reports');
    });
});
