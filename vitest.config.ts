import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const workspacePackage = (name: string) =>
    fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
    resolve: {
        alias: {
            '@ledgerlens/shared': workspacePackage('shared'),
            '@ledgerlens/core': workspacePackage('core'),
        },
    },
    test: {
        globals: true,
        environment: 'node',
        include: ['packages/*/tests/**/*.test.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html'],
            include: ['packages/*/src/**/*.ts'],
        },
    },
});
