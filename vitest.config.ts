import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
    test: {
        environment: 'node',
        setupFiles: ['./test/setup.ts'],
        globals: true,
        include: ['archive/**/*.test.ts', 'server/**/*.test.ts'],
    },
    resolve: {
        alias: [
            { find: /^@archive$/, replacement: path.resolve(rootDir, 'archive/index.ts') },
            { find: /^@archive\//, replacement: `${path.resolve(rootDir, 'archive')}/` },
        ],
    },
});
