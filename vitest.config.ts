import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        // Tests run against sources; the package's runtime export is its build output.
        alias: {
            liblayer: fileURLToPath(new URL('./packages/liblayer/src/index.ts', import.meta.url)),
        },
    },
    test: {
        include: ['packages/*/tests/**/*.test.ts'],
        environment: 'node',
    },
});
