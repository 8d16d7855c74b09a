/*
 * For a detailed explanation regarding each configuration property and type check, visit:
 * https://vitest.dev/config/
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: false,
        restoreMocks: true,
        environment: 'node',
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html', 'lcov', 'clover'],
            include: ['src/**'],
            exclude: [
                '**/node_modules/**',
                '**/*.test.ts',
                // Type-only files and barrels
                'src/types.ts',
                'src/exporters/types.ts',
                'src/index.ts',
            ],
            reportsDirectory: './coverage',
            thresholds: {
                lines: 80,
                functions: 80,
                branches: 75,
                statements: 80
            }
        },
        include: ['test/**/*.test.ts']
    }
});
