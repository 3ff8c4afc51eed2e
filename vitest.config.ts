import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: [
            'core/__tests__/**/*.test.ts',
            'src/**/__tests__/**/*.test.ts'
        ],
        environment: 'node',
        setupFiles: ['core/__tests__/setup.ts'],
        testTimeout: 20000
    }
});
