import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['sources/**/tests/**/*.spec.ts'],
        environment: 'node',
    },
});
