/// <reference types="vitest" />
import { defineConfig, type UserConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['test/**/*.test.ts'],
        env: {
            IMAGESMITH_LOG_LEVEL: 'silent',
        },
        coverage: {
            include: ['lib/**/*.ts'],
            reporter: ['text', 'json', 'html'],
            reportsDirectory: './out/test/coverage',
        },
    },
}) as UserConfig;
