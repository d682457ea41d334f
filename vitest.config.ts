import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        globals: true,
        environment: "node",
        include: ["tests/**/*.test.ts"],
        testTimeout: 10000,
        // Engine failures log at ERROR; keep debug/info lifecycle lines out of test output.
        env: {
            FEED_CACHE_LOG_LEVEL: "warn",
        },
        coverage: {
            // Run with: npm run test:coverage
            provider: "v8",
            reporter: ["text", "html"],
            include: ["src/**/*.ts"],
            exclude: ["src/index.ts"],
            thresholds: {
                "src/**": {
                    statements: 80,
                    branches: 70,
                    functions: 80,
                    lines: 80,
                },
            },
        },
    },
});
