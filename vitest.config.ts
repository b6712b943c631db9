import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        // Global test settings
        globals: true,
        environment: "node",
        env: {
            LOG_LEVEL: "silent",
        },

        // Include patterns for different test types
        include: [
            "src/**/*.test.ts", // Unit tests
            "test/**/*.test.ts", // End-to-end scenarios
        ],

        // Coverage configuration (optional)
        coverage: {
            provider: "v8",
            reporter: ["text", "json", "html"],
            include: ["src/**/*.ts"],
            exclude: [
                "src/**/*.test.ts",
                "src/**/__tests__/**",
                "src/**/index.ts",
                "src/types.ts",
                "src/errors.ts",
            ],
        },
    },
});
