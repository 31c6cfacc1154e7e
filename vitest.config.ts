import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        globals: true,
        environment: "node",
        include: ["tests/**/*.test.ts"],
        globalSetup: "./tests/global-setup.ts",
        // Run tests sequentially: several suites spy on process.stdout / stderr
        // and on the process-wide global logger slot
        fileParallelism: false,
        sequence: {
            concurrent: false,
        },
        coverage: {
            provider: "v8",
            reporter: ["text", "json", "html"],
            exclude: ["node_modules/", "dist/", "tests/", "*.config.*"],
        },
    },
});
