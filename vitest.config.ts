// vitest.config.ts
import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        globals: true,
        include: ["test/**/*.test.ts"],
        setupFiles: ["./test/vitest.setup.ts"],
        pool: "forks",
        testTimeout: 10000,
        clearMocks: true,
        restoreMocks: true,
    },
});
