import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        include: ["test/**/*.spec.ts"],
        setupFiles: ["./test/setup.ts"],
        testTimeout: 30000,
    },
});
