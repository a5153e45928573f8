import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        include: ["collector/src/**/*.test.ts"],
    },
});
