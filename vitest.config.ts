import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: [
      "src/**/*.test.ts",
      "tests/**/*.test.ts",
    ],
    exclude: [
      "node_modules",
      "dist",
    ],
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      reportsDirectory: "./coverage",
      include: ["src/**/*.ts"],
      exclude: ["src/main.ts"],
    },
    setupFiles: ["./tests/setup.ts"],
    testTimeout: 10_000,
    pool: "forks",
  },
});
