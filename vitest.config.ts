import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      // Root-level edge-case suites
      {
        extends: true,
        test: {
          name: "red-team",
          include: ["tests/**/*.test.ts"],
          environment: "node",
        },
      },
      // Package tests
      "packages/*/vitest.config.ts",
    ],

    exclude: ["**/node_modules/**", "**/dist/**"],

    typecheck: {
      enabled: false,
    },

    coverage: {
      provider: "v8",
      reporter: ["text", "html"],
      include: ["packages/*/src/**/*.ts"],
      exclude: ["**/*.d.ts", "**/*.test.ts"],
    },
  },
});
