import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@numeris/bool-vector",
    include: ["src/__tests__/**/*.test.ts"],
    environment: "node",
  },
});
