import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@numeris/core",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
