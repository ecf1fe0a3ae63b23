import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@numeris/math",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
