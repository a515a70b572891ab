import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: false,
    environment: "node",
    include: ["cli/tests/**/*.test.ts"],
    testTimeout: 10000,
  },
});
