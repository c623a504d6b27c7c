import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/fixtures/**"],
    // Type-checking virtual programs loads the standard library from disk.
    testTimeout: 30_000,
  },
});
