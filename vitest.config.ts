import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts", "apps/*/test/**/*.test.ts"],
    exclude: ["dist/**", "**/node_modules/**"],
    testTimeout: 10_000,
  },
});
