import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    setupFiles: ["packages/cli/test/setup.ts"],
    testTimeout: 10_000,
  },
});
