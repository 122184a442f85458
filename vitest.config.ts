import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    benchmark: {
      include: ["tests/benchmarks/**/*.bench.ts"],
    },
    testTimeout: 10_000,
  },
});
