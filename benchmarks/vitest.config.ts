import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    env: {
      DIDSEAL_LOG_LEVEL: "silent",
    },
    benchmark: {
      include: ["benchmarks/**/*.bench.ts"],
    },
  },
});
