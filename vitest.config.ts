import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node",
    env: {
      DIDSEAL_LOG_LEVEL: "silent",
    },
  },
});
