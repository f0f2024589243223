import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
    env: {
      VECSYNC_LOG_LEVEL: "silent"
    },
    testTimeout: 10000,
    hookTimeout: 10000
  }
});
