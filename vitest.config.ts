import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts"],
    environment: "node",
    pool: "forks",
    testTimeout: 20000,
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
    },
  },
});
