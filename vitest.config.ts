import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "error",
    },
    testTimeout: 10000,
  },
});
