import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    testTimeout: 10000,
    env: {
      CONNECTOR_KIT_LOG_LEVEL: "silent",
    },
  },
});
