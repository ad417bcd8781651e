import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    setupFiles: ["./test/setup.ts"],
    include: ["src/**/*.test.ts", "test/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    env: {
      CURRICULA_LOG_LEVEL: "fatal",
    },
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
