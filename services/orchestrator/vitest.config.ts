import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    globals: false,
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent"
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      all: true,
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/test/**"],
      thresholds: {
        lines: 65,
        statements: 65,
        functions: 60,
        branches: 50
      }
    }
  }
});
