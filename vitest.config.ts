import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    setupFiles: ["tests/setup.ts"],
    restoreMocks: true,
    clearMocks: true,
    unstubGlobals: true,

    // src/lib/env.ts validates at import time; give it the one required value
    // so modules that pull in env (sentry, owner) load under test.
    env: {
      NODE_ENV: "test",
      DISCORD_TOKEN: "test-token",
    },

    // Reduce console spam from libs during tests
    onConsoleLog(log: string) {
      if (/\[dotenv@/i.test(log) || /\[dotenvx@/i.test(log) || /tip:/i.test(log)) {
        return false;
      }
      return true;
    },

    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary", "html"],
      exclude: ["tests/**", "**/*.test.ts", "dist/**", "vitest.config.ts"],
      thresholds: {
        lines: 60,
        functions: 60,
        branches: 50,
        statements: 60,
      },
    },
  },
});
