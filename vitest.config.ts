import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: ["packages/*/vitest.config.ts"],

    exclude: ["**/node_modules/**", "**/dist/**"],

    pool: "forks",

    testTimeout: 30000,
    hookTimeout: 15000,
  },
});
