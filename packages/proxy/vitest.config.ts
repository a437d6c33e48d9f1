import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@lazyproxy/proxy",
    include: ["src/__tests__/**/*.test.ts"],
    environment: "node",
  },
});
