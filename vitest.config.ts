import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
  test: {
    watch: false,
    environment: "node",
    testTimeout: 1000,
    include: ["test/**/*.test.ts"],
    exclude: ["node_modules"],
    env: {
      NODE_ENV: "test",
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "text-summary", "lcov", "json-summary", "html"],
      reportsDirectory: "./coverage",
      include: ["src/**"],
      exclude: ["src/types/**"],
    },
  },
});
