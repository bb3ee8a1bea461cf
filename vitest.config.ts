// pattern: Imperative Shell
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",

    include: ["packages/**/src/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist"],

    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: ["packages/**/src/**/*.ts"],
      exclude: ["node_modules", "dist", "**/*.{test,spec}.ts", "**/*.d.ts"],
    },

    testTimeout: 10000,
    hookTimeout: 10000,

    globals: false,
  },
});
