// pattern: Imperative Shell
import { defineConfig, mergeConfig } from "vitest/config";

import workspaceConfig from "../../vitest.config.js";

export default mergeConfig(
  workspaceConfig,
  defineConfig({
    test: {
      // Only this package's tests when run from its directory
      include: ["src/**/*.{test,spec}.ts"],
      coverage: {
        include: ["src/**/*.ts"],
      },
    },
  })
);
