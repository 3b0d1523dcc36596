import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    setupFiles: ["./vitest.setup.ts"],
    testTimeout: 20000,
    hookTimeout: 30000,
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      exclude: ["node_modules/", "dist/", "**/*.test.ts", "**/*.spec.ts", "src/test/**"],
    },
  },
  resolve: {
    alias: {
      "@dssp-client/shared": fileURLToPath(new URL("../shared/src/index.ts", import.meta.url)),
    },
  },
});
