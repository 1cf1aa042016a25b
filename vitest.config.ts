import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packageEntry = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts"],
    coverage: {
      reporter: ["text", "lcov"],
    },
  },
  resolve: {
    alias: {
      "@treekit/core": packageEntry("./packages/core/src/index.ts"),
      "@treekit/utils-node": packageEntry("./packages/utils-node/src/index.ts"),
      "@treekit/utils": packageEntry("./packages/utils/src/index.ts"),
    },
  },
});
