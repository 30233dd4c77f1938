import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

function workspaceEntry(relative: string): string {
  return fileURLToPath(new URL(relative, import.meta.url));
}

export default defineConfig({
  test: {
    include: [
      "packages/*/src/**/*.test.ts",
      "packages/*/__tests__/**/*.test.ts",
      "apps/*/__tests__/**/*.test.ts",
    ],
    environment: "node",
    globals: false,
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      "@argweave/sdk": workspaceEntry("./packages/sdk/src/index.ts"),
      "@argweave/shared": workspaceEntry("./packages/shared/src/index.ts"),
      "@argweave/core": workspaceEntry("./packages/core/src/index.ts"),
    },
  },
});
