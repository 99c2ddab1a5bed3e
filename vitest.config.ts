import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const workspace = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@corral/sdk": workspace("./packages/sdk/src/index.ts"),
      "@corral/shared": workspace("./packages/shared/src/index.ts"),
      "@corral/core": workspace("./packages/core/src/index.ts"),
    },
  },
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
});
