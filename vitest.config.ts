import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const resolvePackage = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts", "packages/*/src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@strata/types": resolvePackage("types"),
      "@strata/persistence": resolvePackage("persistence"),
      "@strata/core": resolvePackage("core"),
    },
  },
});
