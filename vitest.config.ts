import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      // Tests run against sources; the package's `import` entry is the built bundle.
      "@wirelet/server": fileURLToPath(new URL("./packages/server/src/index.ts", import.meta.url)),
    },
  },
  test: {
    include: ["packages/*/__tests__/**/*.test.ts"],
    globals: false,
    testTimeout: 10_000,
  },
});
