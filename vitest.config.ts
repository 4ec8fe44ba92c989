import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    // Tests run against workspace sources; the package export points at dist
    alias: {
      "@buildlog/parser": fileURLToPath(
        new URL("./packages/parser/src/index.ts", import.meta.url)
      ),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    environment: "node",
  },
});
