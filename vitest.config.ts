import { defineConfig } from "vitest/config";
import { fileURLToPath } from "url";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node",
  },
  resolve: {
    alias: {
      // Workspace package resolves to its sources, so tests need no build first
      "@notes-toolkit/utils": fileURLToPath(
        new URL("./packages/utils/src/index.ts", import.meta.url)
      ),
    },
  },
});
