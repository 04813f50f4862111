import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const packageEntry = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@richedit/editor-core": packageEntry("editor-core"),
      "@richedit/editor-bridge": packageEntry("editor-bridge"),
      "@richedit/toolbar-react": packageEntry("toolbar-react")
    }
  },
  test: {
    globals: true,
    environment: "happy-dom",
    include: ["packages/*/src/**/*.test.{ts,tsx}"],
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      reportsDirectory: "coverage"
    }
  }
});
