import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**/*.ts"],
      exclude: ["**/*.test.*", "**/test/**"],
      reporter: ["text", "html", "lcov", "json-summary"],
    },
    // Packages are consumed from their TypeScript sources.
    alias: {
      "@fieldkit/expression": fromRoot("./packages/expression/src/index.ts"),
      "@fieldkit/forms": fromRoot("./packages/forms/src/index.ts"),
    },
  },
});
