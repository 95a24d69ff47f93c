import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    // PGlite boots a full Postgres instance per worker; the first migration run is slow.
    testTimeout: 20_000,
    hookTimeout: 60_000,
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json-summary"],
      reportsDirectory: "coverage",
      thresholds: {
        lines: 70,
        functions: 70,
        branches: 70,
        statements: 70,
      },
      exclude: [
        "**/*.test.ts",
        "**/*.d.ts",
        // Pure type-only files (interfaces/types, no runtime logic)
        "src/**/repository-types.ts",
        "src/test/**",
      ],
    },
  },
});
