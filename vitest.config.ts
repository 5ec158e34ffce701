import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts", "tests/**/*.test.ts"],
    testTimeout: 10_000,
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      // Public surfaces: the runner, the checks, and the data model
      include: [
        "src/validate/**/*.ts",
        "src/data/**/*.ts",
        "src/directory/**/*.ts",
      ],
      exclude: [
        "src/**/__tests__/**",
        "src/testing/**",
        "src/schemas/**",   // Zod schemas tested via the loader
      ],
    },
  },
});
