import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/__tests__/**/*.test.ts"],
    restoreMocks: true,
    unstubEnvs: true,
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      // The bin entry only wires argv to the Inspector
      exclude: ["src/cli.ts", "src/__tests__/**"],
      reporter: ["text", "lcov"],
      thresholds: {
        branches: 90,
        lines: 95,
      },
    },
  },
});
