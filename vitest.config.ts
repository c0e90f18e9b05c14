import { configDefaults, defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    exclude: [...configDefaults.exclude, "dist/**"],
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/cli.ts", "src/compare/compareTypes.ts"],
      thresholds: {
        statements: 85,
        branches: 75,
        functions: 95,
        lines: 90,
      },
    },
  },
});
