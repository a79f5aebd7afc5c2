import { defineConfig, configDefaults } from "vitest/config";
import path from "path";

export default defineConfig({
  esbuild: {
    jsx: "automatic",
  },
  test: {
    environment: "node",
    testTimeout: 20000,
    hookTimeout: 20000,
    include: ["tests/**/*.spec.ts", "tests/**/*.spec.tsx"],
    exclude: [...configDefaults.exclude, ".next/**"],
  },
  resolve: {
    alias: {
      "@": path.resolve(__dirname, "src"),
    },
  },
});
