// vitest.config.ts (workspace root)
import { defineConfig } from "vitest/config";
import path from "node:path";

export default defineConfig({
  // mirrors the @shared/* path in tsconfig.json
  resolve: {
    alias: {
      "@shared": path.resolve(__dirname, "backend/services/shared"),
    },
  },
  test: {
    environment: "node",
    reporters: ["default"],
    include: [
      "backend/services/blog/test/**/*.spec.ts",
      "backend/services/shared/**/*.test.ts",
    ],
    setupFiles: ["backend/services/blog/test/setup.ts"],
    globals: true,
    hookTimeout: 30_000,
    testTimeout: 30_000,
  },
});
