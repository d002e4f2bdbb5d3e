import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/tests/integration/**/*.test.ts"],
    exclude: ["node_modules/**", "dist/**", "src/tests/unit/**"],
    testTimeout: 15000,
  },
});
