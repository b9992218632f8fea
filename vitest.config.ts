import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    // supervisor tests fork real children
    testTimeout: 20000,
  },
});
