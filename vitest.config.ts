import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["projects/*/src/**/*.test.ts"],
    testTimeout: 10000,
  },
});
