import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    setupFiles: ["test/setup.ts"],
    // Tests drive real git processes in temp repositories.
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
});
