import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/integration/**/*.test.ts"],
    globalSetup: ["test/integration/globalSetup.ts"],
    // compose pulls images on a cold machine
    hookTimeout: 5 * 60 * 1000,
    testTimeout: 15 * 1000,
    watch: false
  }
});
