import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
    exclude: ["test/integration/**", "dist/**", "node_modules/**"],
    env: {
      LOG_LEVEL: "silent"
    },
    watch: false
  }
});
