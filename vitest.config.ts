import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    // Keep CLI output quiet during tests
    env: { LOG_LEVEL: "silent" },
  },
});
