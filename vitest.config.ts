import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    exclude: ["dist/**", "node_modules/**"],
    environment: "node",
    env: {
      TODO_BOT_LOG_LEVEL: "silent",
    },
  },
});
